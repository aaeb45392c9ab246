export * from './types.js';
export * from './errors.js';
export { createSchedule, isPatternType, schedulesEqual } from './model.js';
export {
  PATTERN_REGISTRY,
  continuousPattern,
  scheduledPattern,
  triggeredPattern,
  sensorTrigger,
  audioTrigger,
  eventTrigger,
  type ContinuousPatternInit,
  type ScheduledPatternInit,
  type TriggeredPatternInit,
  type PatternDefinition,
  type PatternRegistry,
} from './patterns/index.js';
export { parse, serialize, loads, dumps, type ParseOptions, type SerializeOptions } from './codec.js';
export {
  recordingScheduleDocumentSchema,
  continuousPatternSchema,
  scheduledPatternSchema,
  triggeredPatternSchema,
  triggerSchema,
  windowSchema,
  cycleSchema,
  type RecordingScheduleDocument,
} from './schema.js';
