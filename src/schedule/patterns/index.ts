import { continuousDefinition } from './continuous.js';
import type { PatternRegistry } from './definition.js';
import { scheduledDefinition } from './scheduled.js';
import { triggeredDefinition } from './triggered.js';

export type { PatternDefinition, PatternRegistry } from './definition.js';
export { continuousPattern, type ContinuousPatternInit } from './continuous.js';
export { scheduledPattern, type ScheduledPatternInit } from './scheduled.js';
export {
  triggeredPattern,
  sensorTrigger,
  audioTrigger,
  eventTrigger,
  type TriggeredPatternInit,
} from './triggered.js';

/**
 * Tag -> variant lookup used by both schedule construction and the codec.
 * Adding a pattern type means adding its tag to PATTERN_TYPES and an entry here.
 */
export const PATTERN_REGISTRY: PatternRegistry = {
  continuous: continuousDefinition,
  scheduled: scheduledDefinition,
  triggered: triggeredDefinition,
};
