import { z } from 'zod';
import {
  DATE_TIME_PATTERN,
  FIXED_TIME_PATTERN,
  SEMVER_PATTERN,
  SOLAR_TIME_PATTERN,
  isDateTime,
  isTimeZone,
} from './rules.js';
import { COMPARISON_OPERATORS, DAYS_OF_WEEK, PATTERN_TYPES, WINDOW_TYPES } from './types.js';

// zod mirror of schema/recording-schedule.schema.json, in wire (snake_case) form.
// Rules the JSON Schema cannot state (date ordering, IANA zones) are refinements here.

const uniqueItems = <T>(items: readonly T[] | null | undefined) => !items || new Set(items).size === items.length;

const dateTimeSchema = z
  .string()
  .regex(DATE_TIME_PATTERN, 'Must be an RFC 3339 date-time')
  .refine(isDateTime, 'Must be a valid calendar date-time');

export const continuousPatternSchema = z
  .object({
    start_at: dateTimeSchema.nullish().describe('When to start recording; absent starts immediately'),
    end_at: dateTimeSchema.nullish().describe('When to stop recording; absent records until stopped'),
  })
  .passthrough()
  .refine((p) => !p.start_at || !p.end_at || Date.parse(p.start_at) < Date.parse(p.end_at), {
    message: 'start_at must precede end_at',
    path: ['end_at'],
  });

export const cycleSchema = z
  .object({
    record_seconds: z.number().int().min(1).describe('Seconds to record'),
    sleep_seconds: z.number().int().min(0).describe('Seconds to sleep between recordings'),
  })
  .passthrough();

export const windowSchema = z
  .object({
    window_type: z.enum(WINDOW_TYPES),
    start: z.string(),
    end: z.string(),
    days_of_week: z.array(z.enum(DAYS_OF_WEEK)).min(1).nullish().refine(uniqueItems, 'Days must be distinct'),
    months: z.array(z.number().int().min(1).max(12)).min(1).nullish().refine(uniqueItems, 'Months must be distinct'),
  })
  .passthrough()
  .superRefine((window, ctx) => {
    const pattern = window.window_type === 'fixed' ? FIXED_TIME_PATTERN : SOLAR_TIME_PATTERN;
    for (const key of ['start', 'end'] as const) {
      if (!pattern.test(window[key])) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: [key],
          message: `Invalid ${window.window_type} window time "${window[key]}"`,
        });
      }
    }
  });

export const scheduledPatternSchema = z
  .object({
    windows: z.array(windowSchema).min(1),
    cycle: cycleSchema,
    timezone: z.string().refine(isTimeZone, 'Must be an IANA time zone').nullish(),
  })
  .passthrough();

const sensorTriggerSchema = z
  .object({
    trigger_type: z.literal('sensor'),
    sensor: z
      .object({
        kind: z.string().trim().min(1).describe('Sensor reading, e.g. "temperature_c"'),
        op: z.enum(COMPARISON_OPERATORS),
        threshold: z.number(),
      })
      .passthrough(),
    audio: z.undefined(),
    event: z.undefined(),
  })
  .passthrough();

const audioTriggerSchema = z
  .object({
    trigger_type: z.literal('audio'),
    audio: z
      .object({
        class: z.string().trim().min(1).describe('Audio class label, e.g. "bird"'),
        min_confidence: z.number().min(0).max(1),
      })
      .passthrough(),
    sensor: z.undefined(),
    event: z.undefined(),
  })
  .passthrough();

const eventTriggerSchema = z
  .object({
    trigger_type: z.literal('event'),
    event: z
      .object({
        name: z.string().trim().min(1).describe('Named event, e.g. "rain_stopped"'),
        offset_seconds: z.number().int().nullish(),
      })
      .passthrough(),
    sensor: z.undefined(),
    audio: z.undefined(),
  })
  .passthrough();

export const triggerSchema = z.discriminatedUnion('trigger_type', [
  sensorTriggerSchema,
  audioTriggerSchema,
  eventTriggerSchema,
]);

export const triggeredPatternSchema = z
  .object({
    triggers: z.array(triggerSchema).min(1),
    max_duration: z.number().int().min(1).nullish().describe('Longest single recording in seconds'),
  })
  .passthrough();

export const recordingScheduleDocumentSchema = z
  .object({
    version: z.string().regex(SEMVER_PATTERN, 'Must be a semantic version'),
    pattern_type: z.enum(PATTERN_TYPES),
    continuous: continuousPatternSchema.optional(),
    scheduled: scheduledPatternSchema.optional(),
    triggered: triggeredPatternSchema.optional(),
  })
  .passthrough()
  .superRefine((doc, ctx) => {
    for (const tag of PATTERN_TYPES) {
      const present = doc[tag] !== undefined;
      if (tag === doc.pattern_type && !present && tag !== 'continuous') {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: [tag], message: `Missing "${tag}" payload` });
      }
      if (tag !== doc.pattern_type && present) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: [tag], message: `Unexpected "${tag}" payload` });
      }
    }
  });

export type RecordingScheduleDocument = z.input<typeof recordingScheduleDocumentSchema>;
