/**
 * Recording Schedule Types
 *
 * A schedule is a versioned envelope holding exactly one recording pattern.
 * Pattern variants and triggers are tagged unions; every variant value carries
 * its tag as `kind` so a mismatched envelope can be caught at runtime.
 */

// =============================================================================
// Tags
// =============================================================================

export const PATTERN_TYPES = ['continuous', 'scheduled', 'triggered'] as const;
export type PatternType = (typeof PATTERN_TYPES)[number];

export const TRIGGER_TYPES = ['sensor', 'audio', 'event'] as const;
export type TriggerType = (typeof TRIGGER_TYPES)[number];

export const WINDOW_TYPES = ['fixed', 'solar'] as const;
export type WindowType = (typeof WINDOW_TYPES)[number];

export const DAYS_OF_WEEK = ['Mon', 'Tue', 'Wed', 'Thu', 'Fri', 'Sat', 'Sun'] as const;
export type DayOfWeek = (typeof DAYS_OF_WEEK)[number];

export const COMPARISON_OPERATORS = ['>', '>=', '<', '<='] as const;
export type ComparisonOperator = (typeof COMPARISON_OPERATORS)[number];

// =============================================================================
// Continuous
// =============================================================================

/**
 * Record without interruption, optionally bounded in time
 */
export interface ContinuousPattern {
  readonly kind: 'continuous';
  /** ISO 8601 date-time; absent means start immediately */
  readonly startAt?: string;
  /** ISO 8601 date-time; absent means record until stopped */
  readonly endAt?: string;
}

// =============================================================================
// Scheduled
// =============================================================================

/**
 * Duty cycle applied inside active windows
 */
export interface Cycle {
  readonly recordSeconds: number;
  readonly sleepSeconds: number;
}

/**
 * Time window during which a scheduled pattern is active.
 *
 * Fixed windows use "HH:MM" bounds; solar windows use "sunrise"/"sunset"
 * with an optional offset such as "sunrise-10m".
 */
export interface Window {
  readonly windowType: WindowType;
  readonly start: string;
  readonly end: string;
  /** Absent means every day */
  readonly daysOfWeek?: readonly DayOfWeek[];
  /** Months 1-12; absent means every month */
  readonly months?: readonly number[];
}

export interface ScheduledPattern {
  readonly kind: 'scheduled';
  readonly windows: readonly Window[];
  readonly cycle: Cycle;
  /** IANA time zone, e.g. "Asia/Tokyo" */
  readonly timezone?: string;
}

// =============================================================================
// Triggered
// =============================================================================

export interface SensorTrigger {
  readonly triggerType: 'sensor';
  readonly sensor: {
    /** e.g. "temperature_c", "light_lux", "battery_v" */
    readonly kind: string;
    readonly op: ComparisonOperator;
    readonly threshold: number;
  };
}

export interface AudioTrigger {
  readonly triggerType: 'audio';
  readonly audio: {
    readonly classLabel: string;
    /** 0.0 to 1.0 */
    readonly minConfidence: number;
  };
}

export interface EventTrigger {
  readonly triggerType: 'event';
  readonly event: {
    readonly name: string;
    readonly offsetSeconds: number;
  };
}

export type Trigger = SensorTrigger | AudioTrigger | EventTrigger;

export interface TriggeredPattern {
  readonly kind: 'triggered';
  readonly triggers: readonly Trigger[];
  /** Upper bound in seconds for a single triggered recording */
  readonly maxDuration?: number;
}

// =============================================================================
// Envelope
// =============================================================================

export interface PatternByType {
  continuous: ContinuousPattern;
  scheduled: ScheduledPattern;
  triggered: TriggeredPattern;
}

export type Pattern = PatternByType[PatternType];

export interface ScheduleOf<T extends PatternType> {
  readonly version: string;
  readonly patternType: T;
  readonly pattern: PatternByType[T];
}

/**
 * A recording schedule. Branch on `patternType` to recover the variant.
 */
export type Schedule = { [K in PatternType]: ScheduleOf<K> }[PatternType];

// =============================================================================
// Wire format
// =============================================================================

export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonValue[] | JsonObject;
export interface JsonObject {
  [key: string]: JsonValue;
}
