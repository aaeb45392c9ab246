import { InvalidPatternError } from '../errors.js';
import {
  asObject,
  fieldPath,
  hasField,
  indexPath,
  readArray,
  readNumber,
  readObject,
  readOptionalInteger,
  readString,
} from '../fields.js';
import { requireFinite, requireInteger, requireNonEmpty, requireNonEmptyList, requireOneOf } from '../rules.js';
import {
  COMPARISON_OPERATORS,
  TRIGGER_TYPES,
  type AudioTrigger,
  type EventTrigger,
  type JsonObject,
  type JsonValue,
  type SensorTrigger,
  type Trigger,
  type TriggeredPattern,
} from '../types.js';
import type { PatternDefinition } from './definition.js';

export type TriggeredPatternInit = Omit<TriggeredPattern, 'kind'>;

// =============================================================================
// Trigger helpers
// =============================================================================

export function sensorTrigger(kind: string, op: SensorTrigger['sensor']['op'], threshold: number): SensorTrigger {
  return buildTrigger({ triggerType: 'sensor', sensor: { kind, op, threshold } }, 'trigger');
}

export function audioTrigger(classLabel: string, minConfidence: number): AudioTrigger {
  return buildTrigger({ triggerType: 'audio', audio: { classLabel, minConfidence } }, 'trigger');
}

export function eventTrigger(name: string, offsetSeconds = 0): EventTrigger {
  return buildTrigger({ triggerType: 'event', event: { name, offsetSeconds } }, 'trigger');
}

function buildTrigger<T extends Trigger>(trigger: T, path: string): T;
function buildTrigger(trigger: Trigger, path: string): Trigger {
  requireOneOf(trigger.triggerType, TRIGGER_TYPES, fieldPath(path, 'trigger_type'));

  switch (trigger.triggerType) {
    case 'sensor': {
      const payloadPath = fieldPath(path, 'sensor');
      return Object.freeze({
        triggerType: 'sensor' as const,
        sensor: Object.freeze({
          kind: requireNonEmpty(trigger.sensor.kind, fieldPath(payloadPath, 'kind')),
          op: requireOneOf(trigger.sensor.op, COMPARISON_OPERATORS, fieldPath(payloadPath, 'op')),
          threshold: requireFinite(trigger.sensor.threshold, fieldPath(payloadPath, 'threshold')),
        }),
      }) satisfies SensorTrigger;
    }
    case 'audio': {
      const payloadPath = fieldPath(path, 'audio');
      return Object.freeze({
        triggerType: 'audio' as const,
        audio: Object.freeze({
          classLabel: requireNonEmpty(trigger.audio.classLabel, fieldPath(payloadPath, 'class')),
          minConfidence: requireFinite(trigger.audio.minConfidence, fieldPath(payloadPath, 'min_confidence'), 0, 1),
        }),
      }) satisfies AudioTrigger;
    }
    case 'event': {
      const payloadPath = fieldPath(path, 'event');
      return Object.freeze({
        triggerType: 'event' as const,
        event: Object.freeze({
          name: requireNonEmpty(trigger.event.name, fieldPath(payloadPath, 'name')),
          offsetSeconds: requireInteger(
            trigger.event.offsetSeconds,
            fieldPath(payloadPath, 'offset_seconds'),
            Number.MIN_SAFE_INTEGER
          ),
        }),
      }) satisfies EventTrigger;
    }
  }
}

/**
 * Build a triggered pattern: recording starts when any trigger fires.
 */
export function triggeredPattern(init: TriggeredPatternInit, path = 'triggered'): TriggeredPattern {
  const triggersPath = fieldPath(path, 'triggers');
  const triggers = requireNonEmptyList(init.triggers, triggersPath).map((trigger, index) =>
    buildTrigger(trigger, indexPath(triggersPath, index))
  );
  const maxDuration =
    init.maxDuration === undefined ? undefined : requireInteger(init.maxDuration, fieldPath(path, 'max_duration'), 1);

  return Object.freeze({
    kind: 'triggered' as const,
    triggers: Object.freeze(triggers),
    ...(maxDuration !== undefined ? { maxDuration } : {}),
  });
}

// =============================================================================
// Wire format
// =============================================================================

function decodeTrigger(value: JsonValue, path: string): Trigger {
  const raw = asObject(value, path);
  const triggerType = requireOneOf(readString(raw, 'trigger_type', path), TRIGGER_TYPES, fieldPath(path, 'trigger_type'));

  // Same rule as the envelope: the payload sits under the key named by the tag
  for (const other of TRIGGER_TYPES) {
    if (other !== triggerType && hasField(raw, other)) {
      throw new InvalidPatternError(
        `Trigger of type "${triggerType}" must not carry a "${other}" payload`,
        fieldPath(path, other)
      );
    }
  }

  const payload = readObject(raw, triggerType, path);
  const payloadPath = fieldPath(path, triggerType);

  switch (triggerType) {
    case 'sensor':
      return {
        triggerType,
        sensor: {
          kind: readString(payload, 'kind', payloadPath),
          op: requireOneOf(readString(payload, 'op', payloadPath), COMPARISON_OPERATORS, fieldPath(payloadPath, 'op')),
          threshold: readNumber(payload, 'threshold', payloadPath),
        },
      };
    case 'audio':
      return {
        triggerType,
        audio: {
          classLabel: readString(payload, 'class', payloadPath),
          minConfidence: readNumber(payload, 'min_confidence', payloadPath),
        },
      };
    case 'event':
      return {
        triggerType,
        event: {
          name: readString(payload, 'name', payloadPath),
          offsetSeconds: readOptionalInteger(payload, 'offset_seconds', payloadPath) ?? 0,
        },
      };
  }
}

function encodeTrigger(trigger: Trigger): JsonObject {
  switch (trigger.triggerType) {
    case 'sensor':
      return {
        trigger_type: 'sensor',
        sensor: { kind: trigger.sensor.kind, op: trigger.sensor.op, threshold: trigger.sensor.threshold },
      };
    case 'audio':
      return {
        trigger_type: 'audio',
        audio: { class: trigger.audio.classLabel, min_confidence: trigger.audio.minConfidence },
      };
    case 'event':
      return {
        trigger_type: 'event',
        event: { name: trigger.event.name, offset_seconds: trigger.event.offsetSeconds },
      };
  }
}

export const triggeredDefinition: PatternDefinition<'triggered'> = {
  type: 'triggered',
  payloadOptional: false,
  build: (pattern, path) => triggeredPattern(pattern, path),
  decode(payload, path) {
    const triggers = readArray(payload, 'triggers', path, decodeTrigger);
    const maxDuration = readOptionalInteger(payload, 'max_duration', path);
    return {
      kind: 'triggered',
      triggers,
      ...(maxDuration !== undefined ? { maxDuration } : {}),
    };
  },
  encode(pattern) {
    const payload: JsonObject = { triggers: pattern.triggers.map(encodeTrigger) };
    if (pattern.maxDuration !== undefined) payload.max_duration = pattern.maxDuration;
    return payload;
  },
};
