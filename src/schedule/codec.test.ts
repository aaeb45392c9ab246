import { describe, expect, it, vi } from 'vitest';
import { dumps, loads, parse, serialize } from './codec.js';
import { isScheduleError, type ScheduleError } from './errors.js';
import { createSchedule, schedulesEqual } from './model.js';
import {
  audioTrigger,
  continuousPattern,
  eventTrigger,
  scheduledPattern,
  sensorTrigger,
  triggeredPattern,
} from './patterns/index.js';
import type { Schedule } from './types.js';

function catchScheduleError(fn: () => unknown): ScheduleError {
  try {
    fn();
  } catch (error) {
    if (isScheduleError(error)) return error;
    throw error;
  }
  throw new Error('Expected a ScheduleError');
}

const CONTINUOUS_TEXT = '{"version":"0.1.0","pattern_type":"continuous","continuous":{}}';

describe('parse', () => {
  it('decodes a minimal continuous schedule', () => {
    expect(parse(CONTINUOUS_TEXT)).toEqual({
      version: '0.1.0',
      patternType: 'continuous',
      pattern: { kind: 'continuous' },
    });
  });

  it('accepts a continuous schedule without its payload key', () => {
    const schedule = parse('{"version":"0.1.0","pattern_type":"continuous"}');

    expect(schedule.pattern).toEqual({ kind: 'continuous' });
  });

  it('decodes a scheduled pattern into the model', () => {
    const schedule = parse(
      JSON.stringify({
        version: '0.1.0',
        pattern_type: 'scheduled',
        scheduled: {
          windows: [{ window_type: 'solar', start: 'sunrise-30m', end: 'sunrise+2h', days_of_week: ['Sat', 'Sun'] }],
          cycle: { record_seconds: 60, sleep_seconds: 240 },
          timezone: 'Europe/Berlin',
        },
      })
    );

    expect(schedule.pattern).toEqual({
      kind: 'scheduled',
      windows: [{ windowType: 'solar', start: 'sunrise-30m', end: 'sunrise+2h', daysOfWeek: ['Sat', 'Sun'] }],
      cycle: { recordSeconds: 60, sleepSeconds: 240 },
      timezone: 'Europe/Berlin',
    });
  });

  it('treats an integral float as an integer', () => {
    const schedule = parse(
      '{"version":"0.1.0","pattern_type":"triggered","triggered":{"triggers":[{"trigger_type":"event","event":{"name":"dusk"}}],"max_duration":60.0}}'
    );

    expect(schedule.pattern).toEqual({
      kind: 'triggered',
      triggers: [{ triggerType: 'event', event: { name: 'dusk', offsetSeconds: 0 } }],
      maxDuration: 60,
    });
  });

  it('reports malformed JSON as a syntax error', () => {
    const error = catchScheduleError(() => parse('not json'));

    expect(error.code).toBe('SYNTAX_ERROR');
    expect(error.field).toBeUndefined();
    expect(error.message.startsWith('Schedule is not valid JSON: ')).toBe(true);
  });

  it('reports an empty document as a syntax error', () => {
    expect(catchScheduleError(() => parse('')).code).toBe('SYNTAX_ERROR');
  });

  it('reports a missing version', () => {
    const error = catchScheduleError(() => parse('{"pattern_type":"continuous","continuous":{}}'));

    expect(error.code).toBe('MISSING_FIELD');
    expect(error.field).toBe('version');
    expect(error.message).toBe('Missing required field "version"');
  });

  it('reports an unknown pattern type', () => {
    const error = catchScheduleError(() => parse('{"version":"0.1.0","pattern_type":"bogus","bogus":{}}'));

    expect(error.code).toBe('UNKNOWN_PATTERN_TYPE');
    expect(error.message).toBe('Unknown pattern_type "bogus". Must be one of: continuous, scheduled, triggered');
  });

  it('reports the JSON type it found', () => {
    const error = catchScheduleError(() => parse('{"version":"0.1.0","pattern_type":3}'));

    expect(error.code).toBe('TYPE_MISMATCH');
    expect(error.message).toBe('Field "pattern_type" must be a string, got integer');
  });

  it('rejects a fractional duration as a type mismatch', () => {
    const error = catchScheduleError(() =>
      parse(
        '{"version":"0.1.0","pattern_type":"scheduled","scheduled":{"windows":[{"window_type":"fixed","start":"05:00","end":"06:00"}],"cycle":{"record_seconds":1.5,"sleep_seconds":0}}}'
      )
    );

    expect(error.message).toBe('Field "scheduled.cycle.record_seconds" must be an integer, got number');
  });

  it('rejects a payload under another pattern key', () => {
    const error = catchScheduleError(() =>
      parse('{"version":"0.1.0","pattern_type":"continuous","continuous":{},"triggered":{"triggers":[]}}')
    );

    expect(error.code).toBe('INVALID_PATTERN');
    expect(error.field).toBe('triggered');
    expect(error.message).toBe('Schedule with pattern_type "continuous" must not carry a "triggered" payload');
  });

  it('ignores unknown top-level keys unless strict', () => {
    const text = '{"version":"0.1.0","pattern_type":"continuous","device":"AM-120"}';

    expect(parse(text).patternType).toBe('continuous');

    const error = catchScheduleError(() => parse(text, { strict: true }));
    expect(error.code).toBe('UNKNOWN_FIELD');
    expect(error.field).toBe('device');
    expect(error.message).toBe('Unknown top-level field "device"');
  });

  it('limits accepted versions when asked', () => {
    expect(parse(CONTINUOUS_TEXT, { supportedVersions: ['0.1.0'] }).version).toBe('0.1.0');

    const error = catchScheduleError(() => parse(CONTINUOUS_TEXT, { supportedVersions: ['0.2.0', '0.3.0'] }));
    expect(error.code).toBe('UNSUPPORTED_VERSION');
    expect(error.message).toBe('Schedule version "0.1.0" is not supported (supported: 0.2.0, 0.3.0)');
  });

  it('checks the tag before the version list', () => {
    const error = catchScheduleError(() =>
      parse('{"version":"9.9.9","pattern_type":"bogus"}', { supportedVersions: ['0.1.0'] })
    );

    expect(error.code).toBe('UNKNOWN_PATTERN_TYPE');
  });
});

describe('loads', () => {
  it('accepts an already-decoded document', () => {
    const schedule = loads({
      version: '0.1.0',
      pattern_type: 'triggered',
      triggered: { triggers: [{ trigger_type: 'event', event: { name: 'dusk', offset_seconds: 30 } }] },
    });

    expect(schedule.pattern).toEqual({ kind: 'triggered', triggers: [eventTrigger('dusk', 30)] });
  });

  it('accepts text', () => {
    expect(loads(CONTINUOUS_TEXT)).toEqual(parse(CONTINUOUS_TEXT));
  });

  it('rejects a document that is not an object', () => {
    const error = catchScheduleError(() => loads([1]));

    expect(error.code).toBe('TYPE_MISMATCH');
    expect(error.field).toBe('$');
    expect(error.message).toBe('Field "$" must be an object, got array');
  });
});

describe('dumps', () => {
  it('writes envelope keys first and drops unset fields', () => {
    const schedule = parse(
      JSON.stringify({
        scheduled: {
          timezone: null,
          cycle: { sleep_seconds: 50, record_seconds: 10 },
          windows: [{ end: '23:59', start: '00:00', window_type: 'fixed', months: null }],
        },
        pattern_type: 'scheduled',
        version: '0.1.0',
      })
    );
    const document = dumps(schedule);

    expect(Object.keys(document)).toEqual(['version', 'pattern_type', 'scheduled']);
    expect(document).toEqual({
      version: '0.1.0',
      pattern_type: 'scheduled',
      scheduled: {
        windows: [{ window_type: 'fixed', start: '00:00', end: '23:59' }],
        cycle: { record_seconds: 10, sleep_seconds: 50 },
      },
    });
  });

  it('uses wire names for triggers', () => {
    const schedule = createSchedule(
      '0.1.0',
      'triggered',
      triggeredPattern({
        triggers: [sensorTrigger('temperature_c', '>=', 25.5), audioTrigger('bird', 0.8), eventTrigger('rain_stopped')],
        maxDuration: 600,
      })
    );

    expect(dumps(schedule)).toEqual({
      version: '0.1.0',
      pattern_type: 'triggered',
      triggered: {
        triggers: [
          { trigger_type: 'sensor', sensor: { kind: 'temperature_c', op: '>=', threshold: 25.5 } },
          { trigger_type: 'audio', audio: { class: 'bird', min_confidence: 0.8 } },
          { trigger_type: 'event', event: { name: 'rain_stopped', offset_seconds: 0 } },
        ],
        max_duration: 600,
      },
    });
  });

  it('refuses a hand-built schedule that breaks a field rule', () => {
    const forged: Schedule = {
      version: '0.1.0',
      patternType: 'scheduled',
      pattern: { kind: 'scheduled', windows: [], cycle: { recordSeconds: 1, sleepSeconds: 0 } },
    };

    const error = catchScheduleError(() => dumps(forged));
    expect(error.code).toBe('INVALID_PATTERN');
    expect(error.field).toBe('scheduled.windows');
  });
});

describe('serialize', () => {
  it('produces compact JSON by default', () => {
    expect(serialize(parse(CONTINUOUS_TEXT))).toBe(CONTINUOUS_TEXT);
  });

  it('indents when asked', () => {
    expect(serialize(parse(CONTINUOUS_TEXT), { indent: 2 })).toBe(
      '{\n  "version": "0.1.0",\n  "pattern_type": "continuous",\n  "continuous": {}\n}'
    );
  });

  const schedules: Schedule[] = [
    createSchedule('0.1.0', 'continuous', continuousPattern()),
    createSchedule(
      '1.0.0-rc.1',
      'continuous',
      continuousPattern({ startAt: '2025-03-01T06:00:00.250Z', endAt: '2025-03-02T06:00:00-05:00' })
    ),
    createSchedule(
      '0.1.0',
      'scheduled',
      scheduledPattern({
        windows: [
          { windowType: 'fixed', start: '04:30', end: '07:00', daysOfWeek: ['Mon', 'Thu'], months: [3, 4, 5] },
          { windowType: 'solar', start: 'sunset-45m', end: 'sunset+1h' },
        ],
        cycle: { recordSeconds: 55, sleepSeconds: 5 },
        timezone: 'America/Sao_Paulo',
      })
    ),
    createSchedule(
      '0.1.0',
      'triggered',
      triggeredPattern({ triggers: [sensorTrigger('battery_v', '<=', -0.5), eventTrigger('storm', -90)] })
    ),
  ];

  it.each(schedules.map((schedule): [string, Schedule] => [schedule.patternType, schedule]))(
    'round-trips a %s schedule',
    (_, schedule) => {
      const text = serialize(schedule);
      const reparsed = parse(text);

      expect(schedulesEqual(reparsed, schedule)).toBe(true);
      expect(serialize(reparsed)).toBe(text);
    }
  );
});

describe('module loading', () => {
  it('ignores logging env variables on import', async () => {
    vi.resetModules();
    vi.stubEnv('LOG_FORMAT', 'text');
    vi.stubEnv('LOG_DESTINATION', '/nonexistent/dir/pamsched.log');
    try {
      const codec = await import('./codec.js');
      expect(codec.parse(CONTINUOUS_TEXT).patternType).toBe('continuous');
    } finally {
      vi.unstubAllEnvs();
    }
  });
});
