/**
 * Text rendering for the validator CLI.
 *
 * Functions return lines instead of printing so the caller owns the streams.
 */

import type { Schedule, Trigger } from '../schedule/index.js';

const BOX_WIDTH = 60;

export function formatHeader(title: string): string[] {
  const line = '─'.repeat(BOX_WIDTH - 2);
  return [`┌${line}┐`, `│  ${title.padEnd(BOX_WIDTH - 4)}│`, `└${line}┘`];
}

function describeTrigger(trigger: Trigger): string {
  switch (trigger.triggerType) {
    case 'sensor':
      return `sensor ${trigger.sensor.kind} ${trigger.sensor.op} ${trigger.sensor.threshold}`;
    case 'audio':
      return `audio "${trigger.audio.classLabel}" >= ${trigger.audio.minConfidence}`;
    case 'event': {
      const offset = trigger.event.offsetSeconds;
      if (offset === 0) return `event ${trigger.event.name}`;
      return `event ${trigger.event.name} ${offset > 0 ? '+' : ''}${offset}s`;
    }
  }
}

/**
 * One-line human summary of the active pattern
 */
export function describePattern(schedule: Schedule): string {
  switch (schedule.patternType) {
    case 'continuous': {
      const { startAt, endAt } = schedule.pattern;
      return `from ${startAt ?? 'now'} until ${endAt ?? 'stopped'}`;
    }
    case 'scheduled': {
      const { windows, cycle, timezone } = schedule.pattern;
      return (
        `${windows.length} window(s), record ${cycle.recordSeconds}s / sleep ${cycle.sleepSeconds}s, ` +
        `timezone ${timezone ?? 'device default'}`
      );
    }
    case 'triggered': {
      const { triggers, maxDuration } = schedule.pattern;
      const limit = maxDuration === undefined ? 'no max duration' : `max duration ${maxDuration}s`;
      return `${triggers.map(describeTrigger).join('; ')} (${limit})`;
    }
  }
}

export function formatValidSchedule(file: string, schedule: Schedule, document: string): string[] {
  return [
    `✅ Valid schedule: ${file}`,
    `   Version: ${schedule.version}`,
    `   Type:    ${schedule.patternType}`,
    `   Pattern: ${describePattern(schedule)}`,
    '',
    'Parsed Structure:',
    document,
  ];
}
