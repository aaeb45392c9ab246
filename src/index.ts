/**
 * pamsched: recording schedules for passive acoustic monitoring devices.
 *
 * @example
 * import { parse, serialize } from 'pamsched';
 *
 * const schedule = parse('{"version":"0.1.0","pattern_type":"continuous","continuous":{}}');
 * serialize(schedule); // '{"version":"0.1.0","pattern_type":"continuous","continuous":{}}'
 */

export * from './schedule/index.js';
export { DSL_VERSION, PACKAGE_VERSION } from './version.js';
