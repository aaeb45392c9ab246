import type pino from 'pino';
import { createSilentLogger, type LoggerBundle } from './factory.js';

export { getLoggingConfig, type LoggingConfig, type LogFormat } from './config.js';
export { createLogger, createSilentLogger, type LoggerBundle } from './factory.js';

const silent = createSilentLogger();
let active: LoggerBundle = silent;

/**
 * Route all component loggers through `bundle`. The CLI installs an
 * env-configured logger at startup; library users may install their own.
 */
export function installLogger(bundle: LoggerBundle): void {
  active = bundle;
}

export function resetLogger(): void {
  active = silent;
}

/** Child of the installed logger, resolved at call time */
export function componentLogger(component: string): pino.Logger {
  return active.logger.child({ component });
}

export async function flushLogger(): Promise<void> {
  await active.flush();
}

export function serializeError(err: unknown): Record<string, unknown> {
  if (err instanceof Error) {
    return {
      type: err.name,
      message: err.message,
      stack: err.stack,
    };
  }
  return { message: String(err) };
}
