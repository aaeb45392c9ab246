import pino from 'pino';
import type { SonicBoom } from 'sonic-boom';
import type { LoggingConfig } from './config.js';

export type LoggerBundle = {
  logger: pino.Logger;
  flush: () => Promise<void>;
  /** Set when the bundle owns a sonic-boom stream */
  destination: SonicBoom | null;
};

const STANDARD_STREAMS: Record<string, number | undefined> = { stdout: 1, stderr: 2 };

function baseOptions(level: pino.LevelWithSilent): pino.LoggerOptions {
  return {
    name: 'pamsched',
    level,
    formatters: {
      level: (label: string) => ({ level: label }),
    },
    timestamp: pino.stdTimeFunctions.isoTime,
  };
}

function openStream(destination: string): SonicBoom {
  const fd = STANDARD_STREAMS[destination];
  if (fd !== undefined) {
    return pino.destination({ dest: fd, sync: false });
  }
  return pino.destination({ dest: destination, append: true, mkdir: true, sync: false });
}

function flushStream(stream: SonicBoom): Promise<void> {
  return new Promise<void>((resolve, reject) => {
    stream.flush((err) => (err ? reject(err) : resolve()));
  });
}

/**
 * Logger that drops every record. Used until a caller installs a real one.
 */
export function createSilentLogger(): LoggerBundle {
  const discard: pino.DestinationStream = { write: () => undefined };
  return {
    logger: pino(baseOptions('silent'), discard),
    destination: null,
    flush: async () => {},
  };
}

export function createLogger(config: LoggingConfig): LoggerBundle {
  if (config.format === 'pretty') {
    const transport = pino.transport({
      target: 'pino-pretty',
      options: {
        colorize: true,
        translateTime: 'SYS:standard',
        ignore: 'pid,hostname',
        destination: STANDARD_STREAMS[config.destination] ?? config.destination,
        mkdir: true,
      },
    });
    return { logger: pino(baseOptions(config.level), transport), destination: null, flush: async () => {} };
  }

  const stream = openStream(config.destination);
  return {
    logger: pino(baseOptions(config.level), stream),
    destination: stream,
    flush: () => flushStream(stream),
  };
}
