import type pino from 'pino';
import { z } from 'zod';

export type LogFormat = 'json' | 'pretty';

export type LoggingConfig = {
  level: pino.Level;
  format: LogFormat;
  /** "stdout", "stderr" or a file path */
  destination: string;
};

type Env = Record<string, string | undefined>;

const LEVELS = ['trace', 'debug', 'info', 'warn', 'error', 'fatal'] as const;
const FORMATS = ['json', 'pretty'] as const;

const normalized = z.string().trim().toLowerCase();

const loggingEnvSchema = z.object({
  NODE_ENV: z.string().optional(),
  // Unknown levels fall back to the default rather than failing startup
  LOG_LEVEL: normalized.pipe(z.enum(LEVELS)).optional().catch(undefined),
  LOG_FORMAT: normalized
    .transform((value) => (value === '' ? undefined : value))
    .pipe(
      z.enum(FORMATS, {
        errorMap: (_issue, ctx) => ({ message: `LOG_FORMAT must be "json" or "pretty", got "${String(ctx.data)}"` }),
      }).optional()
    )
    .optional(),
  LOG_PRETTY: normalized.optional(),
  LOG_DESTINATION: z.string().trim().optional(),
});

/**
 * Resolve logger settings from an environment map.
 *
 * Only the CLI calls this; library code logs through whatever logger was
 * installed and is silent by default.
 *
 * @throws Error when LOG_FORMAT names an unknown format
 */
export function getLoggingConfig(env: Env): LoggingConfig {
  const result = loggingEnvSchema.safeParse(env);
  if (!result.success) {
    throw new Error(result.error.issues.map((issue) => issue.message).join('; '));
  }

  const { NODE_ENV, LOG_LEVEL, LOG_FORMAT, LOG_PRETTY, LOG_DESTINATION } = result.data;
  const prettyFlag = LOG_PRETTY === '1' || LOG_PRETTY === 'true';

  return {
    level: LOG_LEVEL ?? (NODE_ENV === 'test' ? 'warn' : 'info'),
    format: LOG_FORMAT ?? (prettyFlag ? 'pretty' : 'json'),
    destination: LOG_DESTINATION || 'stdout',
  };
}
