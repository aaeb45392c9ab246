/**
 * Configuration for the command-line tools.
 *
 * All environment access goes through loadConfig(); the schedule core itself
 * never reads the environment and takes ParseOptions instead.
 */

import { z } from 'zod';
import type { ParseOptions } from '../schedule/codec.js';
import { isSemver } from '../schedule/rules.js';

// ============================================================================
// Configuration Schema
// ============================================================================

// z.coerce.boolean() treats any non-empty string as true, so map the common spellings
const booleanSchema = z
  .string()
  .trim()
  .toLowerCase()
  .refine((val) => ['', 'true', 'false', '1', '0', 'yes', 'no'].includes(val), {
    message: 'must be one of true, false, 1, 0, yes, no',
  })
  .transform((val) => val === 'true' || val === '1' || val === 'yes');

const versionListSchema = z
  .string()
  .transform((val) =>
    val
      .split(',')
      .map((entry) => entry.trim())
      .filter((entry) => entry !== '')
  )
  .refine((versions) => versions.every(isSemver), {
    message: 'must be a comma-separated list of semantic versions (e.g. "0.1.0,0.2.0")',
  });

const configSchema = z.object({
  // PAMSCHED_STRICT: Reject unknown top-level keys in schedule documents
  PAMSCHED_STRICT: booleanSchema.default('false'),

  // PAMSCHED_SUPPORTED_VERSIONS: Accepted DSL versions; empty accepts any
  PAMSCHED_SUPPORTED_VERSIONS: versionListSchema.default(''),
});

export type PamschedConfig = {
  strict: boolean;
  supportedVersions: string[];
};

export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly issues: string[]
  ) {
    super(message);
    this.name = 'ConfigError';
  }
}

// ============================================================================
// Loading
// ============================================================================

/**
 * Validate configuration from an environment map
 *
 * @throws ConfigError listing every invalid variable
 */
export function loadConfig(env: Record<string, string | undefined> = process.env): PamschedConfig {
  const result = configSchema.safeParse(env);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigError(`Configuration validation failed:\n${issues.map((line) => `  - ${line}`).join('\n')}`, issues);
  }

  return {
    strict: result.data.PAMSCHED_STRICT,
    supportedVersions: result.data.PAMSCHED_SUPPORTED_VERSIONS,
  };
}

export function toParseOptions(config: PamschedConfig): ParseOptions {
  return {
    strict: config.strict,
    supportedVersions: config.supportedVersions,
  };
}
