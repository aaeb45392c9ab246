/**
 * pamsched-validate: check a schedule file and print its normalised form.
 *
 * Usage:
 *   pamsched-validate schedule.json
 *   pamsched-validate schedule.json --strict
 *   pamsched-validate schedule.json --supported-version 0.1.0
 */

import { parseArgs } from 'util';
import { ConfigError, loadConfig, toParseOptions } from '../config/index.js';
import { componentLogger, serializeError } from '../logging/index.js';
import { isScheduleError, parse, serialize, type ParseOptions } from '../schedule/index.js';
import { PACKAGE_VERSION } from '../version.js';
import { formatHeader, formatValidSchedule } from './display.js';

export interface CliIO {
  out(line: string): void;
  err(line: string): void;
  readFile(path: string): Promise<string>;
  fileExists(path: string): Promise<boolean>;
  env: Record<string, string | undefined>;
}

const HELP = `
Usage:
  pamsched-validate <file> [options]

Options:
  --strict                   Reject unknown top-level keys
  --supported-version <v>    Accept only this DSL version (repeatable)
  --version                  Show package version
  --help, -h                 Show this help message

Environment:
  PAMSCHED_STRICT              Default for --strict (true/false)
  PAMSCHED_SUPPORTED_VERSIONS  Comma-separated default for --supported-version
`;

interface CLIArgs {
  file?: string;
  strict: boolean;
  supportedVersions: string[];
  showVersion: boolean;
  showHelp: boolean;
}

function parseCliArgs(argv: string[]): CLIArgs {
  const { values, positionals } = parseArgs({
    args: argv,
    options: {
      strict: { type: 'boolean', default: false },
      'supported-version': { type: 'string', multiple: true },
      version: { type: 'boolean', default: false },
      help: { type: 'boolean', short: 'h', default: false },
    },
    allowPositionals: true,
  });

  return {
    file: positionals[0],
    strict: values.strict ?? false,
    supportedVersions: values['supported-version'] ?? [],
    showVersion: values.version ?? false,
    showHelp: values.help ?? false,
  };
}

function printHelp(io: CliIO): void {
  for (const line of formatHeader('pamsched - recording schedule validator')) {
    io.out(line);
  }
  io.out(HELP);
}

function resolveParseOptions(args: CLIArgs, io: CliIO): ParseOptions {
  const fromEnv = toParseOptions(loadConfig(io.env));
  return {
    strict: args.strict || fromEnv.strict,
    supportedVersions: args.supportedVersions.length > 0 ? args.supportedVersions : fromEnv.supportedVersions,
  };
}

/**
 * Run the validator and return the process exit code.
 */
export async function runCli(argv: string[], io: CliIO): Promise<number> {
  let args: CLIArgs;
  try {
    args = parseCliArgs(argv);
  } catch (error) {
    io.err(`Error: ${error instanceof Error ? error.message : String(error)}`);
    printHelp(io);
    return 1;
  }

  if (args.showVersion) {
    io.out(`pamsched ${PACKAGE_VERSION}`);
    return 0;
  }

  if (args.showHelp || !args.file) {
    printHelp(io);
    return 0;
  }

  let options: ParseOptions;
  try {
    options = resolveParseOptions(args, io);
  } catch (error) {
    if (error instanceof ConfigError) {
      io.err(error.message);
      return 1;
    }
    throw error;
  }

  const file = args.file;
  if (!(await io.fileExists(file))) {
    io.err(`Error: File not found: ${file}`);
    return 1;
  }

  try {
    const content = await io.readFile(file);
    const schedule = parse(content, options);
    componentLogger('CLI').debug({ file, patternType: schedule.patternType }, 'Schedule validated');

    for (const line of formatValidSchedule(file, schedule, serialize(schedule, { indent: 2 }))) {
      io.out(line);
    }
    return 0;
  } catch (error) {
    if (isScheduleError(error)) {
      io.err(`❌ Invalid schedule: [${error.code}] ${error.message}`);
      return 1;
    }
    componentLogger('CLI').debug({ file, err: serializeError(error) }, 'Failed to read schedule');
    io.err(`❌ Invalid schedule: ${error instanceof Error ? error.message : String(error)}`);
    return 1;
  }
}
