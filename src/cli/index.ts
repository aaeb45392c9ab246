#!/usr/bin/env node
import 'dotenv/config';
import { access, readFile } from 'fs/promises';
import {
  componentLogger,
  createLogger,
  flushLogger,
  getLoggingConfig,
  installLogger,
  serializeError,
} from '../logging/index.js';
import { runCli } from './run.js';

async function fileExists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch {
    return false;
  }
}

function main(): Promise<number> {
  installLogger(createLogger(getLoggingConfig(process.env)));
  return runCli(process.argv.slice(2), {
    out: (line) => console.log(line),
    err: (line) => console.error(line),
    readFile: (path) => readFile(path, 'utf-8'),
    fileExists,
    env: process.env,
  });
}

try {
  process.exitCode = await main();
} catch (error) {
  console.error(`Error: ${error instanceof Error ? error.message : String(error)}`);
  componentLogger('CLI').fatal({ err: serializeError(error) }, 'pamsched-validate failed');
  process.exitCode = 1;
} finally {
  await flushLogger();
}
