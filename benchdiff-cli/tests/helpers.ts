/**
 * Shared test helpers: temporary directories and captured CLI output
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import type { CliIO } from '../src/cli/run.js';

/**
 * Create an empty temporary directory
 */
export function createTempDir(): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), 'benchdiff-test-'));
}

export function removeTempDir(dir: string): void {
  fs.rmSync(dir, { recursive: true, force: true });
}

/**
 * Write a file under a directory and return its path
 */
export function writeFixture(dir: string, name: string, content: string): string {
  const filePath = path.join(dir, name);
  fs.mkdirSync(path.dirname(filePath), { recursive: true });
  fs.writeFileSync(filePath, content, 'utf-8');
  return filePath;
}

/**
 * CLI surroundings that record everything written
 */
export interface CapturedIO extends CliIO {
  out: string[];
  err: string[];
  logs: string[];
}

export function captureIO(cwd: string, env: NodeJS.ProcessEnv = {}): CapturedIO {
  const out: string[] = [];
  const err: string[] = [];
  const logs: string[] = [];
  return {
    out,
    err,
    logs,
    stdout: (line) => out.push(line),
    stderr: (line) => err.push(line),
    cwd,
    env,
    logDestination: { write: (msg: string) => logs.push(msg) },
  };
}
