#!/usr/bin/env -S node --import tsx
/**
 * benchdiff - command line entry point
 *
 * Usage: benchdiff <baseline> <candidate> [options]
 */

import { run } from './cli/run.js';
import { getLogger } from './logging/logger.js';

async function main(): Promise<void> {
  process.exitCode = await run(process.argv.slice(2), {
    stdout: (line) => process.stdout.write(`${line}\n`),
    stderr: (line) => process.stderr.write(`${line}\n`),
    cwd: process.cwd(),
    env: process.env,
  });
}

main().catch((error: unknown) => {
  getLogger('cli').error({ err: error }, 'benchdiff failed');
  console.error('benchdiff failed:', error);
  process.exitCode = 1;
});
