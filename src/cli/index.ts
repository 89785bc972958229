#!/usr/bin/env node
/**
 * procmux - CLI Entry Point
 *
 * Usage:
 *   procmux start           Supervise every process in ./Procfile
 *   procmux exec <cmd...>   Run one command with prefixed output
 *   procmux source          No-op
 */

import { CLI } from './cli-interface';

async function main(): Promise<void> {
  const cli = new CLI({
    cwd: process.cwd(),
    env: process.env,
    stdout: process.stdout,
    stderr: process.stderr,
  });

  const exitCode = await cli.run(process.argv.slice(2));
  process.exit(exitCode);
}

main().catch((err: unknown) => {
  console.error(`Fatal error: ${err instanceof Error ? err.message : String(err)}`);
  process.exit(1);
});
