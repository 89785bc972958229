/**
 * procmux - library entry point
 */

export * from './errors';
export * from './config';
export * from './supervisor';
export { CLI, parseArgs, exitStatusForRun, USAGE_TEXT, type CLIDependencies, type ParsedArgs } from './cli/cli-interface';
