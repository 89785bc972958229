/**
 * CLI Interface
 *
 * Commands:
 *   start           supervise every entry of ./Procfile with ./.env applied
 *   exec <cmd...>   run a single command line through one child worker
 *   source          no-op; the package is loaded for its exports only
 *
 * Anything else prints the usage text to stderr and exits 2.
 */

import {
  ConfigurationError,
  ErrorCode,
  exitCodeFor,
  SignalTermination,
  UsageError,
} from '../errors';
import { loadDefinitions, loadOverrides } from '../config/procfile';
import { resolveSettings, type ProcmuxSettings } from '../config/settings';
import { Supervisor } from '../supervisor/supervisor';
import {
  createStreamSubscriber,
  getSupervisorLogger,
  SupervisorLogger,
} from '../supervisor/supervisor-logger';
import type {
  Clock,
  EnvironmentOverride,
  KillFn,
  OutputSink,
  ProcessDefinition,
  SignalSource,
  SpawnFn,
  SupervisorRunResult,
} from '../supervisor/types';

export const USAGE_TEXT = [
  'usage: procmux start | exec <command...> | source',
  '  start reads Procfile and .env from the current directory',
].join('\n');

export const EXEC_NAME_ENV = 'PROCMUX_NAME';

export type CLICommand = 'start' | 'exec' | 'source';

export interface ParsedArgs {
  command: CLICommand;
  /** exec only: the remaining arguments joined with spaces */
  commandLine?: string;
}

export interface CLIDependencies {
  cwd: string;
  env: NodeJS.ProcessEnv;
  stdout: OutputSink;
  stderr: OutputSink;
  signals?: SignalSource;
  kill?: KillFn;
  spawnFn?: SpawnFn;
  clock?: Clock;
  logger?: SupervisorLogger;
}

export function parseArgs(args: string[]): ParsedArgs {
  const [command, ...rest] = args;

  switch (command) {
    case 'start':
    case 'source':
      return { command };
    case 'exec': {
      const commandLine = rest.join(' ').trim();
      if (!commandLine) {
        throw new UsageError(ErrorCode.E202_INVALID_INVOCATION, 'exec requires a command');
      }
      return { command, commandLine };
    }
    case undefined:
      throw new UsageError(ErrorCode.E202_INVALID_INVOCATION, 'no command given');
    default:
      throw new UsageError(ErrorCode.E202_INVALID_INVOCATION, `unknown command: ${command}`);
  }
}

/**
 * 0 after a normal group exit, 128+signo after a signal-driven shutdown
 */
export function exitStatusForRun(result: SupervisorRunResult): number {
  if (result.trigger === 'SIGINT' || result.trigger === 'SIGTERM') {
    return new SignalTermination(result.trigger).exitCode;
  }
  return 0;
}

export class CLI {
  private readonly deps: CLIDependencies;
  private readonly logger: SupervisorLogger;

  constructor(deps: CLIDependencies) {
    this.deps = deps;
    this.logger = deps.logger ?? getSupervisorLogger();
  }

  /**
   * Run a command; resolves to the process exit status
   */
  async run(args: string[]): Promise<number> {
    let unsubscribe: (() => unknown) | undefined;
    try {
      const parsed = parseArgs(args);
      if (parsed.command === 'source') {
        return 0;
      }

      const settings = resolveSettings(this.deps.cwd, this.deps.env);
      if (settings.debug) {
        unsubscribe = this.logger.subscribe(createStreamSubscriber(this.deps.stderr));
      }

      if (parsed.command === 'exec') {
        return await this.exec(parsed.commandLine ?? '', settings);
      }
      return await this.start(settings);
    } catch (error) {
      return this.fail(error);
    } finally {
      unsubscribe?.();
    }
  }

  private async start(settings: ProcmuxSettings): Promise<number> {
    const definitions = loadDefinitions(this.deps.cwd, settings.procfile);
    const overrides = loadOverrides(this.deps.cwd, settings.envFile);

    const result = await this.createSupervisor(definitions, settings, overrides).run();
    return exitStatusForRun(result);
  }

  private async exec(commandLine: string, settings: ProcmuxSettings): Promise<number> {
    const name = this.deps.env[EXEC_NAME_ENV] || commandLine.split(/\s+/)[0];
    const result = await this.createSupervisor([{ name, commandLine }], settings, []).run();

    if (result.trigger === 'SIGINT' || result.trigger === 'SIGTERM') {
      return exitStatusForRun(result);
    }
    const [exit] = result.exits;
    if (exit.code !== null) {
      return exit.code;
    }
    return exit.signal ? new SignalTermination(exit.signal).exitCode : 1;
  }

  private createSupervisor(
    definitions: ProcessDefinition[],
    settings: ProcmuxSettings,
    overrides: EnvironmentOverride[]
  ): Supervisor {
    return new Supervisor({
      definitions,
      overrides,
      mode: settings.killMode,
      baseEnv: this.deps.env,
      output: this.deps.stdout,
      signals: this.deps.signals,
      kill: this.deps.kill,
      spawnFn: this.deps.spawnFn,
      shell: settings.shell,
      clock: this.deps.clock,
      color: settings.color,
      killTimeoutMs: settings.killTimeoutMs,
      logger: this.logger,
    });
  }

  private fail(error: unknown): number {
    const { stderr } = this.deps;

    if (error instanceof UsageError && error.code === ErrorCode.E202_INVALID_INVOCATION) {
      stderr.write(`${USAGE_TEXT}\n`);
    } else if (error instanceof ConfigurationError) {
      stderr.write(`procmux: ${error.message}\n`);
      stderr.write(`${USAGE_TEXT}\n`);
    } else {
      stderr.write(`procmux: ${error instanceof Error ? error.message : String(error)}\n`);
    }

    return exitCodeFor(error);
  }
}
