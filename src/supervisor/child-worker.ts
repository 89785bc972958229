/**
 * Child Worker
 *
 * One per process definition. Spawns the command line under the shell with
 * the resolved environment, attaches a LogMultiplexer to stdout+stderr and
 * ties both to the supervisor's AbortSignal: cancellation kills the child
 * and stops its multiplexer.
 */

import { spawn, ChildProcess } from 'child_process';
import type { Readable } from 'stream';
import { ChildFailure } from '../errors';
import { formatPrefix, LogMultiplexer } from './log-multiplexer';
import { getSupervisorLogger, SupervisorLogger } from './supervisor-logger';
import type {
  ChildExit,
  Clock,
  ColorToken,
  OutputSink,
  ProcessDefinition,
  RunningProcess,
  SpawnFn,
} from './types';

export const DEFAULT_SHELL = '/bin/sh';

export interface ChildWorkerOptions {
  definition: ProcessDefinition;
  color: ColorToken;
  padWidth: number;
  env: NodeJS.ProcessEnv;
  output: OutputSink;
  abortSignal: AbortSignal;
  shell?: string;
  spawnFn?: SpawnFn;
  clock?: Clock;
  /** SIGKILL escalation after terminate(); 0 disables it */
  killTimeoutMs?: number;
  logger?: SupervisorLogger;
  runId?: string;
}

function isReadable(stream: Readable | null): stream is Readable {
  return stream !== null;
}

export class ChildWorker {
  readonly exited: Promise<ChildExit>;
  readonly running: RunningProcess;

  private readonly options: ChildWorkerOptions;
  private readonly spawnFn: SpawnFn;
  private readonly logger: SupervisorLogger;
  private readonly resolveExit: (exit: ChildExit) => void;
  private readonly onAbort = () => {
    this.terminate('SIGTERM');
  };
  private child: ChildProcess | null = null;
  private multiplexer: LogMultiplexer | null = null;
  private failure: ChildFailure | null = null;
  private killTimer: NodeJS.Timeout | undefined;
  private readonly sentSignals: Set<NodeJS.Signals> = new Set();
  private terminated = false;
  private settled = false;

  constructor(options: ChildWorkerOptions) {
    this.options = options;
    this.spawnFn = options.spawnFn ?? spawn;
    this.logger = options.logger ?? getSupervisorLogger();
    this.running = { definition: options.definition, color: options.color, pid: null };

    let resolveExit: (exit: ChildExit) => void = () => undefined;
    this.exited = new Promise<ChildExit>((resolve) => {
      resolveExit = resolve;
    });
    this.resolveExit = resolveExit;
  }

  get name(): string {
    return this.options.definition.name;
  }

  start(): RunningProcess {
    if (this.child || this.settled) {
      return this.running;
    }

    const { definition, color, padWidth, output, clock } = this.options;
    this.multiplexer = new LogMultiplexer({
      prefix: formatPrefix(definition.name, padWidth),
      color,
      output,
      clock,
    });

    let child: ChildProcess;
    try {
      child = this.spawnFn(this.options.shell ?? DEFAULT_SHELL, ['-c', definition.commandLine], {
        env: this.options.env,
        stdio: ['ignore', 'pipe', 'pipe'],
      });
    } catch (error) {
      this.failSpawn(error instanceof Error ? error : new Error(String(error)));
      return this.running;
    }

    this.child = child;
    this.running.pid = child.pid ?? null;
    this.logger.logSpawn(definition.name, this.running.pid, {
      runId: this.options.runId,
      color: color.name,
    });

    const drained = this.multiplexer.multiplex(...[child.stdout, child.stderr].filter(isReadable));

    child.on('error', (error: Error) => {
      // Spawn failures never get a pid
      if (this.running.pid === null) {
        this.failSpawn(error);
      } else {
        this.logger.logError(error, { runId: this.options.runId, processName: definition.name });
      }
    });

    child.once('close', (code: number | null, signal: NodeJS.Signals | null) => {
      void drained.then(
        () => this.settle(code, signal),
        (error: unknown) => {
          this.logger.logError(error instanceof Error ? error : new Error(String(error)), {
            runId: this.options.runId,
            processName: definition.name,
          });
          this.settle(code, signal);
        }
      );
    });

    if (this.options.abortSignal.aborted) {
      this.onAbort();
    } else {
      this.options.abortSignal.addEventListener('abort', this.onAbort, { once: true });
    }

    return this.running;
  }

  /**
   * Kill the child and stop its multiplexer. One-shot.
   */
  terminate(signal: NodeJS.Signals = 'SIGTERM'): void {
    if (this.terminated || this.settled) {
      return;
    }
    this.terminated = true;

    const child = this.child;
    if (child && child.exitCode === null && child.signalCode === null) {
      this.sentSignals.add(signal);
      child.kill(signal);

      const timeoutMs = this.options.killTimeoutMs ?? 0;
      if (timeoutMs > 0) {
        this.killTimer = setTimeout(() => {
          if (!this.settled) {
            this.sentSignals.add('SIGKILL');
            child.kill('SIGKILL');
          }
        }, timeoutMs);
        this.killTimer.unref();
      }
    }

    this.multiplexer?.stop();
  }

  getFailure(): ChildFailure | null {
    return this.failure;
  }

  private failSpawn(error: Error): void {
    this.failure = new ChildFailure(this.name, null, null, error);
    this.logger.logError(this.failure, { runId: this.options.runId, processName: this.name });
    this.multiplexer?.stop();
    this.settle(null, null);
  }

  private settle(code: number | null, signal: NodeJS.Signals | null): void {
    if (this.settled) {
      return;
    }
    this.settled = true;
    clearTimeout(this.killTimer);
    this.options.abortSignal.removeEventListener('abort', this.onAbort);

    if (!this.failure) {
      // Ending on a signal this worker sent is an orderly stop
      const requested = signal !== null && this.sentSignals.has(signal);
      this.logger.logExit(this.name, code, signal, { runId: this.options.runId, requested });
      if (code !== 0 && !requested) {
        this.failure = new ChildFailure(this.name, code, signal);
      }
    }

    this.resolveExit({
      definition: this.options.definition,
      pid: this.running.pid,
      code,
      signal,
      failure: this.failure,
    });
  }
}
