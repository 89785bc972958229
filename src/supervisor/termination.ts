/**
 * Termination propagation
 *
 * Two strategies behind one interface, chosen once per run:
 * - whole-group: signal the supervisor's entire process group (pid 0)
 * - selective:   signal only the pids this supervisor spawned
 *
 * The ShutdownCoordinator owns the one-shot broadcast: handlers are removed
 * before anything is killed, then every worker sees the AbortSignal fire.
 */

import { SignalTermination } from '../errors';
import { getSupervisorLogger, SupervisorLogger } from './supervisor-logger';
import type { KillFn, ShutdownTrigger, SignalSource, TerminationMode } from './types';

export interface TerminationStrategy {
  readonly mode: TerminationMode;
  /** Returns the pids that were signalled (0 for the process group) */
  terminate(signal: NodeJS.Signals): number[];
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}

/**
 * Signal one pid; a pid that is already gone is not an error
 */
export function signalPid(
  kill: KillFn,
  pid: number,
  signal: NodeJS.Signals,
  logger: SupervisorLogger = getSupervisorLogger()
): boolean {
  try {
    kill(pid, signal);
    return true;
  } catch (error) {
    if (isErrnoException(error) && error.code === 'ESRCH') {
      return false;
    }
    logger.log('error', 'TERMINATION', `Failed to send ${signal} to ${pid}`, {
      details: { pid, error: error instanceof Error ? error.message : String(error) },
    });
    return false;
  }
}

export class WholeGroupStrategy implements TerminationStrategy {
  readonly mode = 'whole-group' as const;
  private shielded: Set<NodeJS.Signals> = new Set();

  constructor(
    private readonly kill: KillFn,
    private readonly signals: SignalSource,
    private readonly logger: SupervisorLogger = getSupervisorLogger()
  ) {}

  terminate(signal: NodeJS.Signals): number[] {
    // The supervisor is in its own group; keep it alive to finish its wait
    if (!this.shielded.has(signal)) {
      this.shielded.add(signal);
      this.signals.on(signal, () => undefined);
    }
    return signalPid(this.kill, 0, signal, this.logger) ? [0] : [];
  }
}

export class SelectiveStrategy implements TerminationStrategy {
  readonly mode = 'selective' as const;

  constructor(
    private readonly kill: KillFn,
    private readonly pids: () => Iterable<number>,
    private readonly logger: SupervisorLogger = getSupervisorLogger()
  ) {}

  terminate(signal: NodeJS.Signals): number[] {
    const signalled: number[] = [];
    for (const pid of this.pids()) {
      if (signalPid(this.kill, pid, signal, this.logger)) {
        signalled.push(pid);
      }
    }
    return signalled;
  }
}

export interface StrategyDependencies {
  kill: KillFn;
  signals: SignalSource;
  pids: () => Iterable<number>;
  logger?: SupervisorLogger;
}

export function createTerminationStrategy(
  mode: TerminationMode,
  deps: StrategyDependencies
): TerminationStrategy {
  return mode === 'whole-group'
    ? new WholeGroupStrategy(deps.kill, deps.signals, deps.logger)
    : new SelectiveStrategy(deps.kill, deps.pids, deps.logger);
}

const TRIGGERS: readonly ShutdownTrigger[] = ['SIGINT', 'SIGTERM', 'exit'];

export interface ShutdownCoordinatorOptions {
  strategy: TerminationStrategy;
  signals: SignalSource;
  logger?: SupervisorLogger;
  runId?: string;
}

export class ShutdownCoordinator {
  private strategy: TerminationStrategy;
  private readonly signals: SignalSource;
  private readonly logger: SupervisorLogger;
  private readonly runId?: string;
  private readonly controller = new AbortController();
  private readonly handlers: Map<ShutdownTrigger, () => void> = new Map();
  private triggeredBy: ShutdownTrigger | null = null;

  constructor(options: ShutdownCoordinatorOptions) {
    this.strategy = options.strategy;
    this.signals = options.signals;
    this.logger = options.logger ?? getSupervisorLogger();
    this.runId = options.runId;
  }

  get abortSignal(): AbortSignal {
    return this.controller.signal;
  }

  get trigger(): ShutdownTrigger | null {
    return this.triggeredBy;
  }

  get mode(): TerminationMode {
    return this.strategy.mode;
  }

  install(): void {
    if (this.triggeredBy) {
      return;
    }
    this.disarm();
    for (const trigger of TRIGGERS) {
      const handler = () => {
        this.shutdown(trigger);
      };
      this.handlers.set(trigger, handler);
      this.signals.on(trigger, handler);
    }
  }

  /**
   * Swap in a refined strategy once every child has been spawned
   */
  reinstall(strategy: TerminationStrategy): void {
    if (this.triggeredBy) {
      return;
    }
    this.strategy = strategy;
    this.install();
  }

  /**
   * One-shot: returns false if shutdown already ran
   */
  shutdown(trigger: ShutdownTrigger): boolean {
    if (this.triggeredBy) {
      return false;
    }
    this.triggeredBy = trigger;
    this.disarm();

    if (trigger !== 'exit') {
      this.logger.logSignal(trigger, { runId: this.runId });
    }
    this.controller.abort(trigger === 'exit' ? undefined : new SignalTermination(trigger));

    const signalled = this.strategy.terminate('SIGTERM');
    this.logger.logTermination(this.strategy.mode, signalled, { runId: this.runId, trigger });
    return true;
  }

  private disarm(): void {
    for (const [trigger, handler] of this.handlers) {
      this.signals.removeListener(trigger, handler);
    }
    this.handlers.clear();
  }
}
