/**
 * Supervisor
 *
 * Launches every definition concurrently, each through its own ChildWorker,
 * and waits for all of them. Termination is coordinated by a
 * ShutdownCoordinator that is armed before the first spawn and refined with
 * the complete pid set after the last one.
 *
 * A child that fails does not stop its siblings; the group ends when every
 * child has exited or a signal arrives.
 */

import { v4 as uuidv4 } from 'uuid';
import { applyOverrides } from '../config/procfile';
import { ChildWorker } from './child-worker';
import { pickColor, withoutColor } from './colors';
import { getSupervisorLogger, SupervisorLogger } from './supervisor-logger';
import { createTerminationStrategy, ShutdownCoordinator } from './termination';
import type {
  Clock,
  EnvironmentOverride,
  KillFn,
  OutputSink,
  ProcessDefinition,
  SignalSource,
  SpawnFn,
  SupervisorRunResult,
  SupervisorState,
  TerminationMode,
} from './types';

export interface SupervisorOptions {
  definitions: readonly ProcessDefinition[];
  overrides?: readonly EnvironmentOverride[];
  mode?: TerminationMode;
  /** Environment the overrides are applied on top of (default: process.env) */
  baseEnv?: NodeJS.ProcessEnv;
  output?: OutputSink;
  signals?: SignalSource;
  kill?: KillFn;
  spawnFn?: SpawnFn;
  shell?: string;
  clock?: Clock;
  color?: boolean;
  killTimeoutMs?: number;
  logger?: SupervisorLogger;
}

/**
 * Width every prefix is padded to: the longest name, 0 for no definitions
 */
export function computePadWidth(definitions: readonly ProcessDefinition[]): number {
  return definitions.reduce((max, d) => Math.max(max, d.name.length), 0);
}

export class Supervisor {
  readonly runId: string;
  private readonly options: SupervisorOptions;
  private readonly logger: SupervisorLogger;
  private readonly state: SupervisorState;
  private coordinator: ShutdownCoordinator | null = null;
  private running = false;

  constructor(options: SupervisorOptions) {
    this.options = options;
    this.runId = uuidv4();
    this.logger = options.logger ?? getSupervisorLogger();
    this.state = {
      processes: [],
      padWidth: computePadWidth(options.definitions),
      launchCounter: 0,
      mode: options.mode ?? 'whole-group',
    };
  }

  getState(): Readonly<SupervisorState> {
    return this.state;
  }

  /**
   * Start a shutdown from outside (same path as SIGINT/SIGTERM)
   */
  stop(trigger: 'SIGINT' | 'SIGTERM' = 'SIGTERM'): boolean {
    return this.coordinator?.shutdown(trigger) ?? false;
  }

  async run(): Promise<SupervisorRunResult> {
    if (this.running) {
      throw new Error('Supervisor.run() may only be called once');
    }
    this.running = true;

    const env = applyOverrides(this.options.baseEnv ?? process.env, this.options.overrides ?? []);
    const signals = this.options.signals ?? process;
    const kill: KillFn = this.options.kill ?? ((pid, signal) => process.kill(pid, signal));

    const coordinator = new ShutdownCoordinator({
      strategy: createTerminationStrategy(this.state.mode, {
        kill,
        signals,
        pids: () => this.trackedPids(),
        logger: this.logger,
      }),
      signals,
      logger: this.logger,
      runId: this.runId,
    });
    this.coordinator = coordinator;
    coordinator.install();

    this.logger.log('info', 'CONFIG', `Starting ${this.options.definitions.length} process(es)`, {
      details: { mode: this.state.mode, padWidth: this.state.padWidth },
      runId: this.runId,
    });

    const workers: ChildWorker[] = [];
    for (const definition of this.options.definitions) {
      const picked = pickColor(this.state.launchCounter++);
      const worker = new ChildWorker({
        definition,
        color: this.options.color === false ? withoutColor(picked) : picked,
        padWidth: this.state.padWidth,
        env,
        output: this.options.output ?? process.stdout,
        abortSignal: coordinator.abortSignal,
        shell: this.options.shell,
        spawnFn: this.options.spawnFn,
        clock: this.options.clock,
        killTimeoutMs: this.options.killTimeoutMs,
        logger: this.logger,
        runId: this.runId,
      });
      workers.push(worker);
      this.state.processes.push(worker.start());
    }

    const spawned = Object.freeze(this.trackedPids());
    coordinator.reinstall(
      createTerminationStrategy(this.state.mode, {
        kill,
        signals,
        pids: () => spawned,
        logger: this.logger,
      })
    );

    const exits = await Promise.all(workers.map((worker) => worker.exited));

    coordinator.shutdown('exit');

    return {
      runId: this.runId,
      processes: this.state.processes,
      exits,
      trigger: coordinator.trigger,
    };
  }

  private trackedPids(): number[] {
    const pids: number[] = [];
    for (const p of this.state.processes) {
      if (p.pid !== null) {
        pids.push(p.pid);
      }
    }
    return pids;
  }
}
