/**
 * Supervisor Types
 */

import type { ChildProcess, SpawnOptions } from 'child_process';
import type { ChildFailure } from '../errors';

// =============================================================================
// Definitions
// =============================================================================

export interface ProcessDefinition {
  readonly name: string;
  readonly commandLine: string;
}

export interface EnvironmentOverride {
  key: string;
  value: string;
}

// =============================================================================
// Colors
// =============================================================================

export type ColorName = 'cyan' | 'magenta' | 'red' | 'green' | 'yellow';

export interface ColorToken {
  name: ColorName;
  /** ANSI SGR sequence; empty when color output is disabled */
  code: string;
}

// =============================================================================
// Running state
// =============================================================================

export interface RunningProcess {
  definition: ProcessDefinition;
  color: ColorToken;
  /** Set once the OS confirms creation; stays null if the spawn failed */
  pid: number | null;
}

export type TerminationMode = 'whole-group' | 'selective';

export type ShutdownTrigger = 'SIGINT' | 'SIGTERM' | 'exit';

export interface SupervisorState {
  processes: RunningProcess[];
  padWidth: number;
  launchCounter: number;
  mode: TerminationMode;
}

export interface ChildExit {
  definition: ProcessDefinition;
  pid: number | null;
  code: number | null;
  signal: NodeJS.Signals | null;
  /** Set when the child exited non-zero or never started; informational only */
  failure: ChildFailure | null;
}

export interface SupervisorRunResult {
  runId: string;
  processes: RunningProcess[];
  exits: ChildExit[];
  /** What started the group shutdown; 'exit' after a normal run */
  trigger: ShutdownTrigger | null;
}

// =============================================================================
// Injection seams
// =============================================================================

export type SpawnFn = (command: string, args: string[], options: SpawnOptions) => ChildProcess;

export type KillFn = (pid: number, signal: NodeJS.Signals) => void;

/**
 * Where termination signals come from: `process` in production,
 * a plain EventEmitter in tests.
 */
export interface SignalSource {
  on(event: string, listener: () => void): unknown;
  removeListener(event: string, listener: () => void): unknown;
}

export type Clock = () => Date;

export interface OutputSink {
  write(chunk: string): unknown;
}
