/**
 * Supervisor Logger
 *
 * Structured record of supervisor decisions: spawns, exits, child failures,
 * signals and the termination strategy applied. Kept out of the multiplexed
 * stream; a stream subscriber mirrors it to stderr when debug is on.
 */

export type SupervisorLogLevel = 'info' | 'warn' | 'error' | 'debug';

export type SupervisorLogCategory =
  | 'CONFIG'
  | 'SPAWN'
  | 'EXIT'
  | 'CHILD_FAILURE'
  | 'SIGNAL'
  | 'TERMINATION'
  | 'ERROR';

export interface SupervisorLogEntry {
  timestamp: string;
  level: SupervisorLogLevel;
  category: SupervisorLogCategory;
  message: string;
  details?: Record<string, unknown>;
  runId?: string;
  processName?: string;
}

export interface SupervisorLogSubscriber {
  onLog(entry: SupervisorLogEntry): void;
}

export interface SupervisorLogOptions {
  details?: Record<string, unknown>;
  runId?: string;
  processName?: string;
}

export class SupervisorLogger {
  private entries: SupervisorLogEntry[] = [];
  private subscribers: Set<SupervisorLogSubscriber> = new Set();
  private maxEntries: number;

  constructor(options: { maxEntries?: number } = {}) {
    this.maxEntries = options.maxEntries ?? 1000;
  }

  log(
    level: SupervisorLogLevel,
    category: SupervisorLogCategory,
    message: string,
    options: SupervisorLogOptions = {}
  ): SupervisorLogEntry {
    const entry: SupervisorLogEntry = {
      timestamp: new Date().toISOString(),
      level,
      category,
      message,
      details: options.details,
      runId: options.runId,
      processName: options.processName,
    };

    this.entries.push(entry);

    if (this.entries.length > this.maxEntries) {
      this.entries = this.entries.slice(-this.maxEntries);
    }

    for (const subscriber of this.subscribers) {
      try {
        subscriber.onLog(entry);
      } catch (error) {
        // Subscribers that throw are dropped
        this.subscribers.delete(subscriber);
        process.emitWarning(`procmux log subscriber removed: ${error instanceof Error ? error.message : String(error)}`);
      }
    }

    return entry;
  }

  logSpawn(processName: string, pid: number | null, options: { runId?: string; color?: string } = {}): SupervisorLogEntry {
    return this.log('info', 'SPAWN', `Spawned ${processName} (pid ${pid ?? 'pending'})`, {
      details: { pid, color: options.color },
      runId: options.runId,
      processName,
    });
  }

  logExit(
    processName: string,
    code: number | null,
    signal: NodeJS.Signals | null,
    options: { runId?: string; requested?: boolean } = {}
  ): SupervisorLogEntry {
    const failed = code !== 0 && !options.requested;
    return this.log(
      failed ? 'warn' : 'info',
      failed ? 'CHILD_FAILURE' : 'EXIT',
      `${processName} exited (code=${code ?? 'none'}, signal=${signal ?? 'none'})`,
      { details: { code, signal, requested: options.requested ?? false }, runId: options.runId, processName }
    );
  }

  logSignal(signal: string, options: { runId?: string } = {}): SupervisorLogEntry {
    return this.log('info', 'SIGNAL', `Received ${signal}`, {
      details: { signal },
      runId: options.runId,
    });
  }

  logTermination(
    mode: string,
    pids: number[],
    options: { runId?: string; trigger?: string } = {}
  ): SupervisorLogEntry {
    const target = mode === 'whole-group' ? 'process group' : `${pids.length} tracked pid(s)`;
    return this.log('info', 'TERMINATION', `Terminating ${target}`, {
      details: { mode, pids, trigger: options.trigger },
      runId: options.runId,
    });
  }

  logError(error: Error, options: { runId?: string; processName?: string } = {}): SupervisorLogEntry {
    return this.log('error', 'ERROR', error.message, {
      details: { name: error.name },
      ...options,
    });
  }

  // Query methods

  getAll(): SupervisorLogEntry[] {
    return [...this.entries];
  }

  getByRun(runId: string): SupervisorLogEntry[] {
    return this.entries.filter((e) => e.runId === runId);
  }

  getByCategory(category: SupervisorLogCategory): SupervisorLogEntry[] {
    return this.entries.filter((e) => e.category === category);
  }

  getByLevel(level: SupervisorLogLevel): SupervisorLogEntry[] {
    return this.entries.filter((e) => e.level === level);
  }

  clear(): void {
    this.entries = [];
  }

  subscribe(subscriber: SupervisorLogSubscriber): () => void {
    this.subscribers.add(subscriber);
    return () => this.subscribers.delete(subscriber);
  }

  getSubscriberCount(): number {
    return this.subscribers.size;
  }
}

/**
 * Mirror entries to a stream as `[procmux] LEVEL CATEGORY message`
 */
export function createStreamSubscriber(stream: { write(chunk: string): unknown }): SupervisorLogSubscriber {
  return {
    onLog(entry: SupervisorLogEntry): void {
      const who = entry.processName ? ` ${entry.processName}:` : '';
      stream.write(`[procmux] ${entry.level.toUpperCase()} ${entry.category}${who} ${entry.message}\n`);
    },
  };
}

// Singleton instance for global access
let globalLogger: SupervisorLogger | null = null;

export function getSupervisorLogger(): SupervisorLogger {
  if (!globalLogger) {
    globalLogger = new SupervisorLogger();
  }
  return globalLogger;
}

export function resetSupervisorLogger(): void {
  globalLogger = null;
}
