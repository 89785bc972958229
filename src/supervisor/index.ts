/**
 * Supervisor Exports
 */

export * from './types';

export { COLOR_TABLE, RESET, pickColor, withoutColor } from './colors';

export {
  LogMultiplexer,
  formatLogLine,
  formatPrefix,
  formatTimestamp,
  escapeLine,
  type LogMultiplexerOptions,
  type MultiplexResult,
} from './log-multiplexer';

export { ChildWorker, DEFAULT_SHELL, type ChildWorkerOptions } from './child-worker';

export {
  ShutdownCoordinator,
  WholeGroupStrategy,
  SelectiveStrategy,
  createTerminationStrategy,
  signalPid,
  type TerminationStrategy,
  type ShutdownCoordinatorOptions,
  type StrategyDependencies,
} from './termination';

export { Supervisor, computePadWidth, type SupervisorOptions } from './supervisor';

export {
  SupervisorLogger,
  createStreamSubscriber,
  getSupervisorLogger,
  resetSupervisorLogger,
  type SupervisorLogEntry,
  type SupervisorLogLevel,
  type SupervisorLogCategory,
  type SupervisorLogSubscriber,
} from './supervisor-logger';
