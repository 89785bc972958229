export {
  ErrorCategory,
  ErrorCode,
  getErrorCategory,
  getErrorMessage,
  isConfigurationError,
  isUsageError,
} from './error-codes';

export {
  ProcmuxError,
  ConfigurationError,
  UsageError,
  ChildFailure,
  SignalTermination,
  exitCodeFor,
} from './procmux-error';
