/**
 * Error Codes for procmux
 *
 * E1xx: Configuration errors - prevent the supervisor from starting
 * E2xx: Usage errors - caller misuse of the CLI or the line formatter
 * E3xx: Child errors - a supervised process failed (logged, never propagated)
 * E4xx: Signal errors - termination signals converted into an orderly shutdown
 */

/**
 * Error Categories
 */
export enum ErrorCategory {
  CONFIGURATION = 'CONFIGURATION',
  USAGE = 'USAGE',
  CHILD = 'CHILD',
  SIGNAL = 'SIGNAL',
}

export enum ErrorCode {
  // E1xx: Configuration
  E101_PROCFILE_NOT_FOUND = 'E101',
  E102_PROCFILE_UNREADABLE = 'E102',
  E103_ENV_FILE_UNREADABLE = 'E103',
  E104_CONFIGURATION_INVALID = 'E104',

  // E2xx: Usage
  E201_FORMATTER_NOT_CONFIGURED = 'E201',
  E202_INVALID_INVOCATION = 'E202',

  // E3xx: Child
  E301_CHILD_EXITED_NON_ZERO = 'E301',
  E302_CHILD_SPAWN_FAILED = 'E302',

  // E4xx: Signal
  E401_SIGNAL_RECEIVED = 'E401',
}

const ERROR_MESSAGES: Record<string, string> = {
  E101: 'Process definition file not found',
  E102: 'Process definition file could not be read',
  E103: 'Environment override file could not be read',
  E104: 'Configuration is invalid',

  E201: 'No formatting prefix configured for log multiplexer',
  E202: 'Invalid invocation',

  E301: 'Child process exited with non-zero status',
  E302: 'Child process could not be spawned',

  E401: 'Termination signal received',
};

/**
 * Get the error category for an error code
 */
export function getErrorCategory(code: ErrorCode): ErrorCategory {
  const codeStr = code.toString();
  if (codeStr.startsWith('E1')) {
    return ErrorCategory.CONFIGURATION;
  }
  if (codeStr.startsWith('E2')) {
    return ErrorCategory.USAGE;
  }
  if (codeStr.startsWith('E3')) {
    return ErrorCategory.CHILD;
  }
  if (codeStr.startsWith('E4')) {
    return ErrorCategory.SIGNAL;
  }
  throw new Error(`Unknown error code: ${code}`);
}

export function getErrorMessage(code: ErrorCode): string {
  return ERROR_MESSAGES[code.toString()] || `Unknown error: ${code}`;
}

export function isConfigurationError(code: ErrorCode): boolean {
  return getErrorCategory(code) === ErrorCategory.CONFIGURATION;
}

export function isUsageError(code: ErrorCode): boolean {
  return getErrorCategory(code) === ErrorCategory.USAGE;
}
