/**
 * Error taxonomy and per-item error tracking for nvim-census
 */

import { Logger, defaultLogger } from './logger.js';

export enum ErrorCode {
  // Configuration errors
  CONFIG_INVALID = 'CONFIG_INVALID',
  THRESHOLD_CONFIG = 'THRESHOLD_CONFIG',
  AUTH_REQUIRED = 'AUTH_REQUIRED',

  // Data errors
  DATA_INVALID = 'DATA_INVALID',
  CHECKPOINT_CORRUPT = 'CHECKPOINT_CORRUPT',

  // API errors
  RATE_LIMITED = 'RATE_LIMITED',
  TRANSIENT_FETCH = 'TRANSIENT_FETCH',
  NOT_FOUND = 'NOT_FOUND',

  // File system errors
  FILE_NOT_FOUND = 'FILE_NOT_FOUND',

  UNKNOWN = 'UNKNOWN'
}

export enum ErrorSeverity {
  LOW = 'low',
  MEDIUM = 'medium',
  HIGH = 'high',
  CRITICAL = 'critical'
}

export interface ErrorContext {
  component?: string;
  operation?: string;
  resource?: string;
  originalError?: string;
  statusCode?: number;
  metadata?: Record<string, unknown>;
}

/**
 * Error with a taxonomy code, context and recovery suggestions
 */
export class CensusError extends Error {
  public readonly code: ErrorCode;
  public readonly severity: ErrorSeverity;
  public readonly context: ErrorContext;
  public readonly timestamp: Date;
  public readonly recoverable: boolean;
  public readonly suggestions: string[];

  constructor(
    message: string,
    code: ErrorCode = ErrorCode.UNKNOWN,
    severity: ErrorSeverity = ErrorSeverity.MEDIUM,
    context: ErrorContext = {},
    recoverable: boolean = true,
    suggestions: string[] = []
  ) {
    super(message);
    this.name = 'CensusError';
    this.code = code;
    this.severity = severity;
    this.context = context;
    this.timestamp = new Date();
    this.recoverable = recoverable;
    this.suggestions = suggestions;
  }

  /**
   * Get formatted error message with context
   */
  getFormattedMessage(): string {
    let message = `[${this.code}] ${this.message}`;

    if (this.context.component) {
      message += ` (Component: ${this.context.component})`;
    }

    if (this.context.operation) {
      message += ` (Operation: ${this.context.operation})`;
    }

    if (this.context.resource) {
      message += ` (Resource: ${this.context.resource})`;
    }

    return message;
  }

  getRecoverySuggestions(): string[] {
    if (this.suggestions.length > 0) {
      return this.suggestions;
    }

    switch (this.code) {
      case ErrorCode.AUTH_REQUIRED:
        return [
          'Set GH_TOKEN or GITHUB_TOKEN in the environment or a .env file',
          'Pass --token on the command line'
        ];

      case ErrorCode.CHECKPOINT_CORRUPT:
        return [
          'Run again with --no-resume to start from a fresh checkpoint',
          'Cached configs are kept and will not be fetched again'
        ];

      case ErrorCode.THRESHOLD_CONFIG:
        return ['Percentage thresholds must be numbers between 0 and 100'];

      case ErrorCode.CONFIG_INVALID:
        return [
          'Check config.yml syntax',
          'Remove the offending key to fall back to its default'
        ];

      case ErrorCode.RATE_LIMITED:
        return [
          'Wait for the rate limit window to reset',
          'Run fetch-all again; it resumes from the checkpoint'
        ];

      default:
        return [
          'Check the error message for specific details',
          'Try running with --verbose for more information'
        ];
    }
  }
}

export function isCensusError(error: unknown, code?: ErrorCode): error is CensusError {
  return error instanceof CensusError && (code === undefined || error.code === code);
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Counts contained per-item failures so a run can report them at the end
 */
export class ErrorTracker {
  private errorCounts: Map<ErrorCode, number> = new Map();
  private lastErrors: Map<ErrorCode, Date> = new Map();
  private logger: Logger;

  constructor(logger: Logger = defaultLogger) {
    this.logger = logger;
  }

  /**
   * Record an error that was contained at an item boundary
   */
  record(error: unknown, resource?: string): CensusError {
    const censusError = this.normalizeError(error, resource);
    this.logError(censusError);

    const count = this.errorCounts.get(censusError.code) || 0;
    this.errorCounts.set(censusError.code, count + 1);
    this.lastErrors.set(censusError.code, censusError.timestamp);
    return censusError;
  }

  private normalizeError(error: unknown, resource?: string): CensusError {
    if (error instanceof CensusError) {
      return error;
    }

    return new CensusError(
      errorMessage(error),
      ErrorCode.UNKNOWN,
      ErrorSeverity.MEDIUM,
      { resource, originalError: error instanceof Error ? error.name : typeof error }
    );
  }

  private logError(error: CensusError): void {
    const message = error.getFormattedMessage();

    switch (error.severity) {
      case ErrorSeverity.CRITICAL:
      case ErrorSeverity.HIGH:
        this.logger.error(message);
        break;
      case ErrorSeverity.MEDIUM:
        this.logger.warn(message);
        break;
      default:
        this.logger.info(message);
    }
  }

  getErrorStats(): {
    totalErrors: number;
    errorsByCode: Record<string, number>;
    recentErrors: Array<{ code: ErrorCode; timestamp: Date; count: number }>;
  } {
    const totalErrors = Array.from(this.errorCounts.values()).reduce((sum, count) => sum + count, 0);

    const errorsByCode: Record<string, number> = {};
    for (const [code, count] of this.errorCounts) {
      errorsByCode[code] = count;
    }

    const recentErrors: Array<{ code: ErrorCode; timestamp: Date; count: number }> = [];
    for (const [code, count] of this.errorCounts) {
      const timestamp = this.lastErrors.get(code);
      if (timestamp) {
        recentErrors.push({ code, timestamp, count });
      }
    }
    recentErrors.sort((a, b) => b.timestamp.getTime() - a.timestamp.getTime());

    return {
      totalErrors,
      errorsByCode,
      recentErrors: recentErrors.slice(0, 10)
    };
  }
}

/**
 * Utility functions for creating specific errors
 */
export const createAuthError = (message: string, context?: ErrorContext): CensusError => {
  return new CensusError(
    message,
    ErrorCode.AUTH_REQUIRED,
    ErrorSeverity.CRITICAL,
    { component: 'auth', ...context },
    false
  );
};

export const createRateLimitError = (message: string, context?: ErrorContext): CensusError => {
  return new CensusError(
    message,
    ErrorCode.RATE_LIMITED,
    ErrorSeverity.HIGH,
    { component: 'api', ...context },
    true
  );
};

export const createTransientFetchError = (message: string, context?: ErrorContext): CensusError => {
  return new CensusError(
    message,
    ErrorCode.TRANSIENT_FETCH,
    ErrorSeverity.MEDIUM,
    { component: 'api', ...context },
    true
  );
};

export const createNotFoundError = (message: string, context?: ErrorContext): CensusError => {
  return new CensusError(
    message,
    ErrorCode.NOT_FOUND,
    ErrorSeverity.LOW,
    { component: 'api', ...context },
    true
  );
};

export const createCheckpointError = (message: string, filePath?: string): CensusError => {
  return new CensusError(
    message,
    ErrorCode.CHECKPOINT_CORRUPT,
    ErrorSeverity.CRITICAL,
    { component: 'checkpoint', resource: filePath },
    false
  );
};

export const createThresholdError = (message: string, context?: ErrorContext): CensusError => {
  return new CensusError(
    message,
    ErrorCode.THRESHOLD_CONFIG,
    ErrorSeverity.CRITICAL,
    { component: 'config', ...context },
    false
  );
};

export const createConfigError = (message: string, context?: ErrorContext): CensusError => {
  return new CensusError(
    message,
    ErrorCode.CONFIG_INVALID,
    ErrorSeverity.HIGH,
    { component: 'config', ...context },
    false
  );
};

export const createDataError = (message: string, context?: ErrorContext): CensusError => {
  return new CensusError(
    message,
    ErrorCode.DATA_INVALID,
    ErrorSeverity.HIGH,
    { component: 'data', ...context },
    false,
    ['Check YAML syntax in data files', 'Ensure all required fields are present']
  );
};

export const createFileError = (message: string, filePath?: string): CensusError => {
  return new CensusError(
    message,
    ErrorCode.FILE_NOT_FOUND,
    ErrorSeverity.MEDIUM,
    { component: 'filesystem', resource: filePath },
    false,
    ['Check file exists', 'Verify file path is correct']
  );
};
