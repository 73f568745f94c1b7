/**
 * Structured errors for the dashboard.
 *
 * Metrics errors are recoverable and never leave the sampler; configuration
 * and terminal errors are fatal and carry the process exit code.
 */

export enum ErrorCode {
  CONFIG_NOT_FOUND = 'CONFIG_NOT_FOUND',
  CONFIG_PARSE_ERROR = 'CONFIG_PARSE_ERROR',
  CONFIG_VALIDATION_ERROR = 'CONFIG_VALIDATION_ERROR',
  TERMINAL_ERROR = 'TERMINAL_ERROR',
  METRICS_UNAVAILABLE = 'METRICS_UNAVAILABLE',
  RENDER_ERROR = 'RENDER_ERROR',
  UNKNOWN_ERROR = 'UNKNOWN_ERROR',
}

const EXIT_CODES: Record<ErrorCode, number> = {
  [ErrorCode.CONFIG_NOT_FOUND]: 2,
  [ErrorCode.CONFIG_PARSE_ERROR]: 3,
  [ErrorCode.CONFIG_VALIDATION_ERROR]: 1,
  [ErrorCode.TERMINAL_ERROR]: 4,
  [ErrorCode.METRICS_UNAVAILABLE]: 1,
  [ErrorCode.RENDER_ERROR]: 1,
  [ErrorCode.UNKNOWN_ERROR]: 1,
};

const RECOVERABLE = new Set<ErrorCode>([ErrorCode.METRICS_UNAVAILABLE, ErrorCode.RENDER_ERROR]);

export class DashboardError extends Error {
  public readonly code: ErrorCode;
  public readonly recoverable: boolean;
  public readonly context?: Record<string, unknown>;
  public readonly originalError?: Error;

  constructor(
    message: string,
    code: ErrorCode,
    options: { context?: Record<string, unknown>; originalError?: Error } = {},
  ) {
    super(message);
    this.name = 'DashboardError';
    this.code = code;
    this.recoverable = RECOVERABLE.has(code);
    this.context = options.context;
    this.originalError = options.originalError;

    if (options.originalError?.stack) {
      this.stack = `${this.stack}\n\nCaused by: ${options.originalError.stack}`;
    }
  }

  get exitCode(): number {
    return EXIT_CODES[this.code];
  }

  static from(
    error: unknown,
    code: ErrorCode = ErrorCode.UNKNOWN_ERROR,
    context?: Record<string, unknown>,
  ): DashboardError {
    if (error instanceof DashboardError) return error;

    const originalError = error instanceof Error ? error : new Error(String(error));
    return new DashboardError(originalError.message, code, { originalError, context });
  }
}
