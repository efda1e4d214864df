/**
 * Error handling module for the ingestion engine
 * Defines error codes, the IngestionError type and normalisation helpers
 */

/**
 * Standard error codes
 */
export enum ErrorCode {
  // Session-fatal
  AUTH_EXPIRED = "AUTH_EXPIRED",
  NETWORK_UNAVAILABLE = "NETWORK_UNAVAILABLE",

  // Absorbed by the engine
  RATE_LIMITED = "RATE_LIMITED",
  PAGINATION_GLITCH = "PAGINATION_GLITCH",
  UNUSABLE_RECORD = "UNUSABLE_RECORD",

  // Rejected before any network activity
  MALFORMED_INPUT = "MALFORMED_INPUT",

  // Control flow
  CANCELLED = "CANCELLED",

  // System Errors
  FILE_SYSTEM_ERROR = "FILE_SYSTEM_ERROR",
  UNKNOWN_ERROR = "UNKNOWN_ERROR",
}

/**
 * Context information for errors
 */
export interface ErrorContext {
  operation?: string;
  query?: string;
  username?: string;
  tweetId?: string;
  link?: string;
  attempts?: number;
  statusCode?: number;
  checkpointPath?: string;
  count?: number;
  outputPath?: string;
  [key: string]: unknown;
}

export interface IngestionErrorOptions {
  retryable?: boolean;
  context?: ErrorContext;
  originalError?: Error;
  statusCode?: number;
}

/**
 * Custom error class for ingestion errors
 */
export class IngestionError extends Error {
  public readonly code: ErrorCode;
  public readonly retryable: boolean;
  public readonly context: ErrorContext;
  public readonly timestamp: Date;
  public readonly originalError?: Error;
  public readonly statusCode?: number;

  constructor(code: ErrorCode, message: string, options: IngestionErrorOptions = {}) {
    super(message);
    this.name = "IngestionError";
    this.code = code;
    this.retryable = options.retryable ?? false;
    this.context = { ...(options.context || {}) };
    this.timestamp = new Date();
    this.originalError = options.originalError;
    this.statusCode = options.statusCode;

    // Capture stack trace
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, IngestionError);
    }
  }

  /**
   * Attach resume information (checkpoint path, count) before the error
   * leaves the engine.
   */
  public withContext(extra: ErrorContext): this {
    Object.assign(this.context, extra);
    return this;
  }

  /**
   * Session-fatal errors propagate to the caller; everything else is
   * absorbed by the engine.
   */
  public isSessionFatal(): boolean {
    return this.code === ErrorCode.AUTH_EXPIRED || this.code === ErrorCode.NETWORK_UNAVAILABLE;
  }

  /**
   * Get a user-friendly error message
   */
  public getUserMessage(): string {
    switch (this.code) {
      case ErrorCode.AUTH_EXPIRED:
        return "Credentials expired. Refresh your cookies and resume the session.";
      case ErrorCode.NETWORK_UNAVAILABLE:
        return "Network unavailable after repeated retries. Progress was saved; resume when the connection is back.";
      case ErrorCode.RATE_LIMITED:
        return "Rate limit hit. Waiting before retrying...";
      case ErrorCode.CANCELLED:
        return "Stopped by user. Progress was saved.";
      case ErrorCode.MALFORMED_INPUT:
        return `Invalid input: ${this.message}`;
      default:
        return this.message;
    }
  }

  /**
   * Convert error to JSON object
   */
  public toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      retryable: this.retryable,
      context: this.context,
      timestamp: this.timestamp,
      stack: this.stack,
      originalError: this.originalError
        ? {
            name: this.originalError.name,
            message: this.originalError.message,
            stack: this.originalError.stack,
          }
        : undefined,
    };
  }

  /**
   * Create IngestionError from native Error
   */
  public static fromError(
    error: Error,
    code: ErrorCode = ErrorCode.UNKNOWN_ERROR,
    context?: ErrorContext
  ): IngestionError {
    return new IngestionError(code, error.message, {
      originalError: error,
      context,
    });
  }

  public static isCancellation(error: unknown): error is IngestionError {
    return error instanceof IngestionError && error.code === ErrorCode.CANCELLED;
  }

  public static isSessionFatal(error: unknown): error is IngestionError {
    return error instanceof IngestionError && error.isSessionFatal();
  }
}

/**
 * Factory for creating common errors
 */
export const IngestionErrors = {
  authExpired: (message: string, context?: ErrorContext, originalError?: Error) =>
    new IngestionError(ErrorCode.AUTH_EXPIRED, message, {
      retryable: false,
      context,
      originalError,
    }),

  networkUnavailable: (message: string, context?: ErrorContext, originalError?: Error) =>
    new IngestionError(ErrorCode.NETWORK_UNAVAILABLE, message, {
      retryable: true,
      context,
      originalError,
    }),

  rateLimited: (message: string = "Rate limit exceeded", context?: ErrorContext) =>
    new IngestionError(ErrorCode.RATE_LIMITED, message, {
      retryable: true,
      context,
    }),

  paginationGlitch: (message: string, context?: ErrorContext) =>
    new IngestionError(ErrorCode.PAGINATION_GLITCH, message, {
      retryable: true,
      context,
    }),

  malformedInput: (message: string, context?: ErrorContext) =>
    new IngestionError(ErrorCode.MALFORMED_INPUT, message, {
      retryable: false,
      context,
    }),

  unusableRecord: (message: string, context?: ErrorContext) =>
    new IngestionError(ErrorCode.UNUSABLE_RECORD, message, {
      retryable: false,
      context,
    }),

  cancelled: (message: string = "Stopped by user", context?: ErrorContext) =>
    new IngestionError(ErrorCode.CANCELLED, message, {
      retryable: false,
      context,
    }),

  fileSystem: (message: string, context?: ErrorContext, originalError?: Error) =>
    new IngestionError(ErrorCode.FILE_SYSTEM_ERROR, message, {
      retryable: false,
      context,
      originalError,
    }),

  unknown: (message: string, context?: ErrorContext, originalError?: Error) =>
    new IngestionError(ErrorCode.UNKNOWN_ERROR, message, {
      retryable: false,
      context,
      originalError,
    }),
};

/**
 * Normalises any thrown value into an IngestionError.
 */
export class ErrorClassifier {
  static classify(error: unknown): IngestionError {
    if (error instanceof IngestionError) {
      return error;
    }
    if (error instanceof Error) {
      return IngestionError.fromError(error);
    }
    if (typeof error === "string") {
      return new IngestionError(ErrorCode.UNKNOWN_ERROR, error);
    }
    return new IngestionError(ErrorCode.UNKNOWN_ERROR, "An unknown error occurred", {
      context: { raw: error },
    });
  }

  static messageOf(error: unknown): string {
    if (error instanceof Error) return error.message;
    if (typeof error === "string") return error;
    try {
      return JSON.stringify(error) ?? String(error);
    } catch {
      return String(error);
    }
  }
}
