import { HttpException, HttpStatus, Logger } from '@nestjs/common';

/**
 * Base class for application errors
 */
export class AppError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly metadata?: Record<string, unknown>,
    public readonly retryable = false,
  ) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }

  /**
   * Get a string representation of the error
   */
  toString(): string {
    return `${this.name}(${this.code}): ${this.message}`;
  }

  /**
   * Convert to an object for logging or API responses
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      metadata: this.metadata,
      retryable: this.retryable,
    };
  }
}

/**
 * Bad caller input, rejected before anything is sent to the engine
 */
export class ValidationError extends AppError {
  constructor(
    message: string,
    public readonly field?: string,
    public readonly value?: unknown,
    metadata?: Record<string, unknown>,
  ) {
    super(message, 'VALIDATION_ERROR', { ...metadata, field, value });
  }
}

/**
 * The GMP transport could not be opened or broke mid-exchange
 */
export class ConnectionError extends AppError {
  constructor(message: string, metadata?: Record<string, unknown>) {
    super(message, 'CONNECTION_ERROR', metadata, true);
  }
}

/**
 * A GMP request did not complete within its deadline
 */
export class TimeoutError extends AppError {
  constructor(
    message: string,
    public readonly timeoutMs: number,
    metadata?: Record<string, unknown>,
  ) {
    super(message, 'TIMEOUT', { ...metadata, timeoutMs }, true);
  }
}

/**
 * The engine refused the configured credentials or the session expired
 */
export class AuthError extends AppError {
  constructor(message: string, metadata?: Record<string, unknown>) {
    super(message, 'AUTH_ERROR', metadata);
  }
}

/**
 * The engine answered a command with a non-2xx GMP status
 */
export class RemoteObjectError extends AppError {
  constructor(
    message: string,
    public readonly command?: string,
    public readonly status?: string,
    metadata?: Record<string, unknown>,
  ) {
    super(message, 'REMOTE_OBJECT_ERROR', { ...metadata, command, status }, status !== undefined && status.startsWith('5'));
  }
}

export class AlreadyStartedError extends AppError {
  constructor(
    message: string,
    public readonly taskId: string,
    metadata?: Record<string, unknown>,
  ) {
    super(message, 'ALREADY_STARTED', { ...metadata, taskId });
  }
}

/**
 * The scan has not reached Done yet, so there is no report to fetch
 */
export class NotReadyError extends AppError {
  constructor(
    message: string,
    public readonly scanId: string,
    public readonly status: string,
  ) {
    super(message, 'NOT_READY', { scanId, status });
  }
}

/**
 * A report or response did not have the expected shape
 */
export class ParseError extends AppError {
  constructor(message: string, metadata?: Record<string, unknown>) {
    super(message, 'PARSE_ERROR', metadata);
  }
}

export class NotFoundError extends AppError {
  constructor(
    message: string,
    public readonly resource: string,
    public readonly id: string,
  ) {
    super(message, 'NOT_FOUND', { resource, id });
  }
}

/**
 * Error for configuration issues
 */
export class ConfigurationError extends AppError {
  constructor(
    message: string,
    public readonly configKey?: string,
    metadata?: Record<string, unknown>,
  ) {
    super(message, 'CONFIGURATION_ERROR', { ...metadata, configKey });
  }
}

const HTTP_STATUS_BY_CODE: Record<string, HttpStatus> = {
  VALIDATION_ERROR: HttpStatus.BAD_REQUEST,
  NOT_FOUND: HttpStatus.NOT_FOUND,
  ALREADY_STARTED: HttpStatus.CONFLICT,
  CONNECTION_ERROR: HttpStatus.SERVICE_UNAVAILABLE,
  TIMEOUT: HttpStatus.GATEWAY_TIMEOUT,
  AUTH_ERROR: HttpStatus.BAD_GATEWAY,
  REMOTE_OBJECT_ERROR: HttpStatus.BAD_GATEWAY,
  PARSE_ERROR: HttpStatus.BAD_GATEWAY,
};

/**
 * Extract a message from anything that was thrown
 */
export function describeError(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}

/**
 * Utility class for consistent error handling across the application
 */
export class ErrorHandler {
  private readonly logger: Logger;

  constructor(context: string) {
    this.logger = new Logger(context);
  }

  /**
   * Log and wrap an error if it's not already an AppError
   */
  handleError(error: unknown, defaultMessage = 'An unexpected error occurred', metadata?: Record<string, unknown>): AppError {
    if (error instanceof AppError) {
      this.logger.error(`${error.name}(${error.code}): ${error.message}`, error.stack);
      return error;
    }

    const message = error instanceof Error && error.message ? error.message : defaultMessage;
    const appError = new AppError(message, 'UNKNOWN_ERROR', {
      ...metadata,
      originalError: String(error),
    });

    this.logger.error(`${appError.name}(${appError.code}): ${appError.message}`, appError.stack);
    return appError;
  }

  /**
   * Convert an error into the HTTP exception the controller should throw.
   * Client mistakes are logged at warn, everything else at error.
   */
  toHttpException(error: unknown): HttpException {
    if (error instanceof HttpException) return error;

    const appError = error instanceof AppError ? error : this.handleError(error);
    const status = HTTP_STATUS_BY_CODE[appError.code] ?? HttpStatus.INTERNAL_SERVER_ERROR;

    if (status < HttpStatus.INTERNAL_SERVER_ERROR) {
      this.logger.warn(`${appError.name}(${appError.code}): ${appError.message}`);
    } else if (error instanceof AppError) {
      this.logger.error(`${appError.name}(${appError.code}): ${appError.message}`, appError.stack);
    }

    return new HttpException({ error: appError.message, code: appError.code, retryable: appError.retryable }, status);
  }
}
