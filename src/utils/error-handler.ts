import { logger } from './logger';
import { ErrorCode } from '../types/snapshot';

export class AppError extends Error {
  // Diagnostic screenshot taken while this error was unwinding, if any
  public screenshotPath: string | null = null;

  constructor(
    message: string,
    public code: ErrorCode,
    public statusCode: number = 500
  ) {
    super(message);
    this.name = 'AppError';
    Error.captureStackTrace(this, this.constructor);
  }
}

export class CredentialRetrievalError extends AppError {
  constructor(message: string) {
    super(message, 'CREDENTIALS_UNAVAILABLE');
    this.name = 'CredentialRetrievalError';
  }
}

export class LoginFailedError extends AppError {
  constructor(message: string) {
    super(message, 'LOGIN_FAILED');
    this.name = 'LoginFailedError';
  }
}

export class NavigationTimeoutError extends AppError {
  constructor(message: string) {
    super(message, 'NAVIGATION_TIMEOUT', 504);
    this.name = 'NavigationTimeoutError';
  }
}

export class TableNotFoundError extends AppError {
  constructor(message: string) {
    super(message, 'TABLE_NOT_FOUND');
    this.name = 'TableNotFoundError';
  }
}

export class TableNotPopulatedError extends AppError {
  constructor(message: string) {
    super(message, 'TABLE_NOT_POPULATED');
    this.name = 'TableNotPopulatedError';
  }
}

export class EmptySnapshotError extends AppError {
  constructor(message: string) {
    super(message, 'EMPTY_SNAPSHOT');
    this.name = 'EmptySnapshotError';
  }
}

export class PersistenceError extends AppError {
  constructor(
    message: string,
    public readonly procedure: string,
    public readonly locationName: string | null = null,
    public readonly dtSnapshot: Date | null = null
  ) {
    super(message, 'PERSISTENCE_FAILED');
    this.name = 'PersistenceError';
  }
}

export class RunInProgressError extends AppError {
  constructor(public readonly heldBy: number | null = null) {
    super('Another snapshot run is in progress', 'RUN_IN_PROGRESS', 409);
    this.name = 'RunInProgressError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function toAppError(error: unknown): AppError {
  if (error instanceof AppError) {
    return error;
  }
  const appError = new AppError(error instanceof Error ? error.message : 'Unknown error', 'UNKNOWN_ERROR');
  if (error instanceof Error && error.stack) {
    appError.stack = error.stack;
  }
  return appError;
}

export function handleError(error: unknown, context: string): AppError {
  if (error instanceof AppError) {
    logger.error(`[${context}] ${error.code}: ${error.message}`);
    return error;
  }

  logger.error(`[${context}] Unexpected error:`, error);
  return toAppError(error);
}
