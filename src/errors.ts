/**
 * Error taxonomy shared by both services.
 *
 * Client faults (400/404) carry a message safe to return to callers.
 * Infrastructure faults (500) are logged with their cause and reported
 * to callers with a generic message.
 */
export type ErrorCode =
  | 'VALIDATION_ERROR'
  | 'NOT_FOUND'
  | 'ALLOCATOR_UNAVAILABLE'
  | 'STORE_UNAVAILABLE'
  | 'CACHE_UNAVAILABLE'
  | 'DUPLICATE_SHORT_CODE'
  | 'ALLOCATION_FAILED'
  | 'PERSISTENCE_FAILED';

export abstract class AppError extends Error {
  abstract readonly code: ErrorCode;
  abstract readonly statusCode: number;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class ValidationError extends AppError {
  readonly code = 'VALIDATION_ERROR';
  readonly statusCode = 400;
}

export class NotFoundError extends AppError {
  readonly code = 'NOT_FOUND';
  readonly statusCode = 404;

  constructor(readonly shortCode: string) {
    super('short code not found');
  }
}

export class AllocatorUnavailableError extends AppError {
  readonly code = 'ALLOCATOR_UNAVAILABLE';
  readonly statusCode = 500;
}

export class StoreUnavailableError extends AppError {
  readonly code = 'STORE_UNAVAILABLE';
  readonly statusCode = 500;
}

export class CacheUnavailableError extends AppError {
  readonly code = 'CACHE_UNAVAILABLE';
  readonly statusCode = 500;
}

export class DuplicateShortCodeError extends AppError {
  readonly code = 'DUPLICATE_SHORT_CODE';
  readonly statusCode = 500;

  constructor(readonly shortCode: string, options?: { cause?: unknown }) {
    super(`short code already exists: ${shortCode}`, options);
  }
}

export class AllocationFailedError extends AppError {
  readonly code = 'ALLOCATION_FAILED';
  readonly statusCode = 500;
}

export class PersistenceFailedError extends AppError {
  readonly code = 'PERSISTENCE_FAILED';
  readonly statusCode = 500;
}

export function isClientError(error: unknown): boolean {
  return error instanceof AppError && error.statusCode < 500;
}
