import type { SpaceCheckResult } from './types/space';
import type { TaskStatus } from './types/task';

export type ErrorCode =
  | 'ValidationError'
  | 'OutOfRange'
  | 'InvalidTransition'
  | 'InsufficientSpace'
  | 'NotFound'
  | 'Conflict'
  | 'Internal';

export abstract class AppError extends Error {
  abstract readonly code: ErrorCode;
  abstract readonly statusCode: number;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }

  details(): Record<string, unknown> | undefined {
    return undefined;
  }
}

export class ValidationError extends AppError {
  readonly code: ErrorCode = 'ValidationError';
  readonly statusCode = 400;

  constructor(message: string, private readonly issues: string[] = []) {
    super(message);
  }

  details(): Record<string, unknown> | undefined {
    return this.issues.length > 0 ? { issues: this.issues } : undefined;
  }
}

export class OutOfRangeError extends ValidationError {
  readonly code: ErrorCode = 'OutOfRange';

  constructor(readonly field: string, readonly value: number, readonly min: number, readonly max: number) {
    super(`${field} must be between ${min} and ${max}, got ${value}.`);
  }

  details(): Record<string, unknown> {
    return { field: this.field, value: this.value, min: this.min, max: this.max };
  }
}

export class InvalidTransitionError extends AppError {
  readonly code: ErrorCode = 'InvalidTransition';
  readonly statusCode = 409;

  constructor(readonly taskId: string, readonly current: TaskStatus, readonly requested: TaskStatus | 'progress' | 'retry') {
    super(`Task ${taskId} cannot move from "${current}" to "${requested}".`);
  }

  details(): Record<string, unknown> {
    return { taskId: this.taskId, current: this.current, requested: this.requested };
  }
}

export class InsufficientSpaceError extends AppError {
  readonly code: ErrorCode = 'InsufficientSpace';
  readonly statusCode = 507;

  constructor(readonly check: SpaceCheckResult) {
    super(check.message);
  }

  details(): Record<string, unknown> {
    return { ...this.check };
  }
}

export class NotFoundError extends AppError {
  readonly code: ErrorCode = 'NotFound';
  readonly statusCode = 404;

  constructor(readonly resource: string, readonly id: string) {
    super(`${resource} "${id}" not found.`);
  }
}

export class ConflictError extends AppError {
  readonly code: ErrorCode = 'Conflict';
  readonly statusCode = 409;
}

export class InternalError extends AppError {
  readonly code: ErrorCode = 'Internal';
  readonly statusCode = 500;

  constructor(message = 'Internal server error.') {
    super(message);
  }
}

export function isAppError(error: unknown): error is AppError {
  return error instanceof AppError;
}

export function errorMessage(error: unknown, fallback = 'Unknown error'): string {
  return error instanceof Error ? error.message : fallback;
}

export function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}
