export type ErrorCode = "VALIDATION_ERROR" | "NOT_FOUND" | "STORAGE_ERROR";

export abstract class AppError extends Error {
  abstract readonly code: ErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class ValidationError extends AppError {
  readonly code = "VALIDATION_ERROR";

  constructor(message: string, readonly field?: string) {
    super(message);
  }
}

export class NotFoundError extends AppError {
  readonly code = "NOT_FOUND";

  constructor(readonly resource: string, readonly id: number) {
    super(`${resource} ${id} not found`);
  }
}

export class StorageError extends AppError {
  readonly code = "STORAGE_ERROR";

  constructor(message: string, cause: unknown) {
    super(message, { cause });
  }
}
