// src/lib/errors.ts

import type { ValidationKind, Violation } from "../types/import.type";

export abstract class SeatingError extends Error {
  abstract readonly status: number;
  abstract readonly code: string;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }

  toJSON(): Record<string, unknown> {
    return { code: this.code, message: this.message };
  }
}

export class ValidationError extends SeatingError {
  readonly status = 422;
  readonly code = "VALIDATION_FAILED";

  constructor(
    readonly kind: ValidationKind,
    readonly violations: Violation[],
    message = `Validation failed: ${kind}`,
  ) {
    super(message);
  }

  toJSON(): Record<string, unknown> {
    return {
      code: this.code,
      message: this.message,
      kind: this.kind,
      violations: this.violations,
    };
  }
}

export class NotFoundError extends SeatingError {
  readonly status = 404;
  readonly code: string = "NOT_FOUND";

  constructor(
    readonly resource: string,
    readonly id?: string,
  ) {
    super(id ? `${resource} not found: ${id}` : `${resource} not found`);
  }
}

export class TokenNotFoundError extends NotFoundError {
  readonly code = "TOKEN_NOT_FOUND";

  constructor() {
    super("Lookup token");
  }
}

export class ConflictError extends SeatingError {
  readonly status = 409;
  readonly code = "CONFLICT";
}

export class StorageUnavailableError extends SeatingError {
  readonly status = 503;
  readonly code = "STORAGE_UNAVAILABLE";

  constructor(message: string, readonly cause?: unknown) {
    super(message);
  }
}

export class OperationCancelledError extends SeatingError {
  readonly status = 499;
  readonly code = "CANCELLED";
}

export const assertNotCancelled = (
  signal: AbortSignal | undefined,
  stage: string,
): void => {
  if (signal?.aborted) {
    throw new OperationCancelledError(`Operation cancelled ${stage}`);
  }
};

export class UnauthorizedError extends SeatingError {
  readonly status = 401;
  readonly code = "UNAUTHORIZED";
}

export class RateLimitedError extends SeatingError {
  readonly status = 429;
  readonly code = "RATE_LIMITED";

  constructor() {
    super("Rate limit exceeded. Please try again later.");
  }
}

export class BadRequestError extends SeatingError {
  readonly status = 400;
  readonly code = "BAD_REQUEST";
}

// Subscriber-local delivery failure; never thrown to writers
export class TransportError extends Error {
  constructor(
    readonly subscriberId: string,
    readonly cause: unknown,
  ) {
    super(`Delivery to ${subscriberId} failed`);
    this.name = "TransportError";
  }
}
