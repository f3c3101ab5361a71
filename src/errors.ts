/**
 * Error taxonomy shared by services and the HTTP layer.
 *
 * Services throw these; the app's onError handler turns them into JSON
 * responses. Anything else surfaces as a 500.
 */

export class AppError extends Error {
  readonly status: 400 | 404 | 409 | 422 | 500;
  readonly field?: string;
  readonly details?: unknown;

  constructor(
    message: string,
    status: 400 | 404 | 409 | 422 | 500,
    options: { field?: string; details?: unknown } = {}
  ) {
    super(message);
    this.name = new.target.name;
    this.status = status;
    this.field = options.field;
    this.details = options.details;
  }

  toJSON(): { error: string; field?: string; details?: unknown } {
    return {
      error: this.message,
      ...(this.field !== undefined ? { field: this.field } : {}),
      ...(this.details !== undefined ? { details: this.details } : {}),
    };
  }
}

export class ValidationError extends AppError {
  constructor(message: string, field?: string, details?: unknown) {
    super(message, 400, { field, details });
  }
}

// Typed entry rejected by the content provider's lexical check
export class RejectedEntryError extends AppError {
  constructor(message: string, details: unknown) {
    super(message, 422, { field: 'term', details });
  }
}

export class NotFoundError extends AppError {
  constructor(message: string) {
    super(message, 404);
  }
}

export class ConflictError extends AppError {
  constructor(message: string, field?: string) {
    super(message, 409, { field });
  }
}

export class UnsupportedVersionError extends AppError {
  constructor(version: unknown) {
    super('Unsupported schemaVersion', 400, { field: 'schemaVersion', details: { received: version ?? null } });
  }
}

// Malformed record inside an import batch; recovered per record, never surfaced
export class IntegrityError extends AppError {
  constructor(message: string, field?: string) {
    super(message, 400, { field });
  }
}
