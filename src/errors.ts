export type ErrorCode =
  | "empty_field"
  | "too_few_words"
  | "too_many_words"
  | "invalid_status"
  | "invalid_date_format"
  | "past_deadline"
  | "duplicate_name"
  | "capacity_exceeded"
  | "not_found"
  | "invalid_id"
  | "storage";

export type EntityKind = "project" | "task";

/** Base class for every error the services raise on purpose. */
export abstract class AppError extends Error {
  abstract readonly code: ErrorCode;
}

export class EmptyFieldError extends AppError {
  readonly code = "empty_field";
  readonly field: string;

  constructor(field: string) {
    super(`${capitalize(field)} cannot be empty.`);
    this.name = "EmptyFieldError";
    this.field = field;
  }
}

export class TooFewWordsError extends AppError {
  readonly code = "too_few_words";
  readonly field: string;
  readonly min: number;
  readonly actual: number;

  constructor(field: string, min: number, actual: number) {
    super(
      `${capitalize(field)} must contain at least ${min} ${plural(min, "word")}. Current: ${actual}.`,
    );
    this.name = "TooFewWordsError";
    this.field = field;
    this.min = min;
    this.actual = actual;
  }
}

export class TooManyWordsError extends AppError {
  readonly code = "too_many_words";
  readonly field: string;
  readonly max: number;
  readonly actual: number;

  constructor(field: string, max: number, actual: number) {
    super(
      `${capitalize(field)} cannot exceed ${max} ${plural(max, "word")}. Current: ${actual}.`,
    );
    this.name = "TooManyWordsError";
    this.field = field;
    this.max = max;
    this.actual = actual;
  }
}

export class InvalidStatusError extends AppError {
  readonly code = "invalid_status";
  readonly status: string;

  constructor(status: string, allowed: readonly string[]) {
    super(`Invalid status: '${status}'. Valid statuses are: ${allowed.join(", ")}.`);
    this.name = "InvalidStatusError";
    this.status = status;
  }
}

export class InvalidDateFormatError extends AppError {
  readonly code = "invalid_date_format";
  readonly input: string;

  constructor(input: string) {
    super(`Invalid date format: '${input}'. Expected YYYY-MM-DD (e.g. 2030-12-31).`);
    this.name = "InvalidDateFormatError";
    this.input = input;
  }
}

export class PastDeadlineError extends AppError {
  readonly code = "past_deadline";
  readonly deadline: string;

  constructor(deadline: string, today: string) {
    super(`Deadline ${deadline} is in the past (today is ${today}).`);
    this.name = "PastDeadlineError";
    this.deadline = deadline;
  }
}

export class DuplicateNameError extends AppError {
  readonly code = "duplicate_name";
  readonly projectName: string;

  constructor(name: string) {
    super(`A project named '${name}' already exists.`);
    this.name = "DuplicateNameError";
    this.projectName = name;
  }
}

export class CapacityExceededError extends AppError {
  readonly code = "capacity_exceeded";
  readonly limit: number;

  constructor(kind: EntityKind, limit: number) {
    super(
      kind === "project"
        ? `Cannot create more than ${limit} ${plural(limit, "project")}.`
        : `Cannot create more than ${limit} ${plural(limit, "task")} per project.`,
    );
    this.name = "CapacityExceededError";
    this.limit = limit;
  }
}

export class NotFoundError extends AppError {
  readonly code = "not_found";
  readonly kind: EntityKind;
  readonly id: number;

  constructor(kind: EntityKind, id: number) {
    super(`${capitalize(kind)} ${id} not found.`);
    this.name = "NotFoundError";
    this.kind = kind;
    this.id = id;
  }
}

export class InvalidIdError extends AppError {
  readonly code = "invalid_id";
  readonly kind: EntityKind;

  constructor(kind: EntityKind, value: unknown) {
    super(`${capitalize(kind)} ID must be a positive integer, got '${String(value)}'.`);
    this.name = "InvalidIdError";
    this.kind = kind;
  }
}

export class StorageError extends AppError {
  readonly code = "storage";

  constructor(operation: string, cause?: unknown) {
    super(`Storage operation failed: ${operation}.`, { cause });
    this.name = "StorageError";
  }
}

const GENERIC_MESSAGE = "An internal error occurred. Please try again.";

/**
 * Message that is safe to show to a user. Storage failures and anything that
 * is not an AppError are replaced with a generic message.
 */
export function sanitizeError(err: unknown): string {
  if (err instanceof AppError && !(err instanceof StorageError)) {
    return err.message;
  }
  return GENERIC_MESSAGE;
}

function capitalize(s: string): string {
  return s.charAt(0).toUpperCase() + s.slice(1);
}

function plural(n: number, word: string): string {
  return n === 1 ? word : `${word}s`;
}
