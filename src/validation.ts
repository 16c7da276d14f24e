// Field validators shared by the services, plus the Zod body schemas used by
// the HTTP routes. Validators throw on the first violated rule.

import { z } from "zod";
import { STATUSES, type Status } from "./tasks/types.js";
import { formatLocalDate, parseCalendarDate } from "./dates/calendar.js";
import {
  EmptyFieldError,
  InvalidDateFormatError,
  InvalidIdError,
  InvalidStatusError,
  PastDeadlineError,
  TooFewWordsError,
  TooManyWordsError,
  type EntityKind,
} from "./errors.js";

export interface WordRange {
  min: number;
  max: number;
}

export interface WordLimits {
  project_name: WordRange;
  project_description: WordRange;
  task_title: WordRange;
  task_description: WordRange;
}

export const DEFAULT_WORD_LIMITS: WordLimits = {
  project_name: { min: 1, max: 30 },
  project_description: { min: 0, max: 150 },
  task_title: { min: 1, max: 30 },
  task_description: { min: 1, max: 150 },
};

export function countWords(text: string): number {
  const trimmed = text.trim();
  return trimmed.length === 0 ? 0 : trimmed.split(/\s+/).length;
}

/** Single-line fields: newlines become spaces. */
export function sanitizeLine(text: string): string {
  return text.replace(/[\r\n]+/g, " ").trim();
}

/**
 * Case-insensitive comparison key. Used for project name uniqueness and for
 * search, by both stores, so that non-ASCII letters fold the same way.
 */
export function foldCase(text: string): string {
  return text.toLowerCase();
}

/**
 * Check the word count of `text` against [min, max] and return it trimmed.
 * A blank text is an EmptyFieldError unless the field is optional (min 0).
 */
export function validateWordCount(text: string, min: number, max: number, field: string): string {
  const trimmed = text.trim();
  if (trimmed.length === 0) {
    if (min > 0) {
      throw new EmptyFieldError(field);
    }
    return trimmed;
  }
  const words = countWords(trimmed);
  if (words < min) {
    throw new TooFewWordsError(field, min, words);
  }
  if (words > max) {
    throw new TooManyWordsError(field, max, words);
  }
  return trimmed;
}

export function validateProjectName(
  name: string,
  limits: WordLimits = DEFAULT_WORD_LIMITS,
): string {
  const { min, max } = limits.project_name;
  return validateWordCount(sanitizeLine(name), min, max, "project name");
}

export function validateProjectDescription(
  description: string | null | undefined,
  limits: WordLimits = DEFAULT_WORD_LIMITS,
): string {
  const { min, max } = limits.project_description;
  return validateWordCount(description ?? "", min, max, "project description");
}

export function validateTaskTitle(title: string, limits: WordLimits = DEFAULT_WORD_LIMITS): string {
  const { min, max } = limits.task_title;
  return validateWordCount(sanitizeLine(title), min, max, "task title");
}

export function validateTaskDescription(
  description: string,
  limits: WordLimits = DEFAULT_WORD_LIMITS,
): string {
  const { min, max } = limits.task_description;
  return validateWordCount(description, min, max, "task description");
}

export function validateStatus(status: string, allowed: readonly Status[] = STATUSES): Status {
  const match = allowed.find((s) => s === status);
  if (!match) {
    throw new InvalidStatusError(status, allowed);
  }
  return match;
}

export interface DeadlineOptions {
  /** Reject dates before `today`. */
  strict?: boolean;
  /** Today's date as YYYY-MM-DD; defaults to the local date. */
  today?: string;
}

/**
 * Parse a YYYY-MM-DD deadline. Blank input means "no deadline" and returns
 * null. With `strict`, a date before `today` is rejected.
 */
export function validateDeadline(
  input: string | null | undefined,
  { strict = false, today }: DeadlineOptions = {},
): string | null {
  if (input === null || input === undefined || input.trim() === "") {
    return null;
  }
  const trimmed = input.trim();
  const date = parseCalendarDate(trimmed);
  if (!date) {
    throw new InvalidDateFormatError(trimmed);
  }
  if (strict) {
    const reference = today ?? formatLocalDate(new Date());
    if (date < reference) {
      throw new PastDeadlineError(date, reference);
    }
  }
  return date;
}

export function validateId(id: number | string, kind: EntityKind): number {
  const n = typeof id === "number" ? id : /^\s*\d+\s*$/.test(id) ? Number(id) : NaN;
  if (!Number.isSafeInteger(n) || n < 1) {
    throw new InvalidIdError(kind, id);
  }
  return n;
}

// --- Request body schemas (HTTP) ---
// Shape only: word counts, statuses and dates are checked by the services so
// that every surface reports the same typed errors.

export const projectCreateSchema = z
  .object({
    name: z.string({ required_error: "name is required" }),
    description: z.string().nullable().optional(),
  })
  .strict();

export const projectUpdateSchema = z
  .object({
    name: z.string().optional(),
    description: z.string().nullable().optional(),
  })
  .strict();

export const taskCreateSchema = z
  .object({
    title: z.string({ required_error: "title is required" }),
    description: z.string({ required_error: "description is required" }),
    deadline: z.string().nullable().optional(),
    status: z.string().optional(),
  })
  .strict();

export const taskUpdateSchema = z
  .object({
    title: z.string().optional(),
    description: z.string().optional(),
    deadline: z.string().nullable().optional(),
    status: z.string().optional(),
  })
  .strict();
