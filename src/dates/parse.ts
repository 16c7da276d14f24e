import { addDays, formatLocalDate } from "./calendar.js";

const WEEKDAYS = ["sunday", "monday", "tuesday", "wednesday", "thursday", "friday", "saturday"];

/**
 * Resolve CLI date shorthands into YYYY-MM-DD.
 *
 * Supports "today"/"tod", "tomorrow"/"tom", "next week" (next Monday),
 * weekday names ("friday" = the next Friday), and "in N days" / "+N".
 * Anything else is returned trimmed and unchanged so the validator can
 * report it.
 */
export function resolveDateShorthand(input: string, now?: Date): string {
  const ref = now ?? new Date();
  const trimmed = input.trim();
  const lower = trimmed.toLowerCase();

  if (lower === "today" || lower === "tod") {
    return formatLocalDate(ref);
  }
  if (lower === "tomorrow" || lower === "tom") {
    return formatLocalDate(addDays(ref, 1));
  }
  if (lower === "next week") {
    return formatLocalDate(nextWeekday(ref, 1));
  }

  const weekday = WEEKDAYS.indexOf(lower);
  if (weekday !== -1) {
    return formatLocalDate(nextWeekday(ref, weekday));
  }

  const relative = lower.match(/^(?:in\s+(\d{1,4})\s+days?|\+(\d{1,4})d?)$/);
  if (relative) {
    const days = Number(relative[1] ?? relative[2]);
    return formatLocalDate(addDays(ref, days));
  }

  return trimmed;
}

function nextWeekday(ref: Date, target: number): Date {
  let daysAhead = target - ref.getDay();
  if (daysAhead <= 0) {
    daysAhead += 7;
  }
  return addDays(ref, daysAhead);
}
