// Deadlines are calendar dates stored as YYYY-MM-DD text. All helpers here
// work in local time so a date never shifts when it crosses a UTC boundary.

const ISO_DATE = /^(\d{4})-(\d{2})-(\d{2})$/;

export function formatLocalDate(d: Date): string {
  const year = String(d.getFullYear()).padStart(4, "0");
  const month = String(d.getMonth() + 1).padStart(2, "0");
  const day = String(d.getDate()).padStart(2, "0");
  return `${year}-${month}-${day}`;
}

/** Returns the date back in canonical form, or null if it is not a real date. */
export function parseCalendarDate(input: string): string | null {
  const match = input.match(ISO_DATE);
  if (!match) {
    return null;
  }
  const year = Number(match[1]);
  const month = Number(match[2]);
  const day = Number(match[3]);
  const d = new Date(year, month - 1, day);
  d.setFullYear(year);
  // Reject dates that roll over (e.g. Feb 30 -> Mar 2)
  if (d.getFullYear() !== year || d.getMonth() !== month - 1 || d.getDate() !== day) {
    return null;
  }
  return formatLocalDate(d);
}

export function addDays(d: Date, days: number): Date {
  return new Date(d.getFullYear(), d.getMonth(), d.getDate() + days);
}

/** Overdue means the due day is over and the task is still open. */
export function isOverdue(deadline: string | null, status: string, today: string): boolean {
  return deadline !== null && status !== "done" && deadline < today;
}

export type Clock = () => Date;

export const systemClock: Clock = () => new Date();
