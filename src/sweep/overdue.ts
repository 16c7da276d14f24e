import { formatLocalDate } from "../dates/calendar.js";
import type { TaskStore } from "../store/types.js";

/**
 * Close every task whose deadline day has passed and that is not done yet.
 * Returns the number of tasks closed; running it again right after returns 0.
 */
export async function sweepOverdueTasks(store: TaskStore, now: Date): Promise<number> {
  return store.closeOverdue(formatLocalDate(now), now.toISOString());
}
