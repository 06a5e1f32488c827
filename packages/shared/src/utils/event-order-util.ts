import { EVENT_FORMATS } from "../config/index.ts";
import type { EventMeta, EventPartition, IndexedEvent } from "../types.ts";

type Sortable = Pick<IndexedEvent, "date" | "time" | "folder">;

function compareStrings(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/**
 * Total order for the index: date, then time (missing counts as 00:00),
 * then folder name. Plain code-unit comparison so every machine agrees.
 */
export function compareEvents(a: Sortable, b: Sortable): number {
  return (
    compareStrings(a.date, b.date) ||
    compareStrings(
      a.time ?? EVENT_FORMATS.DEFAULT_SORT_TIME,
      b.time ?? EVENT_FORMATS.DEFAULT_SORT_TIME,
    ) ||
    compareStrings(a.folder, b.folder)
  );
}

export function sortEvents<T extends Sortable>(events: readonly T[]): T[] {
  return [...events].sort(compareEvents);
}

/**
 * `YYYY-MM-DD` of a Date in local time.
 */
export function toDateKey(date: Date): string {
  const year = String(date.getFullYear()).padStart(4, "0");
  const month = String(date.getMonth() + 1).padStart(2, "0");
  const day = String(date.getDate()).padStart(2, "0");
  return `${year}-${month}-${day}`;
}

/**
 * Split events into upcoming (dated today or later) and past (dated before
 * today). Time of day is ignored, so tonight's event stays upcoming all day.
 *
 * Upcoming keeps the input order. Past is reversed so the most recent past
 * event comes first.
 */
export function partitionEvents<T extends Pick<EventMeta, "date">>(
  events: readonly T[],
  now: Date,
): EventPartition<T> {
  const today = toDateKey(now);
  const upcoming: T[] = [];
  const past: T[] = [];

  for (const event of events) {
    if (event.date >= today) {
      upcoming.push(event);
    } else {
      past.push(event);
    }
  }

  return { upcoming, past: past.reverse() };
}
