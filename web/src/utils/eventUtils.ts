import { buildEventImagePath } from '@promogen/shared/utils/event-normalizer-util';
import { EVENTS_BASE_URL } from '@/constants/config.ts';
import type { Event } from '@/types/index.ts';

// Formatting and URL helpers shared by the cards and the event page.

const dateFormatter = new Intl.DateTimeFormat(undefined, {
  weekday: 'short',
  day: 'numeric',
  month: 'short',
  year: 'numeric',
});

/**
 * Parse a date string in YYYY-MM-DD format to a local Date
 */
export function parseDateOnly(value: string): Date | undefined {
  // new Date('2026-03-02') is midnight UTC, which is the previous evening west
  // of Greenwich, so build the date from its parts instead
  if (!value) return undefined;
  const [y, m, d] = value.split('-').map(Number);
  if (!y || !m || !d) return undefined;
  const date = new Date(y, m - 1, d);
  return date.getMonth() === m - 1 ? date : undefined;
}

/**
 * Human-readable date, plus the start time when there is one
 */
export function formatEventDate(date: string, time?: string): string {
  const parsed = parseDateOnly(date);
  const day = parsed ? dateFormatter.format(parsed) : date;
  return time ? `${day} · ${time}` : day;
}

export function getEventImageUrl(event: Pick<Event, 'folder' | 'image'>): string {
  return buildEventImagePath(event, EVENTS_BASE_URL);
}

export function getEventDetailPath(folder: string): string {
  return `/events/${encodeURIComponent(folder)}`;
}
