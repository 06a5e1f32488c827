/**
 * Data Access Layer (DAL)
 */

// The whole data set is one static file, events/index.json, written by
// `promogen build`. The site never lists folders itself; if an event is missing
// here it's missing from the index.

import { validateEventMeta } from '@promogen/shared/validation/event-validation';
import { sortEvents } from '@promogen/shared/utils/event-order-util';
import { INDEX_URL, isDevelopment } from '@/constants/config.ts';
import type { Event } from '@/types/index.ts';

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export class EventIndexError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'EventIndexError';
  }
}

/**
 * Re-check one index record. The index is generated, but it is also a file on
 * a web server that someone may have edited by hand.
 */
function toEvent(raw: unknown): Event | null {
  if (
    typeof raw !== 'object' || raw === null || !('folder' in raw) ||
    typeof raw.folder !== 'string' || !raw.folder
  ) {
    return null;
  }

  const result = validateEventMeta(raw);
  if (!result.success || !result.data) return null;

  return { folder: raw.folder, ...result.data };
}

/**
 * Load every event from the index, in index order.
 * @throws EventIndexError when the index cannot be fetched or is not an index
 */
export async function getEvents(fetchImpl: FetchLike = fetch): Promise<Event[]> {
  let response: Response;
  try {
    response = await fetchImpl(INDEX_URL, { cache: 'no-cache' });
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new EventIndexError(`Could not load events: ${reason}`);
  }

  if (!response.ok) {
    throw new EventIndexError(`Could not load events (HTTP ${response.status})`);
  }

  let body: unknown;
  try {
    body = await response.json();
  } catch {
    throw new EventIndexError('Event index is not valid JSON');
  }

  if (
    typeof body !== 'object' || body === null || !('events' in body) ||
    !Array.isArray(body.events)
  ) {
    throw new EventIndexError('Event index has no events list');
  }

  const events: Event[] = [];
  for (const raw of body.events) {
    const event = toEvent(raw);
    if (event) {
      events.push(event);
    } else if (isDevelopment) {
      console.warn('Ignoring malformed event record', raw);
    }
  }

  return sortEvents(events);
}
