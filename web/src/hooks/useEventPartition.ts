import { useMemo } from 'react';
import {
  partitionEvents,
  toDateKey,
} from '@promogen/shared/utils/event-order-util';
import type { Event, EventPartition } from '@/types/index.ts';

/**
 * Split loaded events into upcoming and past, relative to the viewer's today.
 */
export function useEventPartition(
  events: Event[],
  now: Date = new Date(),
): EventPartition<Event> {
  // keyed on the calendar day, not the Date instance, which is new every render
  const today = toDateKey(now);

  return useMemo(() => partitionEvents(events, now), [events, today]);
}
