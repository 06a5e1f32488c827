import { useEffect, useState } from 'react';
import { getEvents } from '@/services/dal.ts';
import type { Event } from '@/types/index.ts';

/**
 * Load the event index once on mount
 */
export function useEventsData() {
  const [events, setEvents] = useState<Event[]>([]);
  const [loading, setLoading] = useState(true);
  const [error, setError] = useState<string>('');

  useEffect(() => {
    let cancelled = false;

    (async () => {
      try {
        setLoading(true);
        const loaded = await getEvents();
        if (cancelled) return;
        setEvents(loaded);
      } catch (err) {
        if (cancelled) return;
        const message = (err instanceof Error && err.message)
          ? err.message
          : 'Failed to load events';
        setError(message);
      } finally {
        if (!cancelled) setLoading(false);
      }
    })();

    return () => {
      cancelled = true;
    };
  }, []);

  return { events, loading, error };
}
