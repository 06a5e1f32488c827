import { useId, useState } from 'react';
import { ChevronDown, ChevronRight } from 'lucide-react';
import { EventList } from './EventList.tsx';
import type { Event } from '@/types/index.ts';

/**
 * Past events, collapsed until the visitor asks for them. Hidden when there are none.
 */
export function PastEventsSection({ events }: { events: Event[] }) {
  const [open, setOpen] = useState(false);
  const contentId = useId();

  if (events.length === 0) return null;

  return (
    <section className="mt-12">
      <button
        type="button"
        className="inline-flex items-center gap-1 mb-4 py-2 font-semibold text-[var(--text-subtle)] hover:text-[var(--text)] transition"
        aria-expanded={open}
        aria-controls={contentId}
        onClick={() => setOpen((value) => !value)}
      >
        {open ? <ChevronDown size={18} /> : <ChevronRight size={18} />}
        Past events ({events.length})
      </button>
      <div id={contentId} hidden={!open}>
        <EventList list={events} emptyMessage="" muted />
      </div>
    </section>
  );
}
