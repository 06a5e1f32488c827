import { EventCard } from './EventCard.tsx';
import type { Event } from '@/types/index.ts';

export function EventList({
  list,
  emptyMessage,
  muted = false,
}: {
  list: Event[];
  emptyMessage: string;
  muted?: boolean;
}) {
  if (list.length === 0) {
    return <p className="text-sm text-[var(--text-subtle)] text-center py-8">{emptyMessage}</p>;
  }

  return (
    <div className="grid grid-cols-1 md:grid-cols-2 lg:grid-cols-3 gap-6 w-full">
      {list.map((event) => (
        <EventCard key={event.folder} event={event} muted={muted} />
      ))}
    </div>
  );
}
