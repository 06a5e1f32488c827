import { EventList } from '@/components/EventList.tsx';
import { PastEventsSection } from '@/components/PastEventsSection.tsx';
import { useEventPartition } from '@/hooks/useEventPartition.ts';
import { useEventsData } from '@/hooks/useEventsData.ts';

export function MainPage() {
  const { events, loading, error } = useEventsData();
  const { upcoming, past } = useEventPartition(events);

  return (
    <div className="min-h-screen flex flex-col">
      <header className="page-header mx-6 md:mx-8 mt-4 md:mt-6">
        <h1 className="header-title">Upcoming events</h1>
      </header>

      <main className="flex-1 px-6 md:px-8 pb-8 max-w-6xl mx-auto w-full">
        {loading && <p className="text-sm text-[var(--text-subtle)] mb-2 animate-pulse">Loading…</p>}
        {error && <p className="text-sm text-accent mb-2 font-semibold">{error}</p>}

        {!loading && !error && (
          <>
            <EventList list={upcoming} emptyMessage="No upcoming events yet. Check back soon." />
            <PastEventsSection events={past} />
          </>
        )}
      </main>
    </div>
  );
}
