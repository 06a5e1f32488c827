import { useState } from 'react';
import { Link, useParams } from 'react-router-dom';
import { ArrowLeft, CalendarDays, ExternalLink, MapPin, Ticket } from 'lucide-react';
import { CouponCode } from '@/components/CouponCode.tsx';
import { useEventsData } from '@/hooks/useEventsData.ts';
import { formatEventDate, getEventImageUrl } from '@/utils/eventUtils.ts';

export function EventPage() {
  const { folder } = useParams<{ folder: string }>(); // folder for /events/:folder
  const { events, loading, error } = useEventsData();
  const [imageFailed, setImageFailed] = useState(false);

  const event = events.find((candidate) => candidate.folder === folder);

  return (
    <div className="min-h-screen flex flex-col">
      <header className="page-header mx-6 md:mx-8 mt-4 md:mt-6">
        <Link to="/" className="inline-flex items-center gap-1 text-[var(--text-subtle)] hover:text-[var(--text)] no-underline">
          <ArrowLeft size={16} aria-hidden="true" /> Back to events
        </Link>
      </header>

      <main className="flex-1 px-6 md:px-8 pb-8 w-full">
        {loading && <p className="text-sm text-[var(--text-subtle)] mb-2 animate-pulse">Loading…</p>}
        {error && <p className="text-sm text-accent mb-2 font-semibold">{error}</p>}
        {!loading && !error && !event && (
          <p className="text-sm text-[var(--text-subtle)] text-center py-8">This event could not be found.</p>
        )}

        {event && (
          <article className="max-w-2xl mx-auto">
            {!imageFailed && (
              <img
                src={getEventImageUrl(event)}
                alt={event.title}
                className="w-full rounded-xl mb-6"
                onError={() => setImageFailed(true)}
              />
            )}

            <h1 className="header-title mb-3">{event.title || 'Untitled event'}</h1>

            <div className="grid gap-1 text-[var(--text-subtle)]">
              <div className="flex items-center gap-2">
                <CalendarDays size={16} aria-hidden="true" /> {formatEventDate(event.date, event.time)}
              </div>
              {event.location && (
                <div className="flex items-center gap-2">
                  <MapPin size={16} aria-hidden="true" /> {event.location}
                </div>
              )}
            </div>

            {event.description && (
              <p className="mt-4 whitespace-pre-wrap leading-relaxed">{event.description}</p>
            )}

            {event.coupon_code && <CouponCode code={event.coupon_code} />}

            <div className="flex flex-wrap gap-3 mt-6">
              {event.ticket_url && (
                <a
                  href={event.ticket_url}
                  className="inline-flex items-center gap-2 px-5 py-3 rounded-xl font-semibold text-white bg-accent hover:bg-accent-hover no-underline transition"
                  target="_blank"
                  rel="noopener noreferrer"
                >
                  <Ticket size={16} aria-hidden="true" /> Get tickets
                </a>
              )}
              {event.promoter_url && (
                <a
                  href={event.promoter_url}
                  className="inline-flex items-center gap-2 px-5 py-3 rounded-xl font-semibold border border-[var(--border)] bg-[var(--surface)] no-underline transition hover:bg-[var(--border)]"
                  target="_blank"
                  rel="noopener noreferrer"
                >
                  <ExternalLink size={16} aria-hidden="true" /> Promoter
                </a>
              )}
            </div>
          </article>
        )}
      </main>
    </div>
  );
}
