import { useState } from 'react';
import { Link } from 'react-router-dom';
import { ImageOff, MapPin } from 'lucide-react';
import type { Event } from '@/types/index.ts';
import {
  formatEventDate,
  getEventDetailPath,
  getEventImageUrl,
} from '@/utils/eventUtils.ts';

// Small card shown in the upcoming and past lists. The whole card links to the
// event page.

export function EventCard({ event, muted = false }: { event: Event; muted?: boolean }) {
  const [imageFailed, setImageFailed] = useState(false);

  return (
    <Link
      to={getEventDetailPath(event.folder)}
      className={`flex flex-col overflow-hidden rounded-xl border border-[var(--border)] bg-[var(--surface)] no-underline transition hover:-translate-y-0.5 focus:outline-none focus-visible:ring-2 focus-visible:ring-accent ${
        muted ? 'opacity-70' : ''
      }`}
    >
      {imageFailed ? (
        <div
          className="w-full aspect-[4/5] bg-[var(--border)] flex items-center justify-center text-[var(--text-subtle)]"
          aria-hidden="true"
        >
          <ImageOff size={28} />
        </div>
      ) : (
        <img
          src={getEventImageUrl(event)}
          alt={event.title}
          className="w-full aspect-[4/5] object-cover bg-[var(--border)]"
          onError={() => setImageFailed(true)}
          loading="lazy"
        />
      )}
      <div className="p-4 min-w-0">
        <div className="font-semibold truncate mb-1">{event.title || 'Untitled event'}</div>
        <div className="text-sm text-[var(--text-subtle)]">{formatEventDate(event.date, event.time)}</div>
        {event.location && (
          <div className="text-sm text-[var(--text-subtle)] flex items-center gap-1">
            <MapPin size={14} aria-hidden="true" /> {event.location}
          </div>
        )}
      </div>
    </Link>
  );
}
