import { EVENT_STORE } from "../config/index.ts";
import type { EventIndexDocument, EventMeta, IndexedEvent } from "../types.ts";

/**
 * Attach the folder identifier to a validated record. The folder goes first so
 * the index reads naturally and the renderer can build image paths from it.
 * @param meta - Record returned by validateEventMeta
 * @param folder - Name of the event folder under the store root
 */
export function toIndexedEvent(meta: EventMeta, folder: string): IndexedEvent {
  return { folder, ...meta };
}

/**
 * Wrap sorted events in the versioned index document. No timestamp is added,
 * so building an unchanged store twice gives the same bytes.
 */
export function createIndexDocument(
  events: readonly IndexedEvent[],
): EventIndexDocument {
  return {
    version: EVENT_STORE.INDEX_VERSION,
    events: [...events],
  };
}

/**
 * Relative URL of an event's cover image, resolved against the events base URL.
 */
export function buildEventImagePath(
  event: Pick<IndexedEvent, "folder" | "image">,
  eventsBaseUrl: string = EVENT_STORE.DEFAULT_DIR,
): string {
  const base = eventsBaseUrl.replace(/\/+$/, "");
  const segments = [event.folder, event.image].map(encodeURIComponent);
  return base ? `${base}/${segments.join("/")}` : segments.join("/");
}
