import { EVENT_FORMATS } from "../config/index.ts";

/**
 * Normalize an event title into a filesystem-safe folder slug.
 * Letters from any script are kept, so "מסיבת פורים" stays readable.
 * Long titles are cut to `MAX_SLUG_LENGTH` code points.
 */
export function slugify(text: string): string {
  const slug = text
    .trim()
    .toLowerCase()
    .replace(/&/g, " and ")
    .replace(/[^\p{L}\p{M}\p{N}\s_-]/gu, "")
    .replace(/[\s_]+/g, "-")
    .replace(/-{2,}/g, "-")
    .replace(/^-+|-+$/g, "");

  const capped = Array.from(slug)
    .slice(0, EVENT_FORMATS.MAX_SLUG_LENGTH)
    .join("")
    .replace(/-+$/, "");

  return capped || EVENT_FORMATS.FALLBACK_SLUG;
}

/**
 * Folder name for a new event: `<date>-<slug>`.
 */
export function buildEventFolderName(
  date: string,
  title: string,
  customSlug?: string,
): string {
  return `${date}-${slugify(customSlug ?? title)}`;
}
