/**
 * Shared TypeScript types and interfaces for promogen runtimes.
 * Consolidates the event data model, index document, logging metadata and
 * validation results.
 */

// ============================================================================
// EVENT STORE TYPES
// ============================================================================

/**
 * Canonical field order of a metadata document (`<folder>/meta.json`).
 */
export const EVENT_META_FIELDS = [
  "title",
  "date",
  "time",
  "location",
  "description",
  "ticket_url",
  "promoter_url",
  "coupon_code",
  "image",
] as const;

export type EventMetaField = typeof EVENT_META_FIELDS[number];

/**
 * A metadata document as written by the scaffolder: every field present,
 * absent optional values stored as "".
 */
export type EventMetaDocument = Record<EventMetaField, string>;

/**
 * A validated event record. Empty optional fields are dropped.
 */
export interface EventMeta {
  title: string;
  date: string; // YYYY-MM-DD
  time?: string; // HH:MM
  location?: string;
  description?: string;
  ticket_url?: string;
  promoter_url?: string;
  coupon_code?: string;
  image: string;
}

/**
 * One entry of the index: the record plus the folder that holds it.
 */
export interface IndexedEvent extends EventMeta {
  folder: string;
}

export interface EventIndexDocument {
  version: number;
  events: IndexedEvent[];
}

export interface SkippedFolder {
  folder: string;
  reason: string;
}

export interface IndexBuildResult {
  events: IndexedEvent[];
  skipped: SkippedFolder[];
  missingImages: string[];
}

export interface EventPartition<T extends Pick<EventMeta, "date">> {
  upcoming: T[];
  past: T[];
}

// ============================================================================
// SCAFFOLDING TYPES
// ============================================================================

export interface NewEventInput {
  title: string;
  date: string;
  time?: string;
  location?: string;
  description?: string;
  ticket_url?: string;
  promoter_url?: string;
  coupon_code?: string;
  slug?: string;
  imagePath?: string;
}

export type CoverImageOutcome = "converted" | "copied" | "placeholder";

export interface ScaffoldResult {
  folder: string;
  directory: string;
  metadata: EventMetaDocument;
  cover: CoverImageOutcome;
}

// ============================================================================
// LOGGING
// ============================================================================

export interface LogMetadata {
  [key: string]: unknown;
}

export interface ErrorMetadata extends LogMetadata {
  error?: unknown;
}

export type LogFormat = "json" | "text";

// ============================================================================
// VALIDATION
// ============================================================================

export interface ValidationResult<T> {
  success: boolean;
  data?: T;
  errors?: string[];
}
