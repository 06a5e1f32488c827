export const EVENT_STORE = {
  DEFAULT_DIR: "events",
  META_FILENAME: "meta.json",
  INDEX_FILENAME: "index.json",
  DEFAULT_IMAGE: "cover.jpg",
  STAGING_PREFIX: ".staging-",
  HIDDEN_PREFIX: ".",
  INDEX_VERSION: 1,
} as const;

export const EVENT_FORMATS = {
  DATE_PATTERN: /^\d{4}-\d{2}-\d{2}$/,
  TIME_PATTERN: /^\d{2}:\d{2}$/,
  DEFAULT_SORT_TIME: "00:00",
  FALLBACK_SLUG: "event",
  // characters, so a staged folder name stays under the 255-byte limit
  MAX_SLUG_LENGTH: 80,
  URL_PROTOCOLS: ["http", "https"],
} as const;

export const COVER_IMAGE = {
  JPEG_QUALITY: 92,
  BACKGROUND: "#ffffff",
} as const;

export const PREVIEW_SERVER = {
  DEFAULT_PORT: 8000,
  DEFAULT_SITE_DIR: "web/dist",
  EVENTS_MOUNT: "/events",
} as const;

export const JSON_INDENT = 2;
