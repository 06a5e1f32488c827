/// <reference types="vite/client" />

interface ImportMetaEnv {
  readonly VITE_EVENTS_BASE_URL?: string;
}

interface ImportMeta {
  readonly env: ImportMetaEnv;
}
