export {
  COVER_IMAGE,
  EVENT_FORMATS,
  EVENT_STORE,
  JSON_INDENT,
  PREVIEW_SERVER,
} from "./promogen-config.ts";
