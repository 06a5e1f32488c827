export {
  buildEventIndex,
  listEventFolders,
  loadEventFolder,
  resolveIndexPath,
  scanEventStore,
  writeEventIndex,
} from "./event-store-service.ts";

export {
  assertImageReadable,
  writeCoverImage,
  writePlaceholderCover,
} from "./image-service.ts";

export { buildMetaDocument, createEventFolder } from "./scaffold-service.ts";

export {
  createServiceLoggerFromStructuredLogger,
  createStructuredLogger,
  resolveServiceLogger,
} from "./logger-service.ts";

export type {
  BuildIndexOptions,
  BuildIndexResult,
  ScanOptions,
} from "./event-store-service.ts";

export type { ScaffoldOptions } from "./scaffold-service.ts";

export type {
  LoggerOptions,
  ServiceLogger,
  StructuredLogger,
} from "./logger-service.ts";
