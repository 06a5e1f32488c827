import { type Dirent, promises as fs } from "node:fs";
import path from "node:path";
import { EVENT_STORE } from "../config/index.ts";
import type {
  IndexBuildResult,
  IndexedEvent,
  SkippedFolder,
} from "../types.ts";
import { validateEventMeta } from "../validation/event-validation.ts";
import {
  describeError,
  getErrnoCode,
  IndexWriteError,
  StoreRootMissingError,
} from "../utils/error-util.ts";
import {
  createIndexDocument,
  toIndexedEvent,
} from "../utils/event-normalizer-util.ts";
import { sortEvents } from "../utils/event-order-util.ts";
import {
  pathExists,
  readJsonFile,
  serializeJson,
  writeFileAtomic,
} from "../utils/file-util.ts";
import { resolveServiceLogger, type ServiceLogger } from "./logger-service.ts";

// The event store is just a directory: one subfolder per event, each with a
// meta.json and a cover image. This service reads that tree and turns it into
// the single index document the site loads. A bad folder never stops the build;
// it's logged and reported back in `skipped`.

export interface ScanOptions {
  logger?: ServiceLogger;
}

export interface BuildIndexOptions extends ScanOptions {
  /** Defaults to `<storeRoot>/index.json`. */
  indexPath?: string;
  /** Scan and report without writing the index. */
  dryRun?: boolean;
}

export interface BuildIndexResult extends IndexBuildResult {
  indexPath: string;
  written: boolean;
}

type FolderLoadResult =
  | { ok: true; event: IndexedEvent; imageMissing: boolean }
  | { ok: false; reason: string };

export function resolveIndexPath(storeRoot: string): string {
  return path.join(storeRoot, EVENT_STORE.INDEX_FILENAME);
}

/**
 * Names of the immediate subdirectories that can hold events, sorted.
 * Dot-prefixed entries (hidden folders, scaffolder staging) are left out.
 * @throws StoreRootMissingError when the root is missing or not a directory
 */
export async function listEventFolders(storeRoot: string): Promise<string[]> {
  let entries: Dirent[];
  try {
    entries = await fs.readdir(storeRoot, { withFileTypes: true });
  } catch (error) {
    throw new StoreRootMissingError(storeRoot, { cause: error });
  }

  return entries
    .filter((entry) =>
      entry.isDirectory() &&
      !entry.name.startsWith(EVENT_STORE.HIDDEN_PREFIX)
    )
    .map((entry) => entry.name)
    .sort();
}

async function readMetaDocument(
  metaPath: string,
): Promise<{ ok: true; raw: unknown } | { ok: false; reason: string }> {
  try {
    return { ok: true, raw: await readJsonFile(metaPath) };
  } catch (error) {
    if (getErrnoCode(error) === "ENOENT") {
      return { ok: false, reason: `missing ${EVENT_STORE.META_FILENAME}` };
    }
    if (error instanceof SyntaxError) {
      return {
        ok: false,
        reason: `invalid JSON in ${EVENT_STORE.META_FILENAME}: ${error.message}`,
      };
    }
    return {
      ok: false,
      reason: `could not read ${EVENT_STORE.META_FILENAME}: ${
        describeError(error).message
      }`,
    };
  }
}

export async function loadEventFolder(
  storeRoot: string,
  folder: string,
): Promise<FolderLoadResult> {
  const directory = path.join(storeRoot, folder);
  const document = await readMetaDocument(
    path.join(directory, EVENT_STORE.META_FILENAME),
  );
  if (!document.ok) {
    return document;
  }

  const validation = validateEventMeta(document.raw);
  if (!validation.success || !validation.data) {
    return {
      ok: false,
      reason: (validation.errors ?? ["invalid metadata"]).join("; "),
    };
  }

  const imageMissing = !(await pathExists(
    path.join(directory, validation.data.image),
  ));

  return {
    ok: true,
    event: toIndexedEvent(validation.data, folder),
    imageMissing,
  };
}

/**
 * Load every event folder under the store root and return them in index order.
 */
export async function scanEventStore(
  storeRoot: string,
  options: ScanOptions = {},
): Promise<IndexBuildResult> {
  const log = resolveServiceLogger(options.logger);
  const folders = await listEventFolders(storeRoot);

  const events: IndexedEvent[] = [];
  const skipped: SkippedFolder[] = [];
  const missingImages: string[] = [];

  for (const folder of folders) {
    const result = await loadEventFolder(storeRoot, folder);

    if (!result.ok) {
      skipped.push({ folder, reason: result.reason });
      log.warn("Skipping event folder", { folder, reason: result.reason });
      continue;
    }

    if (result.imageMissing) {
      missingImages.push(folder);
      log.warn("Missing image in event folder", {
        folder,
        image: result.event.image,
      });
    }

    log.debug("Indexed event", { folder, date: result.event.date });
    events.push(result.event);
  }

  return { events: sortEvents(events), skipped, missingImages };
}

/**
 * Serialize and atomically replace the index document.
 * @returns The serialized document
 * @throws IndexWriteError when the target cannot be written
 */
export async function writeEventIndex(
  indexPath: string,
  events: readonly IndexedEvent[],
): Promise<string> {
  const contents = serializeJson(createIndexDocument(events));

  try {
    await writeFileAtomic(indexPath, contents);
  } catch (error) {
    throw new IndexWriteError(indexPath, { cause: error });
  }

  return contents;
}

export async function buildEventIndex(
  storeRoot: string,
  options: BuildIndexOptions = {},
): Promise<BuildIndexResult> {
  const log = resolveServiceLogger(options.logger);
  const indexPath = options.indexPath ?? resolveIndexPath(storeRoot);

  const result = await scanEventStore(storeRoot, { logger: options.logger });

  if (options.dryRun) {
    log.info("Dry run: index not written", {
      indexPath,
      events: result.events.length,
      skipped: result.skipped.length,
    });
    return { ...result, indexPath, written: false };
  }

  await writeEventIndex(indexPath, result.events);
  log.info("Wrote index", {
    indexPath,
    events: result.events.length,
    skipped: result.skipped.length,
  });

  return { ...result, indexPath, written: true };
}
