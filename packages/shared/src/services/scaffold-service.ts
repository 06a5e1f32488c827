import { promises as fs } from "node:fs";
import path from "node:path";
import { EVENT_STORE } from "../config/index.ts";
import type {
  EventMetaDocument,
  NewEventInput,
  ScaffoldResult,
} from "../types.ts";
import {
  type ParsedNewEventInput,
  validateNewEventInput,
} from "../validation/event-validation.ts";
import {
  ScaffoldCollisionError,
  ScaffoldValidationError,
} from "../utils/error-util.ts";
import { serializeJson, pathExists } from "../utils/file-util.ts";
import { buildEventFolderName } from "../utils/slug-util.ts";
import {
  assertImageReadable,
  writeCoverImage,
  writePlaceholderCover,
} from "./image-service.ts";
import { resolveServiceLogger, type ServiceLogger } from "./logger-service.ts";

// Creating an event means writing two files into a brand new folder. Both are
// written into a dot-prefixed staging folder first (which the index builder
// ignores) and the whole folder is renamed into place at the end. If anything
// fails on the way, the staging folder is deleted and the store is untouched.

export interface ScaffoldOptions {
  storeRoot: string;
  logger?: ServiceLogger;
}

/**
 * The metadata document in canonical field order, "" for unset fields.
 */
export function buildMetaDocument(input: ParsedNewEventInput): EventMetaDocument {
  return {
    title: input.title,
    date: input.date,
    time: input.time ?? "",
    location: input.location ?? "",
    description: input.description ?? "",
    ticket_url: input.ticket_url ?? "",
    promoter_url: input.promoter_url ?? "",
    coupon_code: input.coupon_code ?? "",
    image: EVENT_STORE.DEFAULT_IMAGE,
  };
}

/**
 * Validate the input and commit a new event folder.
 * @throws ScaffoldValidationError for missing or malformed fields
 * @throws ScaffoldCollisionError when the derived folder already exists
 * @throws ImageCopyError when the image cannot be read or copied
 */
export async function createEventFolder(
  input: NewEventInput,
  options: ScaffoldOptions,
): Promise<ScaffoldResult> {
  const log = resolveServiceLogger(options.logger);
  const { storeRoot } = options;

  const validation = validateNewEventInput(input);
  if (!validation.success || !validation.data) {
    throw new ScaffoldValidationError(validation.errors ?? []);
  }
  const data = validation.data;

  const folder = buildEventFolderName(data.date, data.title, data.slug);
  const directory = path.join(storeRoot, folder);

  if (await pathExists(directory)) {
    throw new ScaffoldCollisionError(folder, directory);
  }
  if (data.imagePath) {
    await assertImageReadable(data.imagePath);
  }

  await fs.mkdir(storeRoot, { recursive: true });
  const metadata = buildMetaDocument(data);
  const stagingDirectory = await fs.mkdtemp(
    path.join(storeRoot, `${EVENT_STORE.STAGING_PREFIX}${folder}-`),
  );

  try {
    await fs.writeFile(
      path.join(stagingDirectory, EVENT_STORE.META_FILENAME),
      serializeJson(metadata),
      "utf8",
    );

    const coverPath = path.join(stagingDirectory, metadata.image);
    const cover = data.imagePath
      ? await writeCoverImage(data.imagePath, coverPath, options.logger)
      : await writePlaceholderCover(coverPath);

    // another process may have created the folder while we were staging
    if (await pathExists(directory)) {
      throw new ScaffoldCollisionError(folder, directory);
    }
    await fs.rename(stagingDirectory, directory);

    log.info("Created event folder", { folder, directory, cover });
    return { folder, directory, metadata, cover };
  } catch (error) {
    await fs.rm(stagingDirectory, { recursive: true, force: true });
    throw error;
  }
}
