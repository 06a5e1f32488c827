import { constants, promises as fs } from "node:fs";
import sharp from "sharp";
import { COVER_IMAGE } from "../config/index.ts";
import type { CoverImageOutcome } from "../types.ts";
import { describeError, ImageCopyError } from "../utils/error-util.ts";
import { resolveServiceLogger, type ServiceLogger } from "./logger-service.ts";

// Covers are always stored as cover.jpg, whatever the user picked (png, webp,
// heic...). We re-encode to JPEG when sharp can decode the file and otherwise
// copy the bytes unchanged, which matches what browsers are lenient about anyway.

/**
 * @throws ImageCopyError when the source cannot be read
 */
export async function assertImageReadable(sourcePath: string): Promise<void> {
  try {
    const stat = await fs.stat(sourcePath);
    if (!stat.isFile()) {
      throw new Error(`Not a file: ${sourcePath}`);
    }
    await fs.access(sourcePath, constants.R_OK);
  } catch (error) {
    throw new ImageCopyError(sourcePath, { cause: error });
  }
}

/**
 * Write the cover image for an event folder.
 * @param sourcePath - Image chosen by the user
 * @param destinationPath - Target file inside the (staging) event folder
 * @returns "converted" when re-encoded to JPEG, "copied" when the raw bytes were kept
 */
export async function writeCoverImage(
  sourcePath: string,
  destinationPath: string,
  logger?: ServiceLogger,
): Promise<Exclude<CoverImageOutcome, "placeholder">> {
  const log = resolveServiceLogger(logger);
  await assertImageReadable(sourcePath);

  try {
    await sharp(sourcePath)
      .flatten({ background: COVER_IMAGE.BACKGROUND })
      .jpeg({ quality: COVER_IMAGE.JPEG_QUALITY, mozjpeg: true })
      .toFile(destinationPath);
    return "converted";
  } catch (error) {
    log.warn("Could not convert image to JPEG, copying it unchanged", {
      sourcePath,
      reason: describeError(error).message,
    });
  }

  try {
    await fs.copyFile(sourcePath, destinationPath);
    return "copied";
  } catch (error) {
    throw new ImageCopyError(sourcePath, { cause: error });
  }
}

/**
 * Empty stand-in for events created without an image.
 */
export async function writePlaceholderCover(
  destinationPath: string,
): Promise<"placeholder"> {
  await fs.writeFile(destinationPath, "");
  return "placeholder";
}
