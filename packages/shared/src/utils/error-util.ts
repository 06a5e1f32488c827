// Typed failures for the event store. Every error a command can surface to the
// user carries a stable `code` so the CLI (and tests) can tell them apart
// without matching on message text.

export type PromogenErrorCode =
  | "STORE_ROOT_MISSING"
  | "INDEX_WRITE_FAILED"
  | "SCAFFOLD_VALIDATION_FAILED"
  | "SCAFFOLD_COLLISION"
  | "IMAGE_COPY_FAILED"
  | "INVALID_ARGUMENTS";

export class PromogenError extends Error {
  readonly code: PromogenErrorCode;

  constructor(code: PromogenErrorCode, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

export class StoreRootMissingError extends PromogenError {
  readonly storeRoot: string;

  constructor(storeRoot: string, options?: ErrorOptions) {
    super(
      "STORE_ROOT_MISSING",
      `Events directory not found: ${storeRoot}`,
      options,
    );
    this.storeRoot = storeRoot;
  }
}

export class IndexWriteError extends PromogenError {
  readonly indexPath: string;

  constructor(indexPath: string, options?: ErrorOptions) {
    super(
      "INDEX_WRITE_FAILED",
      `Could not write index: ${indexPath}`,
      options,
    );
    this.indexPath = indexPath;
  }
}

export class ScaffoldValidationError extends PromogenError {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(
      "SCAFFOLD_VALIDATION_FAILED",
      `Invalid event details: ${issues.join("; ")}`,
    );
    this.issues = issues;
  }
}

export class ScaffoldCollisionError extends PromogenError {
  readonly folder: string;

  constructor(folder: string, directory: string) {
    super("SCAFFOLD_COLLISION", `Folder already exists: ${directory}`);
    this.folder = folder;
  }
}

export class ImageCopyError extends PromogenError {
  readonly imagePath: string;

  constructor(imagePath: string, options?: ErrorOptions) {
    super(
      "IMAGE_COPY_FAILED",
      `Could not read or copy image: ${imagePath}`,
      options,
    );
    this.imagePath = imagePath;
  }
}

export class InvalidArgumentsError extends PromogenError {
  constructor(message: string) {
    super("INVALID_ARGUMENTS", message);
  }
}

export function isPromogenError(error: unknown): error is PromogenError {
  return error instanceof PromogenError;
}

/**
 * Reduce any thrown value to a printable message plus the constructor name.
 */
export function describeError(error: unknown): { message: string; type?: string } {
  if (!error) {
    return { message: "An unknown error occurred" };
  }

  if (error instanceof Error) {
    return { message: error.message || error.name, type: error.name };
  }

  if (typeof error === "string") {
    return { message: error };
  }

  if (
    typeof error === "object" && "message" in error &&
    typeof error.message === "string"
  ) {
    return { message: error.message };
  }

  return { message: String(error) };
}

/**
 * Node filesystem errors carry a string `code` (ENOENT, EACCES, ...).
 */
export function getErrnoCode(error: unknown): string | undefined {
  if (
    error instanceof Error && "code" in error &&
    typeof error.code === "string"
  ) {
    return error.code;
  }
  return undefined;
}
