export type RenamerErrorCode =
  | "INVALID_ARGUMENT"
  | "FILE_NOT_VALID"
  | "UNSUPPORTED_FILE_TYPE"
  | "MISSING_METADATA"
  | "RENAME_FAILED";

export class RenamerError extends Error {
  readonly code: RenamerErrorCode;

  constructor(code: RenamerErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "RenamerError";
    this.code = code;
  }
}

/** Malformed call-level input. The only kind that is thrown to the caller. */
export class InvalidArgumentError extends RenamerError {
  constructor(message: string) {
    super("INVALID_ARGUMENT", message);
    this.name = "InvalidArgumentError";
  }
}

export class FileNotValidError extends RenamerError {
  readonly filePath: unknown;

  constructor(filePath: unknown, message: string, options?: { cause?: unknown }) {
    super("FILE_NOT_VALID", message, options);
    this.name = "FileNotValidError";
    this.filePath = filePath;
  }
}

export class UnsupportedFileTypeError extends RenamerError {
  readonly filePath: string;
  readonly extension: string;

  constructor(filePath: string, extension: string) {
    super(
      "UNSUPPORTED_FILE_TYPE",
      extension
        ? `Extension ${extension} is not supported: ${filePath}`
        : `File has no extension: ${filePath}`,
    );
    this.name = "UnsupportedFileTypeError";
    this.filePath = filePath;
    this.extension = extension;
  }
}

export class MissingMetadataError extends RenamerError {
  readonly filePath: string;
  readonly key: string;

  constructor(filePath: string, key: string) {
    super("MISSING_METADATA", `No value for metadata key "${key}" in ${filePath}`);
    this.name = "MissingMetadataError";
    this.filePath = filePath;
    this.key = key;
  }
}

/**
 * Reserved for a rename whose destination cannot be confirmed afterwards.
 * Renames are not verified, so nothing raises this yet.
 */
export class RenameFailedError extends RenamerError {
  constructor(oldPath: string, newPath: string) {
    super("RENAME_FAILED", `Could not confirm rename: ${oldPath} => ${newPath}`);
    this.name = "RenameFailedError";
  }
}

export function formatErrorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
