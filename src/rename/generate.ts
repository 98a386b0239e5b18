import path from "node:path";
import type { SubsystemLogger } from "../logging/logger.js";
import type { RenameFileSystem } from "./fs.js";
import type { MetadataProvider } from "./metadata/provider.js";
import type { Metadata, Scheme } from "./types.js";
import {
  FileNotValidError,
  formatErrorMessage,
  MissingMetadataError,
  type UnsupportedFileTypeError,
} from "./errors.js";
import { formatMetadataValue } from "./metadata/format.js";
import { sanitizeFilename } from "./sanitize.js";

export type SkipError = FileNotValidError | UnsupportedFileTypeError | MissingMetadataError;

export type FilenameResolution = { ok: true; filename: string } | { ok: false; error: SkipError };

export type GenerateDeps = {
  provider: MetadataProvider;
  fs: RenameFileSystem;
  subChar: string;
  logger: SubsystemLogger;
};

function skip(error: SkipError, logger: SubsystemLogger): FilenameResolution {
  logger.warn(`Ignoring file: ${error.message}`);
  return { ok: false, error };
}

/**
 * Concatenate the scheme against already-loaded metadata. Returns the unsanitized
 * base name, or the first key with no text value.
 */
export function applyScheme(
  scheme: Scheme,
  metadata: Metadata,
): { ok: true; name: string } | { ok: false; key: string } {
  let name = "";
  for (const token of scheme) {
    if (token.kind === "literal") {
      name += token.text;
      continue;
    }
    const text = Object.hasOwn(metadata, token.name)
      ? formatMetadataValue(metadata[token.name])
      : null;
    if (text === null) {
      return { ok: false, key: token.name };
    }
    name += text;
  }
  return { ok: true, name };
}

/**
 * Resolve the new filename for one file. Every failure is returned as a skip and
 * logged; nothing is thrown for a bad file.
 */
export async function resolveFilename(
  filePath: unknown,
  scheme: Scheme,
  deps: GenerateDeps,
): Promise<FilenameResolution> {
  const { fs, provider, logger } = deps;

  if (typeof filePath !== "string" || !(await fs.isFile(filePath))) {
    return skip(
      new FileNotValidError(filePath, `Could not access specified file: ${String(filePath)}`),
      logger,
    );
  }

  const absolute = fs.absolutePath(filePath);
  let metadata: Metadata;
  try {
    const lookup = await provider.lookup(absolute);
    if (!lookup.ok) {
      return skip(lookup.error, logger);
    }
    metadata = lookup.metadata;
  } catch (err) {
    return skip(
      new FileNotValidError(
        filePath,
        `Could not read metadata from ${filePath}: ${formatErrorMessage(err)}`,
        { cause: err },
      ),
      logger,
    );
  }

  const applied = applyScheme(scheme, metadata);
  if (!applied.ok) {
    return skip(new MissingMetadataError(filePath, applied.key), logger);
  }

  const filename = sanitizeFilename(applied.name + path.extname(filePath), deps.subChar);
  logger.debug(`Resolved ${filePath} => ${filename}`);
  return { ok: true, filename };
}
