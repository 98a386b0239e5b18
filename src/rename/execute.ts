import path from "node:path";
import type { SubsystemLogger } from "../logging/logger.js";
import type { RenameFileSystem } from "./fs.js";
import type { RenamePlanInput } from "./types.js";
import { formatErrorMessage } from "./errors.js";

export type ExecuteDeps = {
  fs: RenameFileSystem;
  logger: SubsystemLogger;
};

function planEntries(plan: RenamePlanInput): Iterable<[unknown, unknown]> {
  return plan instanceof Map ? plan.entries() : Object.entries(plan);
}

/**
 * Check a planned name is a bare, non-empty file name. Returns an error message or null.
 */
export function validateNewFilename(newFilename: string): string | null {
  if (newFilename === "") {
    return "new file name is empty";
  }
  if (newFilename.includes("/") || newFilename.includes("\\")) {
    return `new file name must not contain a directory: ${newFilename}`;
  }
  if (newFilename === "." || newFilename === "..") {
    return `new file name is not a file: ${newFilename}`;
  }
  return null;
}

async function renameOne(oldPath: unknown, newFilename: unknown, deps: ExecuteDeps): Promise<void> {
  const { fs, logger } = deps;
  const ignore = (reason: string) => {
    logger.warn(`Ignoring rename for ${String(oldPath)} => ${String(newFilename)}: ${reason}`);
  };

  if (typeof oldPath !== "string" || !(await fs.isFile(oldPath))) {
    ignore(`could not access source file ${String(oldPath)}`);
    return;
  }
  if (typeof newFilename !== "string") {
    ignore("new file name is not a string");
    return;
  }
  const nameError = validateNewFilename(newFilename);
  if (nameError !== null) {
    ignore(nameError);
    return;
  }

  const source = fs.absolutePath(oldPath);
  const destination = path.join(fs.directoryOf(source), newFilename);

  if (destination !== source && (await fs.exists(destination))) {
    ignore(`destination already exists: ${destination}`);
    return;
  }

  try {
    await fs.rename(source, destination);
    logger.info(`Renamed ${source} => ${destination}`);
  } catch (err) {
    ignore(formatErrorMessage(err));
  }
}

/**
 * Rename every pair in the plan, each against its original file's directory.
 * Pairs that fail validation or the rename itself are logged and skipped; there is
 * no rollback and the destination is not re-checked afterwards.
 */
export async function executeRenames(plan: RenamePlanInput, deps: ExecuteDeps): Promise<void> {
  for (const [oldPath, newFilename] of planEntries(plan)) {
    await renameOne(oldPath, newFilename, deps);
  }
}
