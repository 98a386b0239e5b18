import fs from "node:fs/promises";
import path from "node:path";

/** Filesystem operations the renaming engine relies on. */
export type RenameFileSystem = {
  /** True for an existing, accessible regular file. */
  isFile(filePath: string): Promise<boolean>;
  /** True when anything exists at the path. */
  exists(filePath: string): Promise<boolean>;
  absolutePath(filePath: string): string;
  directoryOf(filePath: string): string;
  rename(oldPath: string, newPath: string): Promise<void>;
};

export const nodeFileSystem: RenameFileSystem = {
  async isFile(filePath) {
    try {
      const stat = await fs.stat(filePath);
      return stat.isFile();
    } catch {
      return false;
    }
  },
  async exists(filePath) {
    try {
      await fs.lstat(filePath);
      return true;
    } catch {
      return false;
    }
  },
  absolutePath: (filePath) => path.resolve(filePath),
  directoryOf: (filePath) => path.dirname(filePath),
  rename: (oldPath, newPath) => fs.rename(oldPath, newPath),
};
