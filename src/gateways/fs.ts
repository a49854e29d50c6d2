import { randomUUID } from "node:crypto";
import { access, copyFile, mkdir, mkdtemp, readFile, rename, rm, writeFile } from "node:fs/promises";
import path from "node:path";

import { hasErrnoCode } from "../nodePrimitives.js";

/**
 * Narrow abstraction over the Node.js filesystem API used by the pipeline.
 *
 * The dataset state machine derives its stage from {@link exists} probes, and
 * every completed artifact lands through {@link writeFileAtomic} or
 * {@link moveIntoPlace}, so a half-written file is never visible at a final
 * path. Tests inject doubles to count probes or simulate failures.
 */
export interface FileSystemGateway {
  exists(filePath: string): Promise<boolean>;
  readFileUtf8(filePath: string): Promise<string>;
  /** Creates `directory` and its parents; no-op when present. */
  ensureDirectory(directory: string): Promise<void>;
  /** Creates a fresh scratch directory under `parent`, named with `prefix`. */
  createScratchDirectory(parent: string, prefix: string): Promise<string>;
  /** Writes to a sibling temporary file, then renames it onto `filePath`. */
  writeFileAtomic(filePath: string, data: string | Uint8Array): Promise<void>;
  /** Renames `source` onto `destination`, copying across devices when needed. */
  moveIntoPlace(source: string, destination: string): Promise<void>;
  writeFileUtf8(filePath: string, data: string): Promise<void>;
  remove(target: string): Promise<void>;
}

/** Default implementation relying on the Node.js promise-based filesystem API. */
export const defaultFileSystemGateway: FileSystemGateway = {
  async exists(filePath: string): Promise<boolean> {
    try {
      await access(filePath);
      return true;
    } catch (error) {
      if (hasErrnoCode(error, "ENOENT") || hasErrnoCode(error, "ENOTDIR")) {
        return false;
      }
      throw error;
    }
  },

  async readFileUtf8(filePath: string): Promise<string> {
    return readFile(filePath, "utf8");
  },

  async ensureDirectory(directory: string): Promise<void> {
    await mkdir(directory, { recursive: true });
  },

  async createScratchDirectory(parent: string, prefix: string): Promise<string> {
    await mkdir(parent, { recursive: true });
    return mkdtemp(path.join(parent, prefix));
  },

  async writeFileAtomic(filePath: string, data: string | Uint8Array): Promise<void> {
    const temporary = path.join(path.dirname(filePath), `.${path.basename(filePath)}.${randomUUID()}.tmp`);
    try {
      await writeFile(temporary, data);
      await rename(temporary, filePath);
    } catch (error) {
      await rm(temporary, { force: true });
      throw error;
    }
  },

  async moveIntoPlace(source: string, destination: string): Promise<void> {
    try {
      await rename(source, destination);
    } catch (error) {
      if (!hasErrnoCode(error, "EXDEV")) {
        throw error;
      }
      // Scratch space on another device: copy beside the destination first so
      // the final step stays a same-directory rename.
      const staged = `${destination}.${randomUUID()}.partial`;
      try {
        await copyFile(source, staged);
        await rename(staged, destination);
      } finally {
        await rm(staged, { force: true });
      }
      await rm(source, { force: true });
    }
  },

  async writeFileUtf8(filePath: string, data: string): Promise<void> {
    await writeFile(filePath, data, "utf8");
  },

  async remove(target: string): Promise<void> {
    await rm(target, { recursive: true, force: true });
  },
};
