/**
 * Atomic file I/O for the user config file
 *
 * Invariants:
 * - Writes are atomic: readers never observe partial file contents
 * - Temp files reside in the same directory as the target (same filesystem for rename)
 * - Temp files are removed on failure paths
 * - Reads are UTF-8 only; a missing file reads as null
 *
 * Pattern: write → fsync → rename → fsync directory
 */

import { randomUUID } from "node:crypto";
import * as fs from "node:fs/promises";
import { dirname, basename, join } from "node:path";
import { ConfigReadError, ConfigWriteError, DirectoryError } from "./errors.js";
import { logger } from "./observability/logs.js";

const ENABLE_DIR_FSYNC = true;

/**
 * Extract the errno code from an unknown error value
 */
export function errorCode(err: unknown): string | undefined {
  if (typeof err === "object" && err !== null && "code" in err) {
    return typeof err.code === "string" ? err.code : undefined;
  }
  return undefined;
}

/**
 * Ensure a directory exists, creating it and parent directories as needed
 */
export async function ensureDirectory(dirPath: string): Promise<void> {
  if (!dirPath) {
    throw new DirectoryError(String(dirPath), {
      cause: new TypeError("Directory path must be a non-empty string"),
    });
  }

  try {
    await fs.mkdir(dirPath, { recursive: true });
  } catch (err) {
    throw new DirectoryError(dirPath, { cause: err });
  }
}

/**
 * Atomically write content to a file using write-rename-sync
 * @throws ConfigWriteError when any step fails
 */
export async function atomicWrite(filePath: string, content: string): Promise<void> {
  const dir = dirname(filePath);
  const tmp = join(dir, `.${basename(filePath)}.${randomUUID()}.tmp`);

  await ensureDirectory(dir);

  let fileHandle: fs.FileHandle | null = null;

  try {
    // Credentials live in this file, so keep it private to the user
    fileHandle = await fs.open(tmp, "w", 0o600);
    await fileHandle.writeFile(content, "utf-8");

    try {
      await fileHandle.datasync();
    } catch (err) {
      // ENOTSUP/ENOSYS: not supported on this platform
      // EINVAL: some CIFS/FUSE mounts report this instead
      const code = errorCode(err);
      if (code === "ENOTSUP" || code === "ENOSYS" || code === "EINVAL") {
        await fileHandle.sync();
      } else {
        throw err;
      }
    }

    await fileHandle.close();
    fileHandle = null;

    // Last writer wins for concurrent invocations
    await fs.rename(tmp, filePath);

    if (ENABLE_DIR_FSYNC) {
      await syncDirectory(dir);
    }
  } catch (err) {
    if (fileHandle) {
      await fileHandle.close().catch((closeErr: unknown) => {
        logger.debug("io.close_failed", { message: String(closeErr) });
      });
    }

    await fs.unlink(tmp).catch((unlinkErr: unknown) => {
      // The temp file may never have been created
      if (errorCode(unlinkErr) !== "ENOENT") {
        logger.debug("io.cleanup_failed", { message: String(unlinkErr) });
      }
    });

    throw new ConfigWriteError(filePath, { cause: err });
  }
}

/**
 * Best-effort fsync of a directory after a rename
 */
async function syncDirectory(dir: string): Promise<void> {
  try {
    const dirHandle = await fs.open(dir, "r");
    try {
      await dirHandle.sync();
    } finally {
      await dirHandle.close();
    }
  } catch (err) {
    // EINVAL/ENOTSUP/EBADF: platform has no directory fsync
    const code = errorCode(err);
    if (code !== "EINVAL" && code !== "ENOTSUP" && code !== "EBADF" && code !== "EISDIR") {
      logger.debug("io.dir_fsync_failed", { message: `${dir}: ${String(err)}` });
    }
  }
}

/**
 * Read a UTF-8 text file
 * @returns File contents, or null when the file does not exist
 * @throws ConfigReadError for other read failures
 */
export async function readTextFile(filePath: string): Promise<string | null> {
  try {
    return await fs.readFile(filePath, "utf-8");
  } catch (err) {
    if (errorCode(err) === "ENOENT") {
      return null;
    }
    throw new ConfigReadError(filePath, { cause: err });
  }
}
