// src/utils/file-utils.ts
/**
 * File / path utilities used by the storage service.
 *
 *  - ensureDir: create directories recursively
 *  - safeJoin: join paths but prevent path traversal outside root
 *  - storageExtension: the extension kept from a client-supplied filename
 *  - writeFileDurable: exclusive create + fsync, partial file removed on failure
 *  - removeIfExists: unlink that treats "already gone" as success
 */

import fs from "fs/promises";
import path from "path";

export async function ensureDir(dirPath: string): Promise<void> {
  await fs.mkdir(dirPath, { recursive: true });
}

/**
 * Join `relativePath` under `root`, rejecting anything that resolves outside it.
 */
export function safeJoin(root: string, relativePath: string): string {
  const resolvedRoot = path.resolve(root);
  const resolved = path.resolve(resolvedRoot, relativePath);
  if (resolved !== resolvedRoot && !resolved.startsWith(resolvedRoot + path.sep)) {
    throw new Error(`Path escapes storage root: ${relativePath}`);
  }
  return resolved;
}

/**
 * Lower-cased extension of the basename, including the dot.
 * Anything that is not 1-10 alphanumerics is dropped: "" is returned.
 */
export function storageExtension(originalName: string | undefined): string {
  if (!originalName) return "";
  const ext = path.extname(path.basename(originalName)).toLowerCase();
  return /^\.[a-z0-9]{1,10}$/.test(ext) ? ext : "";
}

function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && "code" in err;
}

export async function removeIfExists(filePath: string): Promise<boolean> {
  try {
    await fs.unlink(filePath);
    return true;
  } catch (err) {
    if (isErrnoException(err) && err.code === "ENOENT") return false;
    throw err;
  }
}

/**
 * Write `data` to a new file at `filePath`. The file must not exist yet ("wx").
 * The handle is flushed to disk and closed on every path; if anything fails
 * the partial file is removed before the error is rethrown.
 */
export async function writeFileDurable(filePath: string, data: Uint8Array): Promise<void> {
  const handle = await fs.open(filePath, "wx");
  let complete = false;
  try {
    try {
      await handle.writeFile(data);
      await handle.sync();
    } finally {
      await handle.close();
    }
    complete = true;
  } finally {
    if (!complete) await removeIfExists(filePath);
  }
}
