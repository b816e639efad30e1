// src/services/storage.service.ts
/**
 * StorageService
 *
 * Owns the upload directory. Files are addressed by their storage name only
 * (a flat namespace under `root`); client-supplied names never reach the disk.
 *
 * Public API:
 *  - init()               -> create the root directory
 *  - save(name, data)     -> durable exclusive write
 *  - remove(name)         -> unlink, false when the file was already gone
 *  - read(name)           -> file contents
 *  - resolve(name)        -> absolute path (traversal-checked)
 */

import fs from "fs/promises";
import { ensureDir, removeIfExists, safeJoin, writeFileDurable } from "../utils/file-utils";

export class StorageService {
  constructor(public readonly root: string) {}

  init() {
    return ensureDir(this.root);
  }

  resolve(name: string): string {
    return safeJoin(this.root, name);
  }

  async save(name: string, data: Uint8Array): Promise<string> {
    const target = this.resolve(name);
    await writeFileDurable(target, data);
    return target;
  }

  remove(name: string): Promise<boolean> {
    return removeIfExists(this.resolve(name));
  }

  read(name: string): Promise<Buffer> {
    return fs.readFile(this.resolve(name));
  }
}
