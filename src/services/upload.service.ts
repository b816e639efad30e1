// src/services/upload.service.ts
import { v4 as uuidv4 } from "uuid";
import type { MediaItem, UploadedFile } from "../interfaces/media-item.interface";
import { StorageFailureError, ValidationError } from "../errors/app-error";
import { storageExtension } from "../utils/file-utils";
import { ContentService } from "./content.service";
import { StorageService } from "./storage.service";
import { logger } from "../logger";

export interface UploadInput {
  title?: string;
  category?: string;
  file?: UploadedFile;
}

/**
 * Storage name: random UUID v4 plus the extension of the client's filename.
 * The client's name itself is never used on disk.
 */
export function generateStorageName(originalName?: string): string {
  return `${uuidv4()}${storageExtension(originalName)}`;
}

export class UploadService {
  constructor(
    private readonly storage: StorageService,
    private readonly content: ContentService
  ) {}

  async upload({ title, category, file }: UploadInput): Promise<MediaItem> {
    const cleanTitle = title?.trim();
    const cleanCategory = category?.trim();

    if (!cleanTitle) throw new ValidationError("title is required");
    if (!cleanCategory) throw new ValidationError("category is required");
    if (!file) throw new ValidationError("file is required");

    const storageName = generateStorageName(file.originalName);

    try {
      await this.storage.save(storageName, file.buffer);
    } catch (err) {
      throw new StorageFailureError("Failed to store uploaded file", err);
    }

    // The record is only written once the file is on disk.
    try {
      const item = await this.content.create({
        title: cleanTitle,
        category: cleanCategory,
        file_path: storageName,
      });
      logger.info(`Stored ${file.originalName} as ${storageName} (${file.size} bytes)`);
      return item;
    } catch (err) {
      await this.storage.remove(storageName).catch((cleanupErr: unknown) => {
        logger.error(`Could not remove orphaned file ${storageName}: ${String(cleanupErr)}`);
        return false;
      });
      throw new StorageFailureError("Failed to save media metadata", err);
    }
  }
}
