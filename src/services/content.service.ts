// src/services/content.service.ts
import { Op, col, fn, where as sqlWhere, type Sequelize, type WhereOptions } from "sequelize";
import type { InferAttributes } from "sequelize";
import type { MediaItemModel } from "../models/media-item.model";
import type {
  CreateMediaItem,
  MediaFilter,
  MediaItem,
  UpdateMediaItem,
} from "../interfaces/media-item.interface";
import { NotFoundError, StorageFailureError } from "../errors/app-error";
import { WriteQueue } from "../utils/write-queue";
import { StorageService } from "./storage.service";
import { logger } from "../logger";

// Listing with this category returns every category.
export const ALL_CATEGORIES = "ALL";

export interface UpdateResult {
  item: MediaItem;
  changed: boolean;
}

/**
 * Metadata store for uploaded media. Reads go straight to the database;
 * inserts, updates and deletes are serialized through one write queue.
 */
export class ContentService {
  private readonly writes = new WriteQueue();

  constructor(
    private readonly sequelize: Sequelize,
    private readonly mediaItems: typeof MediaItemModel,
    private readonly storage: StorageService,
    private readonly publicBaseUrl: string
  ) {}

  toMediaItem(row: MediaItemModel): MediaItem {
    return {
      id: row.id,
      title: row.title,
      category: row.category,
      file_path: row.file_path,
      url: `${this.publicBaseUrl}/files/${encodeURIComponent(row.file_path)}`,
      uploaded_at: row.uploaded_at,
    };
  }

  async list({ category, q }: MediaFilter = {}): Promise<MediaItem[]> {
    const conditions: WhereOptions<InferAttributes<MediaItemModel>>[] = [];

    if (category && category !== ALL_CATEGORIES) {
      conditions.push({ category });
    }
    if (q) {
      conditions.push(
        sqlWhere(fn("lower", col("title")), { [Op.like]: `%${q.toLowerCase()}%` })
      );
    }

    const rows = await this.mediaItems.findAll({
      where: conditions.length ? { [Op.and]: conditions } : undefined,
      order: [["id", "ASC"]],
    });
    return rows.map((row) => this.toMediaItem(row));
  }

  async findById(id: number): Promise<MediaItem> {
    const row = await this.mediaItems.findByPk(id);
    if (!row) throw new NotFoundError();
    return this.toMediaItem(row);
  }

  create(record: CreateMediaItem): Promise<MediaItem> {
    return this.writes.run(async () => {
      const row = await this.mediaItems.create(record);
      return this.toMediaItem(row);
    });
  }

  update(id: number, fields: UpdateMediaItem): Promise<UpdateResult> {
    return this.writes.run(async () => {
      const row = await this.mediaItems.findByPk(id);
      if (!row) throw new NotFoundError();

      const changes: UpdateMediaItem = {};
      if (fields.title) changes.title = fields.title;
      if (fields.category) changes.category = fields.category;

      if (!Object.keys(changes).length) {
        return { item: this.toMediaItem(row), changed: false };
      }

      await row.update(changes);
      return { item: this.toMediaItem(row), changed: true };
    });
  }

  /**
   * Deletes the record and its backing file together. A file that is already
   * gone is not an error; any other unlink failure rolls the delete back.
   */
  remove(id: number): Promise<MediaItem> {
    return this.writes.run(() =>
      this.sequelize.transaction(async (transaction) => {
        const row = await this.mediaItems.findByPk(id, { transaction });
        if (!row) throw new NotFoundError();

        const item = this.toMediaItem(row);
        await row.destroy({ transaction });

        let removed: boolean;
        try {
          removed = await this.storage.remove(row.file_path);
        } catch (err) {
          throw new StorageFailureError("Failed to delete stored file", err);
        }
        if (!removed) {
          logger.warn(`Stored file already missing for item ${id}: ${row.file_path}`);
        }
        return item;
      })
    );
  }
}
