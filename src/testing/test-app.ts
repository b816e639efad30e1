import { once } from "node:events";
import { mkdtemp, rm } from "node:fs/promises";
import type { Server } from "node:http";
import { tmpdir } from "node:os";
import { join } from "node:path";
import type { Sequelize } from "sequelize";
import { createApp, type AppContext, type AppSettings } from "../app";
import { createSequelize } from "../db/config";
import { initMediaItemModel, type MediaItemModel } from "../models/media-item.model";
import type { TokenVerifier } from "../services/bearer-token.service";
import { ContentService } from "../services/content.service";
import { StorageService } from "../services/storage.service";

export const TEST_API_KEY = "test-api-key";
export const TEST_BEARER_TOKEN = "test-admin-token";
export const TEST_BASE_URL = "http://media.test";

export const fakeTokenVerifier: TokenVerifier = {
  async verify(token: string) {
    if (token === TEST_BEARER_TOKEN) {
      return { uid: "admin-1", email: "admin@example.com" };
    }
    throw new Error("invalid token");
  },
};

export interface TestStore {
  root: string;
  sequelize: Sequelize;
  mediaItems: typeof MediaItemModel;
  storage: StorageService;
  contentService: ContentService;
  close(): Promise<void>;
}

/**
 * In-memory SQLite plus a temp upload directory.
 */
export async function createTestStore(): Promise<TestStore> {
  const root = await mkdtemp(join(tmpdir(), "media-upload-"));
  const sequelize = createSequelize({ dialect: "sqlite", storage: ":memory:" });
  const mediaItems = initMediaItemModel(sequelize);
  await sequelize.sync();

  const storage = new StorageService(join(root, "uploads"));
  await storage.init();

  return {
    root,
    sequelize,
    mediaItems,
    storage,
    contentService: new ContentService(sequelize, mediaItems, storage, TEST_BASE_URL),
    async close() {
      await sequelize.close();
      await rm(root, { recursive: true, force: true });
    },
  };
}

export interface TestServer {
  baseUrl: string;
  context: AppContext;
  storageDir: string;
  close(): Promise<void>;
}

/**
 * The full Express app on an ephemeral loopback port.
 */
export async function startTestServer(overrides: Partial<AppSettings> = {}): Promise<TestServer> {
  const root = await mkdtemp(join(tmpdir(), "media-upload-http-"));
  const sequelize = createSequelize({ dialect: "sqlite", storage: ":memory:" });
  const storageDir = join(root, "uploads");

  const context = createApp({
    config: {
      apiKeys: [TEST_API_KEY],
      storageDir,
      publicBaseUrl: TEST_BASE_URL,
      uploadLimitBytes: 1024 * 1024,
      corsOrigins: ["*"],
      ...overrides,
    },
    sequelize,
    tokenVerifier: fakeTokenVerifier,
  });
  await sequelize.sync();
  await context.storage.init();

  const server: Server = context.app.listen(0, "127.0.0.1");
  await once(server, "listening");
  const address = server.address();
  if (!address || typeof address === "string") {
    throw new Error("Test server has no TCP address");
  }

  return {
    baseUrl: `http://127.0.0.1:${address.port}`,
    context,
    storageDir,
    async close() {
      server.closeAllConnections();
      await new Promise<void>((resolve, reject) =>
        server.close((err) => (err ? reject(err) : resolve()))
      );
      await sequelize.close();
      await rm(root, { recursive: true, force: true });
    },
  };
}
