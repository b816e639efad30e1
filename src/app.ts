// src/app.ts
import express from "express";
import bodyParser from "body-parser";
import cors from "cors";
import morgan from "morgan";
import type { Sequelize } from "sequelize";
import type { AppConfig } from "./config";
import { ContentController } from "./controllers/content.controller";
import { MediaController } from "./controllers/media.controller";
import { errorHandler, notFoundHandler } from "./middlewares/error.middleware";
import { initMediaItemModel } from "./models/media-item.model";
import { createRouter } from "./routes";
import { ApiKeyService, StaticKeyAuthenticator } from "./services/api-key.service";
import { BearerTokenAuthenticator, type TokenVerifier } from "./services/bearer-token.service";
import { ContentService } from "./services/content.service";
import { StorageService } from "./services/storage.service";
import { UploadService } from "./services/upload.service";
import { stream } from "./logger";

export type AppSettings = Pick<
  AppConfig,
  "apiKeys" | "storageDir" | "publicBaseUrl" | "uploadLimitBytes" | "corsOrigins"
>;

export interface AppDeps {
  config: AppSettings;
  sequelize: Sequelize;
  tokenVerifier: TokenVerifier;
}

export interface AppContext {
  app: express.Express;
  storage: StorageService;
  contentService: ContentService;
  uploadService: UploadService;
}

/**
 * Wires services, controllers and routes. The caller owns the database
 * (sync/close) and the HTTP server.
 */
export function createApp({ config, sequelize, tokenVerifier }: AppDeps): AppContext {
  const mediaItems = initMediaItemModel(sequelize);
  const storage = new StorageService(config.storageDir);
  const contentService = new ContentService(sequelize, mediaItems, storage, config.publicBaseUrl);
  const uploadService = new UploadService(storage, contentService);

  const app = express();
  app.disable("x-powered-by");

  app.use((_req, res, next) => {
    res.reqStartTime = Date.now();
    next();
  });
  app.use(morgan("combined", { stream }));
  app.use(cors({ origin: config.corsOrigins.includes("*") ? "*" : config.corsOrigins }));
  app.use(bodyParser.json({ limit: "1mb" }));
  app.use(bodyParser.urlencoded({ extended: true }));

  app.use("/files", express.static(storage.root, { index: false, dotfiles: "deny" }));

  app.use(
    createRouter({
      apiKeyAuth: new StaticKeyAuthenticator(new ApiKeyService(config.apiKeys)),
      bearerAuth: new BearerTokenAuthenticator(tokenVerifier),
      mediaController: new MediaController(uploadService),
      contentController: new ContentController(contentService),
      uploadLimitBytes: config.uploadLimitBytes,
    })
  );

  app.use(notFoundHandler);
  app.use(errorHandler);

  return { app, storage, contentService, uploadService };
}
