// src/routes.ts
import express from "express";
import type { Authenticator } from "./interfaces/authenticator.interface";
import { ContentController } from "./controllers/content.controller";
import { MediaController } from "./controllers/media.controller";
import { ListMediaQueryDto } from "./dtos/media/list-media.dto";
import { MediaIdParamsDto } from "./dtos/media/media-id.dto";
import { UpdateMediaDto } from "./dtos/media/update-media.dto";
import { UploadMediaDto } from "./dtos/media/upload-media.dto";
import { requireAuth } from "./middlewares/auth.middleware";
import { fieldsOnly, uploadSingle } from "./middlewares/upload.middleware";
import { Validator } from "./middlewares/validator";
import { asyncHandler } from "./utils/async-handler";
import { Resp } from "./utils/response.util";

export interface RouterDeps {
  apiKeyAuth: Authenticator;
  bearerAuth: Authenticator;
  mediaController: MediaController;
  contentController: ContentController;
  uploadLimitBytes: number;
}

export function createRouter({
  apiKeyAuth,
  bearerAuth,
  mediaController,
  contentController,
  uploadLimitBytes,
}: RouterDeps) {
  const router = express.Router();
  const upload = uploadSingle("file", uploadLimitBytes);

  // Public health check
  router.get("/health", (_req, res) => Resp.success({ data: { status: "ok" } }).send(res));

  // Uploads: auth first so an unauthenticated body is never read
  router.post(
    "/mobile/upload",
    requireAuth(apiKeyAuth),
    upload,
    Validator.body(UploadMediaDto),
    asyncHandler(mediaController.upload)
  );
  router.post(
    "/admin/upload",
    requireAuth(bearerAuth),
    upload,
    Validator.body(UploadMediaDto),
    asyncHandler(mediaController.upload)
  );

  // Content: public reads, bearer-protected writes
  router.get("/content", Validator.query(ListMediaQueryDto), asyncHandler(contentController.list));
  router.get("/content/:id", Validator.params(MediaIdParamsDto), asyncHandler(contentController.get));
  router.patch(
    "/content/:id",
    requireAuth(bearerAuth),
    Validator.params(MediaIdParamsDto),
    fieldsOnly(),
    Validator.body(UpdateMediaDto),
    asyncHandler(contentController.update)
  );
  router.delete(
    "/content/:id",
    requireAuth(bearerAuth),
    Validator.params(MediaIdParamsDto),
    asyncHandler(contentController.remove)
  );

  return router;
}
