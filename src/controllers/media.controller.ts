/**
 * Media upload controller
 *
 * Handles:
 *  - POST /mobile/upload  (X-API-Key)
 *  - POST /admin/upload   (Authorization: Bearer <token>)
 *
 * Both routes share this handler; routes.ts mounts it behind the matching
 * authenticator, multer and body validation, in that order.
 */

import type { Request, Response } from "express";
import { UploadMediaDto } from "../dtos/media/upload-media.dto";
import { Validator } from "../middlewares/validator";
import { UploadService } from "../services/upload.service";
import { Resp } from "../utils/response.util";

export class MediaController {
  constructor(private readonly uploadService: UploadService) {}

  upload = async (req: Request, res: Response) => {
    const { title, category } = Validator.get(res, "body", UploadMediaDto);

    const item = await this.uploadService.upload({
      title,
      category,
      file: req.file && {
        originalName: req.file.originalname,
        buffer: req.file.buffer,
        size: req.file.size,
      },
    });

    return Resp.success({ data: item, message: "Upload successful" }).send(res);
  };
}
