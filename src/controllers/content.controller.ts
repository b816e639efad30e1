/**
 * Content controller
 *
 *  - GET    /content        -> list, optional ?category= (exact, "ALL" = any) and ?q= (title contains)
 *  - GET    /content/:id    -> single item
 *  - PATCH  /content/:id    -> update title / category (bearer)
 *  - DELETE /content/:id    -> delete record and file (bearer)
 */

import type { Request, Response } from "express";
import { ListMediaQueryDto } from "../dtos/media/list-media.dto";
import { MediaIdParamsDto } from "../dtos/media/media-id.dto";
import { UpdateMediaDto } from "../dtos/media/update-media.dto";
import { Validator } from "../middlewares/validator";
import { ContentService } from "../services/content.service";
import { Resp } from "../utils/response.util";
import { logger } from "../logger";

function actor(req: Request): string {
  const principal = req.principal;
  if (principal?.scheme === "bearer") return principal.email ?? principal.uid;
  return "unknown";
}

export class ContentController {
  constructor(private readonly contentService: ContentService) {}

  list = async (_req: Request, res: Response) => {
    const { category, q } = Validator.get(res, "query", ListMediaQueryDto);
    const items = await this.contentService.list({ category, q });
    return Resp.success({ data: items }).send(res);
  };

  get = async (_req: Request, res: Response) => {
    const { id } = Validator.get(res, "params", MediaIdParamsDto);
    const item = await this.contentService.findById(id);
    return Resp.success({ data: item }).send(res);
  };

  update = async (req: Request, res: Response) => {
    const { id } = Validator.get(res, "params", MediaIdParamsDto);
    const { title, category } = Validator.get(res, "body", UpdateMediaDto);

    const { item, changed } = await this.contentService.update(id, { title, category });
    if (changed) logger.info(`Item ${id} updated by ${actor(req)}`);

    return Resp.success({
      data: item,
      message: changed ? "Content updated" : "No changes",
    }).send(res);
  };

  remove = async (req: Request, res: Response) => {
    const { id } = Validator.get(res, "params", MediaIdParamsDto);
    const item = await this.contentService.remove(id);
    logger.info(`Item ${id} deleted by ${actor(req)}`);

    return Resp.success({ data: item, message: `Deleted ${item.title}` }).send(res);
  };
}
