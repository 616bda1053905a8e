import type { Request, Response } from "express";
import { asyncHandler } from "../utils/asyncHandler.js";
import * as tagService from "../services/tag.service.js";
import * as noteService from "../services/note.service.js";
import { currentUser } from "../middlewares/auth.middleware.js";
import { listQuerySchema, slugParams, tagListQuerySchema } from "../schemas/note.schema.js";

// GET /tags/
export const list = asyncHandler(async (req: Request, res: Response) => {
  const { limit } = tagListQuerySchema.parse(req.query);
  res.status(200).json({ success: true, data: await noteService.getTopTags(limit) });
});

// GET /tags/:slug/
export const getOne = asyncHandler(async (req: Request, res: Response) => {
  const { slug } = slugParams.parse(req.params);
  const tag = await tagService.getTag(slug);
  const query = listQuerySchema.parse(req.query);

  const list = await noteService.listNotes({ draft: false, tag }, query, req.user?.id ?? null);
  res.status(200).json({
    success: true,
    data: { tag, followed: req.user?.tags.includes(tag) ?? false, ...list }
  });
});

// GET /tags/:slug/follow/
export const follow = asyncHandler(async (req: Request, res: Response) => {
  const { slug } = slugParams.parse(req.params);
  res.status(200).json({ followed: await tagService.toggleTagSubscription(currentUser(req).id, slug) });
});
