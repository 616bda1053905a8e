import type { Request, Response } from "express";
import { asyncHandler } from "../utils/asyncHandler.js";
import * as noteService from "../services/note.service.js";
import { getSourceBySlug, sourceTypes } from "../services/source.service.js";
import { listQuerySchema, slugParams } from "../schemas/note.schema.js";

// GET /sources/:slug/
export const getOne = asyncHandler(async (req: Request, res: Response) => {
  const { slug } = slugParams.parse(req.params);
  const { id, ...source } = await getSourceBySlug(slug);
  const query = listQuerySchema.parse(req.query);

  const list = await noteService.listNotes({ draft: false, sourceId: id }, query, req.user?.id ?? null);
  res.status(200).json({
    success: true,
    data: { source, typeLabel: sourceTypes()[source.type], ...list }
  });
});
