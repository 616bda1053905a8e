import type { Request, Response } from "express";
import createError from "http-errors";
import { asyncHandler } from "../utils/asyncHandler.js";
import * as noteService from "../services/note.service.js";
import { sourceTypes } from "../services/source.service.js";
import { currentUser } from "../middlewares/auth.middleware.js";
import { getLanguage } from "../middlewares/language.middleware.js";
import {
  downloadParams,
  initialQuerySchema,
  listQuerySchema,
  slugParams,
  type NoteInput,
} from "../schemas/note.schema.js";

const viewerId = (req: Request) => req.user?.id ?? null;

// GET /
export const welcome = asyncHandler(async (req: Request, res: Response) => {
  if (req.user) return res.redirect(302, `/${getLanguage(req)}/home/`);

  const query = listQuerySchema.parse(req.query);
  const [list, trends, tags] = await Promise.all([
    noteService.listNotes({ draft: false }, query, null),
    noteService.getSidenotes(null, 6),
    noteService.getTopTags(7),
  ]);

  res.status(200).json({
    success: true,
    data: { ...list, sourceTypes: sourceTypes(), trends, tags }
  });
});

// GET /home/
export const home = asyncHandler(async (req: Request, res: Response) => {
  const user = currentUser(req);
  const query = listQuerySchema.parse(req.query);

  const [list, sidenotes, tags, tagsNotes] = await Promise.all([
    noteService.listNotes({ draft: false }, query, user.id),
    noteService.getSidenotes(user.id),
    noteService.getTopTags(7),
    user.tags.length > 0
      ? noteService.listNotes({ draft: false, tagsIn: user.tags }, { order: query.order, page: 1 }, user.id)
      : Promise.resolve(null),
  ]);

  res.status(200).json({
    success: true,
    data: {
      ...list,
      sourceTypes: sourceTypes(),
      sidenotes,
      tags,
      tagsNotes: tagsNotes?.notes ?? [],
    }
  });
});

// GET /notes/new/
export const createForm = asyncHandler(async (req: Request, res: Response) => {
  const initial = await noteService.getInitialForm(initialQuerySchema.parse(req.query));
  res.status(200).json({ success: true, data: { initial, sourceTypes: sourceTypes() } });
});

// POST /notes/new/
export const create = asyncHandler(async (req: Request<{}, {}, NoteInput>, res: Response) => {
  const user = currentUser(req);
  const note = await noteService.createNote(user, req.body);
  res.status(201).json({ success: true, data: await noteService.presentNote(note, user.id) });
});

// GET /notes/:slug/
export const getOne = asyncHandler(async (req: Request, res: Response) => {
  const { slug } = slugParams.parse(req.params);
  const note = await noteService.viewNote(slug, viewerId(req));

  const [presented, sidenotes] = await Promise.all([
    noteService.presentNote(note, viewerId(req)),
    noteService.getSidenotes(viewerId(req)),
  ]);
  res.status(200).json({ success: true, data: { note: presented, sidenotes } });
});

// GET /notes/:slug/fork/
export const forkForm = asyncHandler(async (req: Request, res: Response) => {
  const { slug } = slugParams.parse(req.params);
  const initial = await noteService.getForkInitial(slug, currentUser(req).id);
  res.status(200).json({ success: true, data: { initial, sourceTypes: sourceTypes() } });
});

// POST /notes/:slug/fork/
export const fork = asyncHandler(async (req: Request<{ slug: string }, {}, NoteInput>, res: Response) => {
  const user = currentUser(req);
  const note = await noteService.createNote(user, req.body, req.params.slug);
  res.status(201).json({ success: true, data: await noteService.presentNote(note, user.id) });
});

// POST /notes/:slug/edit/
export const update = asyncHandler(async (req: Request<{ slug: string }, {}, NoteInput>, res: Response) => {
  const user = currentUser(req);
  const note = await noteService.updateNote(req.params.slug, user.id, req.body);
  res.status(200).json({ success: true, data: await noteService.presentNote(note, user.id) });
});

// POST /notes/:slug/delete/
export const remove = asyncHandler(async (req: Request, res: Response) => {
  const { slug } = slugParams.parse(req.params);
  await noteService.deleteNote(slug, currentUser(req).id);
  res.status(200).json({ success: true, redirect: `/${getLanguage(req)}/home/` });
});

// GET /notes/:slug/pin/
export const pin = asyncHandler(async (req: Request, res: Response) => {
  const { slug } = slugParams.parse(req.params);
  const state = await noteService.togglePin(slug, currentUser(req).id);
  if (state === null) throw createError(400, "Only the author can pin a note");
  res.status(200).json({ pin: state });
});

// GET /notes/:slug/like/
export const like = asyncHandler(async (req: Request, res: Response) => {
  const { slug } = slugParams.parse(req.params);
  res.status(200).json({ liked: await noteService.toggleLike(slug, currentUser(req).id) });
});

// GET /notes/:slug/bookmark/
export const bookmark = asyncHandler(async (req: Request, res: Response) => {
  const { slug } = slugParams.parse(req.params);
  res.status(200).json({ bookmarked: await noteService.toggleBookmark(slug, currentUser(req).id) });
});

// GET /notes/:slug/download/:filetype/
export const download = asyncHandler(async (req: Request, res: Response) => {
  const { slug, filetype } = downloadParams.parse(req.params);
  const user = currentUser(req);

  const file = await noteService.generateNoteFile(slug, filetype, user.id);
  if (!file) {
    console.error(`[HTTP]: view=download user=${user.username} method=${req.method} path=${req.originalUrl} Can't generate a file.`);
    throw createError(400, "Can't generate a file");
  }

  res.attachment(file.filename);
  res.type(file.contentType);
  res.status(200).send(file.content);
});
