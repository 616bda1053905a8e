import type { Request, Response } from "express";
import createError from "http-errors";
import { asyncHandler } from "../utils/asyncHandler.js";
import * as userService from "../services/user.service.js";
import * as noteService from "../services/note.service.js";
import { getFeed } from "../services/action.service.js";
import { currentUser } from "../middlewares/auth.middleware.js";
import { getLanguage } from "../middlewares/language.middleware.js";
import { listQuerySchema } from "../schemas/note.schema.js";
import { pageQuerySchema, userSlugParams, type UpdateProfileInput } from "../schemas/user.schema.js";
import { userSlug } from "../utils/username.js";

// GET /users/:slug/
export const profile = asyncHandler(async (req: Request, res: Response) => {
  const { slug } = userSlugParams.parse(req.params);
  if (req.user && userSlug(req.user.username) === slug) {
    return res.redirect(302, `/${getLanguage(req)}/me/`);
  }

  const user = await userService.getUserBySlug(slug);
  const viewerId = req.user?.id ?? null;
  const query = listQuerySchema.parse(req.query);
  const publicNotes = { authorId: user.id, draft: false, anonymous: false };

  const [header, list, pins, sidenotes] = await Promise.all([
    userService.getProfile(user, viewerId),
    noteService.listNotes(publicNotes, query, viewerId),
    noteService.listNotes({ ...publicNotes, pin: true }, { order: query.order, page: 1 }, viewerId),
    noteService.getSidenotes(viewerId),
  ]);

  res.status(200).json({
    success: true,
    data: { user: header, ...list, pins: pins.notes, sidenotes }
  });
});

// GET /me/
export const personal = asyncHandler(async (req: Request, res: Response) => {
  const user = currentUser(req);
  const query = listQuerySchema.parse(req.query);
  const firstPage = { order: query.order, page: 1 };

  const [account, list, pins, drafts, bookmarks, sidenotes] = await Promise.all([
    userService.getAccount(user),
    noteService.listNotes({ authorId: user.id, draft: false }, query, user.id),
    noteService.listNotes({ authorId: user.id, pin: true }, firstPage, user.id),
    noteService.listNotes({ authorId: user.id, draft: true }, firstPage, user.id),
    noteService.listNotes({ bookmarkedBy: user.id, visibleTo: user.id }, firstPage, user.id),
    noteService.getSidenotes(user.id),
  ]);

  res.status(200).json({
    success: true,
    data: {
      user: account,
      ...list,
      pins: pins.notes,
      drafts: drafts.notes,
      bookmarks: bookmarks.notes,
      sidenotes,
    }
  });
});

// PATCH /me/profile/
export const updateProfile = asyncHandler(async (req: Request<{}, {}, UpdateProfileInput>, res: Response) => {
  const account = await userService.updateProfile(currentUser(req).id, req.body);
  res.status(200).json({ success: true, data: account });
});

// GET /users/:slug/follow/
export const follow = asyncHandler(async (req: Request, res: Response) => {
  const { slug } = userSlugParams.parse(req.params);
  res.status(200).json({ followed: await userService.toggleFollow(currentUser(req).id, slug) });
});

// GET /users/:slug/followers/
export const followers = asyncHandler(async (req: Request, res: Response) => {
  const { slug } = userSlugParams.parse(req.params);
  res.status(200).json({ success: true, data: await userService.listFollowers(slug) });
});

// GET /users/:slug/following/
export const following = asyncHandler(async (req: Request, res: Response) => {
  const { slug } = userSlugParams.parse(req.params);
  res.status(200).json({ success: true, data: await userService.listFollowing(slug) });
});

// GET /feed/
export const feed = asyncHandler(async (req: Request, res: Response) => {
  const { page } = pageQuerySchema.parse(req.query);
  const result = await getFeed(currentUser(req).id, page);
  if (page > result.pagination.pages) throw createError(404, "Invalid page");
  res.status(200).json({ success: true, data: result });
});
