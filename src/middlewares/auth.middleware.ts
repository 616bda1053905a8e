import type { CookieOptions, NextFunction, Request, Response } from "express";
import { env } from "../config/env.js";
import { getRepositories } from "../repositories/index.js";
import { resolveSession } from "../services/token.service.js";
import { asyncHandler } from "../utils/asyncHandler.js";
import { getLanguage } from "./language.middleware.js";

export const SESSION_COOKIE = "session";

export const getCookieOptions = (expires?: Date): CookieOptions => ({
  httpOnly: true,
  // Plain http only outside production
  secure: env.NODE_ENV === "production",
  sameSite: "lax",
  path: "/",
  ...(expires ? { expires } : {}),
});

const readToken = (req: Request): string | null => {
  const cookie: unknown = req.cookies?.[SESSION_COOKIE];
  if (typeof cookie === "string" && cookie) return cookie;

  const authHeader = req.headers.authorization;
  if (authHeader?.startsWith("Bearer ")) return authHeader.slice("Bearer ".length);

  return null;
};

/**
 * Resolves the signed-in user, if any. Stale cookies are dropped, never rejected.
 */
export const loadUser = asyncHandler(async (req: Request, res: Response, next: NextFunction) => {
  const token = readToken(req);
  if (!token) return next();

  const session = await resolveSession(token);
  const user = session ? await getRepositories().users.findById(session.userId) : null;

  if (session && user) {
    req.user = user;
    req.sessionJti = session.jti;
  } else if (req.cookies?.[SESSION_COOKIE]) {
    res.clearCookie(SESSION_COOKIE, getCookieOptions());
  }
  next();
});

/**
 * Anonymous visitors are sent to the welcome page, which carries the signin form.
 */
export const requireAuth = (req: Request, res: Response, next: NextFunction) => {
  if (req.user) return next();

  const target = encodeURIComponent(req.originalUrl);
  return res.redirect(302, `/${getLanguage(req)}/?next=${target}`);
};

/**
 * The signed-in user of a request that went through `requireAuth`.
 */
export const currentUser = (req: Request) => {
  if (!req.user) throw new Error("requireAuth must run before currentUser");
  return req.user;
};
