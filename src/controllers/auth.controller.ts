import type { NextFunction, Request, Response } from "express";
import createError from "http-errors";
import * as authService from "../services/auth.service.js";
import { asyncHandler } from "../utils/asyncHandler.js";
import { SESSION_COOKIE, getCookieOptions } from "../middlewares/auth.middleware.js";
import { getLanguage } from "../middlewares/language.middleware.js";
import {
  validateEmailQuery,
  type SigninInput,
  type SignupInput,
  type SignupRequestInput,
} from "../schemas/auth.schema.js";

const getMeta = (req: Request) => ({
  ip: req.ip || req.get("x-forwarded-for") || "",
  deviceInfo: req.get("x-device-info") || req.get("user-agent") || "Unknown"
});

const welcomeUrl = (req: Request) => `/${getLanguage(req)}/`;

// POST /users/signup-request/
export const signupRequest = asyncHandler(async (req: Request<{}, {}, SignupRequestInput>, res: Response) => {
  const msg = await authService.requestSignup(req.body.email, getLanguage(req));
  res.status(200).json({ msg });
});

// GET /users/validate-email/?email=
export const validateEmail = asyncHandler(async (req: Request, res: Response) => {
  const { email } = validateEmailQuery.parse(req.query);
  res.status(200).json({ is_taken: await authService.isEmailTaken(email) });
});

// GET /users/signup/:token/
export const signupForm = asyncHandler(async (req: Request<{ token: string }>, res: Response) => {
  const email = await authService.checkSignupToken(req.params.token);
  if (!email) return res.redirect(302, `${welcomeUrl(req)}?signup=invalid`);

  res.status(200).json({ email, error: null });
});

/**
 * Sends unknown or expired signup links back to the welcome page before the form is read.
 */
export const signupTokenRequired = asyncHandler(
  async (req: Request<{ token: string }>, res: Response, next: NextFunction) => {
    const email = await authService.checkSignupToken(req.params.token);
    if (!email) return res.redirect(302, `${welcomeUrl(req)}?signup=invalid`);
    next();
  }
);

// POST /users/signup/:token/
export const signup = asyncHandler(async (req: Request<{ token: string }, {}, SignupInput>, res: Response) => {
  const result = await authService.completeSignup(req.params.token, req.body, getMeta(req));
  res.cookie(SESSION_COOKIE, result.sessionToken, getCookieOptions(result.expiresAt));

  res.status(201).json({
    success: true,
    data: { user: result.user, redirect: `/${getLanguage(req)}/home/` }
  });
});

// POST /users/signin/
export const signin = asyncHandler(async (req: Request<{}, {}, SigninInput>, res: Response) => {
  const { email, password } = req.body;
  const result = await authService.signin(email, password, getMeta(req));

  if (result.code === "success") {
    res.cookie(SESSION_COOKIE, result.sessionToken, getCookieOptions(result.expiresAt));
  }
  res.status(200).json({ code: result.code });
});

// Any other method on /users/signin/
export const signinBadRequest = (_req: Request, _res: Response) => {
  throw createError(400, "Signin accepts AJAX POST requests only");
};

// GET /users/signout/
export const signout = asyncHandler(async (req: Request, res: Response) => {
  if (req.sessionJti) {
    await authService.signout(req.sessionJti);
  }
  res.clearCookie(SESSION_COOKIE, getCookieOptions());
  res.redirect(302, welcomeUrl(req));
});
