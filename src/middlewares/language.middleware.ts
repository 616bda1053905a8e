import type { NextFunction, Request, Response } from "express";
import createError from "http-errors";
import { env } from "../config/env.js";
import { isLanguage } from "../config/i18n.js";

export const getLanguage = (req: Request) => req.language ?? env.DEFAULT_LANGUAGE;

/**
 * Accepts the "/:lang" prefix of localized routes; unknown languages are 404.
 */
export const languagePrefix = (req: Request<{ lang: string }>, _res: Response, next: NextFunction) => {
  const { lang } = req.params;
  if (!isLanguage(lang)) return next(createError(404, "Not Found"));

  req.language = lang;
  next();
};
