import type { NextFunction, Request, Response } from "express";
import createError from "http-errors";

/**
 * Rejects requests that were not sent by the page's own scripts.
 */
export const ajaxRequired = (req: Request, _res: Response, next: NextFunction) => {
  if (req.get("X-Requested-With") !== "XMLHttpRequest") {
    return next(createError(400, "AJAX request required"));
  }
  next();
};
