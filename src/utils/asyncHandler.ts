import type { NextFunction, Request, Response } from "express";

/**
 * Forwards rejections of an async route handler to the error middleware.
 */
export const asyncHandler = <Req extends Request>(
  fn: (req: Req, res: Response, next: NextFunction) => Promise<unknown>
) =>
  (req: Req, res: Response, next: NextFunction) => {
    fn(req, res, next).catch(next);
  };
