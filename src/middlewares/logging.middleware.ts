import type { NextFunction, Request, Response } from "express";
import { env } from "../config/env.js";

/**
 * Logs every request once its response is finished.
 */
export const requestLogger = (req: Request, res: Response, next: NextFunction) => {
  if (!env.LOG_REQUESTS) return next();

  const startedAt = process.hrtime.bigint();
  res.on("finish", () => {
    const ms = Number(process.hrtime.bigint() - startedAt) / 1e6;
    const user = req.user?.username ?? "anonymous";
    console.log(`[HTTP]: ${req.method} ${req.originalUrl} ${res.statusCode} ${user} ${ms.toFixed(1)}ms`);
  });
  next();
};
