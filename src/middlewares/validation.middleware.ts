import type { Request, Response, NextFunction } from "express";
import { z, ZodError } from "zod";
import { translate } from "../config/i18n.js";
import { getLanguage } from "./language.middleware.js";

type RequestShape = { body?: unknown; query?: unknown; params?: unknown };

/**
 * Field level messages of a validation error, in the request's language.
 * [0] of each path is 'body'/'query'/'params' when the schema wraps the request.
 */
export const formatIssues = (req: Request, error: ZodError, wrapped: boolean) =>
  error.issues.map((issue) => ({
    field: issue.path.slice(wrapped ? 1 : 0).map(String).join("."),
    message: translate(getLanguage(req), issue.message),
  }));

/**
 * Validates the request against a Zod schema.
 * Supports validating Body, Query, and Params; the parsed body replaces the raw one.
 */
export const validate = (schema: z.ZodType<RequestShape>) =>
  async (req: Request, res: Response, next: NextFunction) => {
    try {
      // parseAsync ensures we catch both sync and async validation errors
      const parsed = await schema.parseAsync({
        body: req.body,
        query: req.query,
        params: req.params,
      });
      if (parsed.body !== undefined) req.body = parsed.body;

      return next();
    } catch (error) {
      if (error instanceof ZodError) {
        return res.status(400).json({
          error: "ValidationError",
          details: formatIssues(req, error, true),
        });
      }
      return next(error);
    }
  };
