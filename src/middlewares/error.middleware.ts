import type { NextFunction, Request, Response } from "express";
import { isHttpError } from "http-errors";
import { ZodError } from "zod";
import { translate } from "../config/i18n.js";
import { FieldError } from "../utils/errors.js";
import { getLanguage } from "./language.middleware.js";
import { formatIssues } from "./validation.middleware.js";

const isDuplicateKeyError = (err: unknown): err is { code: 11000; keyValue: Record<string, unknown> } =>
  typeof err === "object" && err !== null
  && "code" in err && err.code === 11000
  && "keyValue" in err && typeof err.keyValue === "object" && err.keyValue !== null;

export const errorHandler = (err: unknown, req: Request, res: Response, _next: NextFunction) => {
  // 1. Handle Explicit Errors
  if (isHttpError(err)) {
    if (err.status >= 500) console.error(err);
    return res.status(err.status).json({
      error: err.name,
      message: err.expose ? err.message : "Something went wrong."
    });
  }

  // 2. Form errors raised by the services, same shape as the validate middleware
  if (err instanceof FieldError) {
    return res.status(400).json({
      error: "ValidationError",
      details: [{ field: err.field, message: translate(getLanguage(req), err.message) }]
    });
  }

  // 3. Handle Database Errors (MongoDB)
  if (isDuplicateKeyError(err)) {
    const field = Object.keys(err.keyValue)[0] ?? "Value";
    const capitalizedField = field.charAt(0).toUpperCase() + field.slice(1);
    return res.status(409).json({
      error: "Conflict",
      message: `${capitalizedField} already exists`
    });
  }

  // 4. Handle Validation (Zod), parsed outside the validate middleware
  if (err instanceof ZodError) {
    return res.status(400).json({
      error: "ValidationError",
      message: "Invalid input data",
      details: formatIssues(req, err, false)
    })
  }

  // 5. Catch-all
  console.error(err);
  return res.status(500).json({
    error: "InternalServerError",
    message: "Something went wrong."
  })
}
