// src/middleware/errorHandler.ts
import { Request, Response, NextFunction } from "express";
import mongoose from "mongoose";
import { HttpError } from "../lib/httpError";

export interface ApiErrorBody {
  success: false;
  message: string;
  code?: string;
  details?: unknown;
}

const DUPLICATE_KEY = 11000;

function toHttpError(err: unknown): HttpError {
  if (err instanceof HttpError) return err;

  if (err instanceof mongoose.Error.CastError) {
    return new HttpError(400, `Invalid value for ${err.path}`, "MALFORMED_INPUT");
  }

  if (err instanceof mongoose.Error.ValidationError) {
    const details = Object.values(err.errors).map((e) => ({
      path: e.path,
      message: e.message,
    }));
    return new HttpError(400, "Validation failed", "MALFORMED_INPUT", details);
  }

  if (err instanceof mongoose.mongo.MongoServerError && err.code === DUPLICATE_KEY) {
    return new HttpError(
      409,
      "A record with the same unique fields already exists",
      "INTEGRITY_VIOLATION",
      err.keyValue
    );
  }

  const message = err instanceof Error && err.message ? err.message : "Internal Server Error";
  return new HttpError(500, message);
}

export function errorHandler(
  err: unknown,
  req: Request,
  res: Response,
  // Express only treats four-argument middleware as an error handler
  _next: NextFunction
) {
  console.error(`[ERROR] ${req.method} ${req.url}`, err);

  const httpError = toHttpError(err);
  const body: ApiErrorBody = {
    success: false,
    message: httpError.message,
    ...(httpError.code ? { code: httpError.code } : {}),
    ...(httpError.details !== undefined ? { details: httpError.details } : {}),
  };

  res.status(httpError.statusCode).json(body);
}
