// src/lib/httpError.ts

export type ErrorCode =
  | "MALFORMED_INPUT"
  | "PRECONDITION_FAILED"
  | "TIMETABLE_CONFLICT"
  | "INTEGRITY_VIOLATION"
  | "NOT_FOUND"
  | "UNAUTHENTICATED"
  | "FORBIDDEN";

export class HttpError extends Error {
  readonly statusCode: number;
  readonly code?: ErrorCode;
  readonly details?: unknown;

  constructor(statusCode: number, message: string, code?: ErrorCode, details?: unknown) {
    super(message);
    this.name = "HttpError";
    this.statusCode = statusCode;
    this.code = code;
    this.details = details;
  }
}

export const malformedInput = (message: string, details?: unknown) =>
  new HttpError(400, message, "MALFORMED_INPUT", details);

export const preconditionFailed = (message: string) =>
  new HttpError(400, message, "PRECONDITION_FAILED");

export const notFound = (message: string) => new HttpError(404, message, "NOT_FOUND");

export const unauthenticated = (message = "Not authenticated") =>
  new HttpError(401, message, "UNAUTHENTICATED");
