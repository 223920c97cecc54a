// src/validation/common.ts
import { z } from "zod";
import { malformedInput } from "../lib/httpError";
import { isClock, normalizeClock } from "../utils/clock";

export const objectIdSchema = z
  .string({ invalid_type_error: "Expected an id string" })
  .trim()
  .regex(/^[a-f\d]{24}$/i, "Invalid id");

export const optionalRefSchema = objectIdSchema.nullable().optional();

export const clockSchema = z
  .string()
  .trim()
  .refine(isClock, "Expected time as HH:MM or HH:MM:SS")
  .transform(normalizeClock);

export interface IssueDetail {
  path: string;
  message: string;
}

export const describeIssues = (error: z.ZodError): IssueDetail[] =>
  error.issues.map((issue) => ({ path: issue.path.join("."), message: issue.message }));

/** Parses `value` or throws a 400 MALFORMED_INPUT carrying the zod issues. */
export function parseWith<S extends z.ZodTypeAny>(schema: S, value: unknown): z.output<S> {
  const result = schema.safeParse(value);
  if (!result.success) {
    const details = describeIssues(result.error);
    const first = details[0];
    const message = first
      ? `${first.path ? `${first.path}: ` : ""}${first.message}`
      : "Invalid request";
    throw malformedInput(message, details);
  }
  return result.data;
}

export const idParam = (value: unknown) => parseWith(objectIdSchema, value);

/** Optional ObjectId filter from a query string; absent or empty means "no filter". */
export function optionalIdQuery(value: unknown): string | undefined {
  if (value === undefined || value === "") return undefined;
  return parseWith(objectIdSchema, value);
}

const escapeRegExp = (text: string) => text.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");

/** Case-insensitive "contains" pattern for a `?q=` search; undefined when blank. */
export function searchPattern(value: unknown): RegExp | undefined {
  if (typeof value !== "string" || !value.trim()) return undefined;
  return new RegExp(escapeRegExp(value.trim()), "i");
}

const TRUTHY = ["1", "true", "yes", "y"];

/** Reads a `?flag=` query value; absent or empty means "no filter". */
export function optionalFlagQuery(value: unknown): boolean | undefined {
  if (value === undefined || value === "") return undefined;
  return TRUTHY.includes(String(value).toLowerCase());
}
