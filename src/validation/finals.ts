// src/validation/finals.ts
import { z } from "zod";
import type { FinalizeRequest } from "../services/finalization";
import { objectIdSchema, parseWith } from "./common";

const PARTS_MESSAGE = "parts must be a non-empty list of {exam_id, weight}.";

export const finalizePartSchema = z.object({
  exam_id: objectIdSchema,
  weight: z
    .number({ invalid_type_error: "All weights must be integers." })
    .int("All weights must be integers.")
    .nonnegative("Weights cannot be negative."),
});

export const finalizeBodySchema = z.object({
  class_id: objectIdSchema,
  section_id: objectIdSchema,
  year: z
    .number({ invalid_type_error: "year must be an integer." })
    .int("year must be an integer.")
    .min(1900)
    .max(9999),
  parts: z
    .array(finalizePartSchema, { invalid_type_error: PARTS_MESSAGE, required_error: PARTS_MESSAGE })
    .min(1, PARTS_MESSAGE),
  name: z.string().trim().max(100).optional(),
  publish: z.boolean().optional(),
});

export function parseFinalizeBody(body: unknown): FinalizeRequest {
  const data = parseWith(finalizeBodySchema, body);
  return {
    classId: data.class_id,
    sectionId: data.section_id,
    year: data.year,
    parts: data.parts.map((p) => ({ examId: p.exam_id, weight: p.weight })),
    name: data.name,
    publish: data.publish,
  };
}
