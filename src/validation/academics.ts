// src/validation/academics.ts
import { z } from "zod";
import { DAYS_OF_WEEK } from "../types/academics";
import { parseClock } from "../utils/clock";
import { clockSchema, objectIdSchema, optionalRefSchema } from "./common";

export const periodSchema = z
  .object({
    name: z.string().trim().min(1).max(50),
    order: z.number().int().positive(),
    startTime: clockSchema,
    endTime: clockSchema,
  })
  .strict()
  .refine((p) => parseClock(p.startTime) < parseClock(p.endTime), {
    message: "Period start_time must be before end_time.",
    path: ["startTime"],
  });

export const roomSchema = z
  .object({
    name: z.string().trim().min(1).max(50),
    capacity: z.number().int().positive().nullable().optional(),
  })
  .strict();

// start < end is left to the conflict validator so it reports field "time"
export const timetableEntrySchema = z
  .object({
    className: objectIdSchema,
    section: objectIdSchema,
    subject: objectIdSchema,
    teacher: optionalRefSchema,
    room: optionalRefSchema,
    roomName: z.string().trim().max(50).optional(),
    dayOfWeek: z.enum(DAYS_OF_WEEK),
    period: z.string().trim().max(50).optional(),
    startTime: clockSchema,
    endTime: clockSchema,
  })
  .strict();

export const timetableEntryPatchSchema = timetableEntrySchema.partial();

export type TimetableEntryInput = z.infer<typeof timetableEntrySchema>;

export const examSchema = z
  .object({
    className: objectIdSchema,
    section: objectIdSchema,
    name: z.string().trim().min(1).max(100),
    year: z.number().int().min(1900).max(9999).optional(),
    isPublished: z.boolean().optional(),
  })
  .strict();

export const examMarkSchema = z
  .object({
    exam: objectIdSchema,
    student: objectIdSchema,
    subject: objectIdSchema,
    score: z.number().min(0).max(100),
  })
  .strict();

export const gradeBandSchema = z
  .object({
    minScore: z.number().min(0).max(100),
    maxScore: z.number().min(0).max(100),
    letter: z.string().trim().min(1).max(5),
    gpa: z.number().min(0).max(10),
  })
  .strict();

export const gradeScaleSchema = z
  .object({
    name: z.string().trim().min(1).max(100),
    bands: z.array(gradeBandSchema).default([]),
  })
  .strict();

export const classSubjectSchema = z
  .object({
    className: objectIdSchema,
    section: objectIdSchema,
    subject: objectIdSchema,
    teacher: optionalRefSchema,
    order: z.number().int().nonnegative().optional(),
  })
  .strict();

export const classSubjectPatchSchema = z
  .object({
    teacher: optionalRefSchema,
    order: z.number().int().nonnegative().optional(),
  })
  .strict();

export const bulkAssignSchema = z
  .object({
    class_id: objectIdSchema,
    section_ids: z.array(objectIdSchema).min(1, "Choose at least one section."),
    subject_ids: z.array(objectIdSchema).min(1, "Choose at least one subject."),
    teacher_id: optionalRefSchema,
  })
  .strict();

export const examRoutineSchema = z
  .object({
    examName: z.string().trim().min(1).max(100),
    className: objectIdSchema,
    section: optionalRefSchema,
    subject: objectIdSchema,
    date: z.coerce.date({ invalid_type_error: "Expected a date" }),
    startTime: clockSchema,
    endTime: clockSchema,
  })
  .strict()
  .refine((r) => parseClock(r.startTime) < parseClock(r.endTime), {
    message: "Exam start_time must be before end_time.",
    path: ["startTime"],
  });

export const noticeSchema = z
  .object({
    title: z.string().trim().min(1).max(200),
    body: z.string().max(10000).optional(),
    category: z.string().trim().toLowerCase().min(1).max(50).optional(),
    publishedAt: z.coerce.date().optional(),
  })
  .strict();
