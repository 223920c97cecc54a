// src/validation/directory.ts
import { z } from "zod";
import { GENDERS } from "../models/Student";
import { objectIdSchema, optionalRefSchema } from "./common";

const name = z.string().trim().min(1, "Name is required").max(255);
const optionalText = z.string().trim().max(255).optional();
const optionalEmail = z.string().trim().email().optional().or(z.literal(""));

export const sectionSchema = z.object({ name }).strict();

export const classNameSchema = z
  .object({
    name,
    sections: z.array(objectIdSchema).default([]),
  })
  .strict();

export const subjectSchema = z
  .object({
    name,
    className: objectIdSchema,
    isTheory: z.boolean().optional(),
    isPractical: z.boolean().optional(),
  })
  .strict();

export const teacherSchema = z
  .object({
    fullName: name,
    contactEmail: optionalEmail,
    contactPhone: optionalText,
    subject: optionalText,
    designation: optionalText,
    user: optionalRefSchema,
  })
  .strict();

export const studentSchema = z
  .object({
    fullName: name,
    gender: z.enum(GENDERS).optional(),
    dateOfBirth: z.coerce.date().optional(),
    className: objectIdSchema,
    section: objectIdSchema,
    rollNumber: z.number().int().positive(),
    admissionNo: z.string().trim().min(1).max(64).optional(),
    guardianName: optionalText,
    guardianPhone: optionalText,
    contactEmail: optionalEmail,
    contactPhone: optionalText,
    address: z.string().max(1000).optional(),
    user: optionalRefSchema,
  })
  .strict();

export type StudentInput = z.infer<typeof studentSchema>;

export const linkUserSchema = z
  .object({
    user_id: z
      .string({ required_error: "user_id is required.", invalid_type_error: "Expected an id string" })
      .trim()
      .regex(/^[a-f\d]{24}$/i, "Invalid id"),
  })
  .strict();

export const staffSchema = z
  .object({
    fullName: name,
    contactEmail: optionalEmail,
    contactPhone: z.string().trim().max(20).optional(),
    designation: z.string().trim().max(100).optional(),
  })
  .strict();
