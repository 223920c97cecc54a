// src/validation/accounts.ts
import { z } from "zod";

export const changePasswordSchema = z
  .object({
    currentPassword: z.string().min(1, "Current password is required."),
    newPassword: z.string().min(1, "New password is required."),
  })
  .strict();

export const updateProfileSchema = z
  .object({
    email: z.string().trim().toLowerCase().email().optional(),
    phone: z.string().trim().max(20).optional(),
  })
  .strict();

export const resetPasswordSchema = z
  .object({
    // Empty or absent means "generate one"
    new_password: z
      .union([z.literal(""), z.string().min(6, "New password must be at least 6 characters long.")])
      .optional(),
  })
  .strict();
