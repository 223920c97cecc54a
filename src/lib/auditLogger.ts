// src/lib/auditLogger.ts
import { Request } from "express";
import mongoose from "mongoose";
import AuditLog from "../models/AuditLog";

export type AuditAction =
  | "login_success"
  | "logout"
  | "user_created"
  | "user_role_changed"
  | "user_status_changed"
  | "password_changed"
  | "password_reset"
  | "profile_updated"
  | "teacher_user_linked"
  | "teacher_user_unlinked"
  | "class_subjects_assigned"
  | "timetable_entry_created"
  | "timetable_entry_updated"
  | "timetable_entry_deleted"
  | "grade_scale_activated"
  | "finals_published";

export async function logAudit(
  req: Request,
  {
    action,
    actor,
    targetUser,
    details = {},
  }: {
    action: AuditAction;
    actor?: mongoose.Types.ObjectId;
    targetUser?: mongoose.Types.ObjectId;
    details?: Record<string, unknown>;
  }
): Promise<void> {
  const forwarded = req.headers["x-forwarded-for"];
  const ip =
    (Array.isArray(forwarded) ? forwarded[0] : forwarded) ||
    req.socket.remoteAddress ||
    req.ip;

  const actorId = actor || req.user?._id;

  try {
    await AuditLog.create({
      action,
      // Empty refs are left out so the schema doesn't store nulls
      ...(actorId && { actor: actorId }),
      ...((targetUser || actorId) && { targetUser: targetUser || actorId }),
      details,
      ip,
      userAgent: req.headers["user-agent"],
    });
  } catch (err) {
    console.error("[audit] Audit log failed:", err);
  }
}
