// src/services/notices.ts
import type { UserRole } from "../models/User";

export const TEACHER_CATEGORY = "teacher";

export type NoticeFilter = { category?: string | { $ne: string } };

export const canSeeTeacherNotices = (role: UserRole | undefined) =>
  role === "admin" || role === "staff" || role === "teacher";

/**
 * The notice query for a viewer, or null when the requested category is
 * hidden from them. Anonymous viewers have no role.
 */
export function noticeFilter(category: string | undefined, role?: UserRole): NoticeFilter | null {
  const requested = category?.trim().toLowerCase();
  const privileged = canSeeTeacherNotices(role);

  if (requested) {
    return requested === TEACHER_CATEGORY && !privileged ? null : { category: requested };
  }
  return privileged ? {} : { category: { $ne: TEACHER_CATEGORY } };
}

export const isNoticeVisible = (category: string, role?: UserRole) =>
  category !== TEACHER_CATEGORY || canSeeTeacherNotices(role);
