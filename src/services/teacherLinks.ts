// src/services/teacherLinks.ts
import { notFound, preconditionFailed } from "../lib/httpError";

export interface TeacherSummary {
  id: string;
  fullName: string;
  contactEmail: string;
  contactPhone: string;
  subject: string;
  designation: string;
  user: string | null;
}

export interface TeacherLinkStore {
  findTeacher(teacherId: string): Promise<TeacherSummary | null>;
  findUserRole(userId: string): Promise<string | null>;
  findTeacherIdForUser(userId: string): Promise<string | null>;
  setTeacherUser(teacherId: string, userId: string | null): Promise<TeacherSummary | null>;
}

/** Ties a teacher profile to a login account with the teacher role. */
export async function linkTeacherUser(
  teacherId: string,
  userId: string,
  store: TeacherLinkStore
): Promise<TeacherSummary> {
  if (!(await store.findTeacher(teacherId))) throw notFound("Teacher not found");

  const role = await store.findUserRole(userId);
  if (role === null) throw notFound("User not found.");
  if (role !== "teacher") throw preconditionFailed("Selected user is not a Teacher.");

  const linkedTo = await store.findTeacherIdForUser(userId);
  if (linkedTo && linkedTo !== teacherId) {
    throw preconditionFailed("This user is already linked to another teacher profile.");
  }

  const teacher = await store.setTeacherUser(teacherId, userId);
  if (!teacher) throw notFound("Teacher not found");
  return teacher;
}

export async function unlinkTeacherUser(teacherId: string, store: TeacherLinkStore) {
  const teacher = await store.setTeacherUser(teacherId, null);
  if (!teacher) throw notFound("Teacher not found");
  return teacher;
}
