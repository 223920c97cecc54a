// src/services/classSubjects.ts
import { preconditionFailed } from "../lib/httpError";

export interface BulkAssignRequest {
  classId: string;
  sectionIds: string[];
  subjectIds: string[];
  teacherId?: string | null;
}

export interface Assignment {
  sectionId: string;
  subjectId: string;
}

export interface ClassSubjectStore {
  /** Null when the class does not exist. */
  findClassSectionIds(classId: string): Promise<string[] | null>;
  findClassSubjectIds(classId: string): Promise<string[]>;
  /**
   * Creates the missing (section, subject) rows in one transaction and
   * returns how many were new.
   */
  createMissing(classId: string, assignments: Assignment[], teacherId: string | null): Promise<number>;
}

/** Throws unless every section and subject belongs to the class. */
export async function assertAssignable(
  classId: string,
  sectionIds: string[],
  subjectIds: string[],
  store: ClassSubjectStore
) {
  const classSections = await store.findClassSectionIds(classId);
  if (!classSections) throw preconditionFailed("Invalid class_id.");

  const foreignSection = sectionIds.find((id) => !classSections.includes(id));
  if (foreignSection) {
    throw preconditionFailed(`Section id ${foreignSection} is not attached to class id ${classId}.`);
  }

  const classSubjects = await store.findClassSubjectIds(classId);
  const foreignSubject = subjectIds.find((id) => !classSubjects.includes(id));
  if (foreignSubject) {
    throw preconditionFailed(`Subject id ${foreignSubject} does not belong to class id ${classId}.`);
  }
}

/** Every (section, subject) pair once, sections outermost. */
export function planAssignments(sectionIds: string[], subjectIds: string[]): Assignment[] {
  const sections = [...new Set(sectionIds)];
  const subjects = [...new Set(subjectIds)];
  return sections.flatMap((sectionId) => subjects.map((subjectId) => ({ sectionId, subjectId })));
}

/** Assigns each subject to each section; existing pairs are left as they are. */
export async function bulkAssignSubjects(request: BulkAssignRequest, store: ClassSubjectStore) {
  const { classId, sectionIds, subjectIds } = request;
  await assertAssignable(classId, sectionIds, subjectIds, store);

  const assignments = planAssignments(sectionIds, subjectIds);
  const created = await store.createMissing(classId, assignments, request.teacherId ?? null);
  return { created, skipped_existing: assignments.length - created };
}
