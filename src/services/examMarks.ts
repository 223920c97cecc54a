// src/services/examMarks.ts
import { notFound, preconditionFailed } from "../lib/httpError";
import type { BandMatch, GradeBandLike } from "../types/academics";
import { lookupBand, roundHalfUp } from "../utils/gradingCore";

export interface MarkEntry {
  examId: string;
  studentId: string;
  subjectId: string;
  score: number;
}

export interface GradedMark extends MarkEntry, BandMatch {}

export interface ExamMarkSource {
  findExam(examId: string): Promise<{ classId: string; sectionId: string; isFinal: boolean } | null>;
  findStudent(studentId: string): Promise<{ classId: string; sectionId: string } | null>;
  findSubjectClassId(subjectId: string): Promise<string | null>;
  findActiveBands(): Promise<GradeBandLike[] | null>;
  /** Inserts or replaces the mark for (exam, student, subject). */
  saveMark(mark: GradedMark): Promise<GradedMark>;
}

/**
 * Stores one component mark, graded on the active scale. Final exams are
 * written by finalization only.
 */
export async function recordExamMark(entry: MarkEntry, source: ExamMarkSource): Promise<GradedMark> {
  const exam = await source.findExam(entry.examId);
  if (!exam) throw notFound("Exam not found");
  if (exam.isFinal) throw preconditionFailed("Final results are produced by finalization only.");

  const student = await source.findStudent(entry.studentId);
  if (!student || student.classId !== exam.classId || student.sectionId !== exam.sectionId) {
    throw preconditionFailed("Student is not enrolled in the exam's class/section.");
  }

  if ((await source.findSubjectClassId(entry.subjectId)) !== exam.classId) {
    throw preconditionFailed("Selected subject does not belong to the exam's class.");
  }

  const score = roundHalfUp(entry.score);
  const band = lookupBand(await source.findActiveBands(), score);
  return source.saveMark({ ...entry, score, ...band });
}
