// src/services/finalization.ts
import { preconditionFailed } from "../lib/httpError";
import type { BandMatch, GradeBandLike } from "../types/academics";
import { lookupBand, sumWeights, weightedTotal } from "../utils/gradingCore";

export interface FinalizationPart {
  examId: string;
  weight: number;
}

export interface FinalizeRequest {
  classId: string;
  sectionId: string;
  year: number;
  parts: FinalizationPart[];
  name?: string;
  publish?: boolean;
}

export interface FinalizationResult {
  finalExamId: string;
  finalExamName: string;
  published: boolean;
  upserts: number;
}

export interface ExamRef {
  id: string;
  name: string;
  isPublished: boolean;
}

export interface ComponentMark {
  examId: string;
  studentId: string;
  subjectId: string;
  score: number;
}

export interface FinalMarkRow extends BandMatch {
  examId: string;
  studentId: string;
  subjectId: string;
  score: number;
}

/** Everything finalization reads and writes, scoped to one transaction. */
export interface FinalizationSource {
  classExists(classId: string): Promise<boolean>;
  sectionExists(sectionId: string): Promise<boolean>;
  findExistingExamIds(examIds: string[]): Promise<string[]>;
  findStudentIds(classId: string, sectionId: string): Promise<string[]>;
  findSubjectIds(classId: string): Promise<string[]>;
  findMarks(examIds: string[]): Promise<ComponentMark[]>;
  findActiveBands(): Promise<GradeBandLike[] | null>;
  getOrCreateFinalExam(key: {
    classId: string;
    sectionId: string;
    name: string;
    year: number;
  }): Promise<ExamRef>;
  upsertMarks(rows: FinalMarkRow[]): Promise<void>;
  publishExam(examId: string): Promise<void>;
}

export interface FinalizationStore {
  /** Runs `work` atomically: if it throws, nothing it wrote is kept. */
  transaction<T>(work: (source: FinalizationSource) => Promise<T>): Promise<T>;
}

export const defaultFinalName = (year: number) => `Final Result ${year}`;

const markKey = (examId: string, studentId: string, subjectId: string) =>
  `${examId}:${studentId}:${subjectId}`;

export function assertWeightsSumTo100(parts: FinalizationPart[]) {
  if (parts.length === 0) {
    throw preconditionFailed("parts must be a non-empty list of {exam_id, weight}.");
  }
  const total = sumWeights(parts.map((p) => p.weight));
  if (total !== 100) {
    throw preconditionFailed(`Weights must sum to 100 (got ${total}).`);
  }
}

/**
 * Combines component exams into a synthetic final exam for one class/section:
 * every (student, subject) gets Σ score × weight / 100, a letter and a GPA from
 * the active grade scale. Missing component marks count as 0.
 */
export async function finalizeAndPublish(
  request: FinalizeRequest,
  store: FinalizationStore
): Promise<FinalizationResult> {
  const { classId, sectionId, year, parts } = request;
  assertWeightsSumTo100(parts);

  const examIds = [...new Set(parts.map((p) => p.examId))];
  const finalName = request.name?.trim() || defaultFinalName(year);
  const publish = request.publish ?? true;

  // Reads run one at a time: a transaction session does not take parallel operations
  return store.transaction(async (source) => {
    if (!(await source.classExists(classId))) throw preconditionFailed("Invalid class_id.");
    if (!(await source.sectionExists(sectionId))) throw preconditionFailed("Invalid section_id.");

    // A repeated exam id is reported like a missing one
    const existingExamIds = await source.findExistingExamIds(examIds);
    if (existingExamIds.length !== parts.length) {
      throw preconditionFailed("One or more exam_id not found.");
    }

    const studentIds = await source.findStudentIds(classId, sectionId);
    const subjectIds = await source.findSubjectIds(classId);
    if (studentIds.length === 0 || subjectIds.length === 0) {
      throw preconditionFailed("No students or subjects found for this class/section.");
    }

    const scores = new Map<string, number>();
    for (const mark of await source.findMarks(examIds)) {
      scores.set(markKey(mark.examId, mark.studentId, mark.subjectId), mark.score);
    }

    const finalExam = await source.getOrCreateFinalExam({
      classId,
      sectionId,
      name: finalName,
      year,
    });
    if (examIds.includes(finalExam.id)) {
      throw preconditionFailed(`"${finalName}" is one of the component exams; choose another name.`);
    }

    const bands = await source.findActiveBands();
    const bandCache = new Map<number, BandMatch>();
    const rows: FinalMarkRow[] = [];

    for (const studentId of studentIds) {
      for (const subjectId of subjectIds) {
        const score = weightedTotal(
          parts.map((part) => ({
            score: scores.get(markKey(part.examId, studentId, subjectId)) ?? 0,
            weight: part.weight,
          }))
        );

        let band = bandCache.get(score);
        if (!band) {
          band = lookupBand(bands, score);
          bandCache.set(score, band);
        }

        rows.push({ examId: finalExam.id, studentId, subjectId, score, ...band });
      }
    }

    await source.upsertMarks(rows);

    let published = finalExam.isPublished;
    if (publish && !published) {
      await source.publishExam(finalExam.id);
      published = true;
    }

    return {
      finalExamId: finalExam.id,
      finalExamName: finalExam.name,
      published,
      upserts: rows.length,
    };
  });
}
