// src/services/gradeScales.ts
import { notFound, preconditionFailed } from "../lib/httpError";
import type { GradeBandLike } from "../types/academics";
import { findOverlappingBands } from "../utils/gradingCore";

export interface GradeScaleInput {
  name: string;
  bands: GradeBandLike[];
}

export interface GradeScaleRecord extends GradeScaleInput {
  id: string;
  isActive: boolean;
}

export interface GradeScaleStore {
  list(): Promise<GradeScaleRecord[]>;
  findById(id: string): Promise<GradeScaleRecord | null>;
  findActive(): Promise<GradeScaleRecord | null>;
  /** New scales start inactive. */
  create(input: GradeScaleInput): Promise<GradeScaleRecord>;
  /** Leaves `isActive` as it is. */
  update(id: string, input: GradeScaleInput): Promise<GradeScaleRecord | null>;
  remove(id: string): Promise<void>;
  /**
   * Deactivates every other scale and activates `id` in one transaction.
   * Resolves null when the scale does not exist.
   */
  activateExclusive(id: string): Promise<GradeScaleRecord | null>;
}

const describeBand = (band: GradeBandLike) => `${band.letter} [${band.minScore}, ${band.maxScore}]`;

export function assertBandsValid(bands: GradeBandLike[]) {
  for (const band of bands) {
    if (band.minScore > band.maxScore) {
      throw preconditionFailed(`Band ${describeBand(band)} has minScore above maxScore.`);
    }
  }

  const overlap = findOverlappingBands(bands);
  if (overlap) {
    const [a, b] = overlap;
    throw preconditionFailed(`Bands ${describeBand(a)} and ${describeBand(b)} overlap.`);
  }
}

export async function loadActiveBands(store: GradeScaleStore): Promise<GradeBandLike[] | null> {
  const scale = await store.findActive();
  return scale ? scale.bands : null;
}

export async function createGradeScale(input: GradeScaleInput, store: GradeScaleStore) {
  assertBandsValid(input.bands);
  return store.create(input);
}

export async function updateGradeScale(id: string, input: GradeScaleInput, store: GradeScaleStore) {
  assertBandsValid(input.bands);
  const scale = await store.update(id, input);
  if (!scale) throw notFound("Grade scale not found");
  return scale;
}

export async function deleteGradeScale(id: string, store: GradeScaleStore) {
  const scale = await store.findById(id);
  if (!scale) throw notFound("Grade scale not found");
  if (scale.isActive) throw preconditionFailed("The active grade scale cannot be deleted.");
  await store.remove(id);
}

/** Makes one scale the only active one. */
export async function activateGradeScale(id: string, store: GradeScaleStore) {
  const scale = await store.activateExclusive(id);
  if (!scale) throw notFound("Grade scale not found");
  return scale;
}
