// src/utils/gradingCore.ts
import Decimal from "decimal.js";
import type { BandMatch, GradeBandLike } from "../types/academics";

export const NO_BAND: BandMatch = { letter: "", gpa: null };

export const roundHalfUp = (value: Decimal.Value, places = 2): number =>
  new Decimal(value).toDecimalPlaces(places, Decimal.ROUND_HALF_UP).toNumber();

export interface WeightedScore {
  score: number;
  // Integer percentage
  weight: number;
}

/**
 * Σ score × weight / 100, computed in decimal and rounded half-up to 2 places.
 */
export function weightedTotal(parts: WeightedScore[]): number {
  const total = parts.reduce(
    (sum, part) => sum.add(new Decimal(part.score).mul(part.weight).div(100)),
    new Decimal(0)
  );
  return roundHalfUp(total);
}

export const sumWeights = (weights: number[]) => weights.reduce((a, b) => a + b, 0);

/**
 * First band (highest minScore first) whose closed [minScore, maxScore]
 * contains the score. Scores in a gap between bands get no letter.
 */
export function lookupBand(bands: GradeBandLike[] | null, score: number): BandMatch {
  if (!bands || bands.length === 0) return NO_BAND;

  const sorted = [...bands].sort((a, b) => b.minScore - a.minScore);
  const band = sorted.find((b) => b.minScore <= score && score <= b.maxScore);
  return band ? { letter: band.letter, gpa: band.gpa } : NO_BAND;
}

/** Returns the first pair of bands whose closed ranges intersect, if any. */
export function findOverlappingBands(
  bands: GradeBandLike[]
): [GradeBandLike, GradeBandLike] | null {
  const sorted = [...bands].sort((a, b) => a.minScore - b.minScore);
  for (let i = 1; i < sorted.length; i++) {
    const previous = sorted[i - 1];
    const current = sorted[i];
    if (current.minScore <= previous.maxScore) return [previous, current];
  }
  return null;
}
