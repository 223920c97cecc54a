// src/tests/gradingCore.test.ts
import {
  findOverlappingBands,
  lookupBand,
  roundHalfUp,
  sumWeights,
  weightedTotal,
} from "../utils/gradingCore";
import type { GradeBandLike } from "../types/academics";

const bands: GradeBandLike[] = [
  { minScore: 70, maxScore: 79, letter: "A", gpa: 4 },
  { minScore: 80, maxScore: 100, letter: "A+", gpa: 5 },
];

describe("roundHalfUp", () => {
  it("rounds halves away from zero at 2 places", () => {
    expect(roundHalfUp(84.005)).toBe(84.01);
    expect(roundHalfUp(84.004)).toBe(84);
    expect(roundHalfUp(1.115)).toBe(1.12);
    expect(roundHalfUp(2.5, 0)).toBe(3);
  });
});

describe("weightedTotal", () => {
  it("sums score × weight / 100", () => {
    expect(weightedTotal([{ score: 80, weight: 40 }, { score: 70, weight: 60 }])).toBe(74);
    expect(weightedTotal([{ score: 0, weight: 40 }, { score: 90, weight: 60 }])).toBe(54);
  });

  it("rounds a half-cent total up", () => {
    // 42.005 + 42 = 84.005
    expect(weightedTotal([{ score: 84.01, weight: 50 }, { score: 84, weight: 50 }])).toBe(84.01);
  });

  it("does not pick up binary floating point noise", () => {
    expect(weightedTotal([{ score: 33.3, weight: 30 }, { score: 66.7, weight: 70 }])).toBe(56.68);
  });

  it("sums weights", () => {
    expect(sumWeights([40, 60])).toBe(100);
    expect(sumWeights([])).toBe(0);
  });
});

describe("lookupBand", () => {
  it("maps the A+/A scale", () => {
    expect(lookupBand(bands, 74)).toEqual({ letter: "A", gpa: 4 });
    expect(lookupBand(bands, 65)).toEqual({ letter: "", gpa: null });
  });

  it("includes both band boundaries", () => {
    expect(lookupBand(bands, 70)).toEqual({ letter: "A", gpa: 4 });
    expect(lookupBand(bands, 79)).toEqual({ letter: "A", gpa: 4 });
    expect(lookupBand(bands, 80)).toEqual({ letter: "A+", gpa: 5 });
    expect(lookupBand(bands, 100)).toEqual({ letter: "A+", gpa: 5 });
  });

  it("gives no letter inside a gap between bands", () => {
    expect(lookupBand(bands, 79.5)).toEqual({ letter: "", gpa: null });
  });

  it("gives no letter without an active scale", () => {
    expect(lookupBand(null, 90)).toEqual({ letter: "", gpa: null });
    expect(lookupBand([], 90)).toEqual({ letter: "", gpa: null });
  });
});

describe("findOverlappingBands", () => {
  it("finds bands sharing a boundary", () => {
    const touching: GradeBandLike[] = [
      { minScore: 80, maxScore: 100, letter: "A+", gpa: 5 },
      { minScore: 70, maxScore: 80, letter: "A", gpa: 4 },
    ];
    expect(findOverlappingBands(touching)).toEqual([touching[1], touching[0]]);
  });

  it("accepts disjoint bands", () => {
    expect(findOverlappingBands(bands)).toBeNull();
  });
});
