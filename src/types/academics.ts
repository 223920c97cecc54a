// src/types/academics.ts

export const DAYS_OF_WEEK = ["Mon", "Tue", "Wed", "Thu", "Fri", "Sat", "Sun"] as const;
export type DayOfWeek = (typeof DAYS_OF_WEEK)[number];

/**
 * Where a timetable slot takes place. A structured room reference wins over a
 * free-text room name; both absent means the slot has no room.
 */
export type RoomAssignment =
  | { kind: "none" }
  | { kind: "room"; roomId: string }
  | { kind: "named"; name: string };

export interface GradeBandLike {
  minScore: number;
  maxScore: number;
  letter: string;
  gpa: number;
}

export interface BandMatch {
  letter: string;
  gpa: number | null;
}
