// src/services/timetableService.ts
import { HttpError } from "../lib/httpError";
import type { DayOfWeek } from "../types/academics";
import {
  findSlotConflict,
  ScheduledSlot,
  SlotCandidate,
  SlotConflict,
} from "./timetableValidator";

/** Read-only queries the conflict check needs from persistence. */
export interface TimetableSource {
  findSlotsOnDay(day: DayOfWeek, excludeId?: string): Promise<ScheduledSlot[]>;
  findSubjectClassId(subjectId: string): Promise<string | null>;
  findRoomCapacity(roomId: string): Promise<number | null>;
  countEnrolled(classId: string, sectionId: string): Promise<number>;
}

export class TimetableConflictError extends HttpError {
  readonly conflict: SlotConflict;

  constructor(conflict: SlotConflict) {
    super(400, conflict.message, "TIMETABLE_CONFLICT", {
      field: conflict.field,
      ...(conflict.conflictingSlotId ? { conflictingSlotId: conflict.conflictingSlotId } : {}),
    });
    this.name = "TimetableConflictError";
    this.conflict = conflict;
  }
}

export async function checkSlot(
  candidate: SlotCandidate,
  source: TimetableSource
): Promise<SlotConflict | null> {
  const [existing, subjectClassId] = await Promise.all([
    source.findSlotsOnDay(candidate.dayOfWeek, candidate.id),
    source.findSubjectClassId(candidate.subjectId),
  ]);

  let roomCapacity: number | null = null;
  let enrolledCount: number | null = null;
  if (candidate.room.kind === "room") {
    roomCapacity = await source.findRoomCapacity(candidate.room.roomId);
    if (roomCapacity !== null && roomCapacity > 0) {
      enrolledCount = await source.countEnrolled(candidate.classId, candidate.sectionId);
    }
  }

  return findSlotConflict(candidate, { existing, subjectClassId, roomCapacity, enrolledCount });
}

/** Throws TimetableConflictError when the candidate cannot be scheduled. */
export async function assertSlotIsFree(candidate: SlotCandidate, source: TimetableSource) {
  const conflict = await checkSlot(candidate, source);
  if (conflict) throw new TimetableConflictError(conflict);
}

export interface Placement {
  classId: string;
  sectionId: string;
}

/** Distinct (class, section) pairs in first-seen order. */
export function distinctPlacements(
  slots: { className: { toString(): string }; section: { toString(): string } }[]
): Placement[] {
  const seen = new Map<string, Placement>();
  for (const slot of slots) {
    const placement = { classId: slot.className.toString(), sectionId: slot.section.toString() };
    seen.set(`${placement.classId}:${placement.sectionId}`, placement);
  }
  return [...seen.values()];
}
