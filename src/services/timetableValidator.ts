// src/services/timetableValidator.ts
import type { DayOfWeek, RoomAssignment } from "../types/academics";
import { formatRange, parseClock } from "../utils/clock";

export interface SlotCandidate {
  // Set when the candidate replaces an existing slot
  id?: string;
  classId: string;
  sectionId: string;
  subjectId: string;
  teacherId: string | null;
  room: RoomAssignment;
  dayOfWeek: DayOfWeek;
  startTime: string;
  endTime: string;
}

export interface ScheduledSlot extends SlotCandidate {
  id: string;
  classLabel?: string;
  sectionLabel?: string;
}

export type ConflictField = "time" | "subject" | "teacher" | "room" | "class_section";

export interface SlotConflict {
  field: ConflictField;
  message: string;
  conflictingSlotId?: string;
}

export interface SlotContext {
  /** Slots on the candidate's day; the candidate itself is ignored if present. */
  existing: ScheduledSlot[];
  /** Class the candidate's subject belongs to, null when the subject is unknown. */
  subjectClassId: string | null;
  roomCapacity: number | null;
  enrolledCount: number | null;
}

export function resolveRoom(
  roomId: string | null | undefined,
  roomName: string | null | undefined
): RoomAssignment {
  if (roomId) return { kind: "room", roomId };
  const name = roomName?.trim();
  if (name) return { kind: "named", name };
  return { kind: "none" };
}

/** Half-open interval overlap on the same day. */
export function overlaps(
  a: Pick<SlotCandidate, "dayOfWeek" | "startTime" | "endTime">,
  b: Pick<SlotCandidate, "dayOfWeek" | "startTime" | "endTime">
): boolean {
  if (a.dayOfWeek !== b.dayOfWeek) return false;
  return parseClock(a.startTime) < parseClock(b.endTime) && parseClock(a.endTime) > parseClock(b.startTime);
}

export function overlapSubset(candidate: SlotCandidate, existing: ScheduledSlot[]): ScheduledSlot[] {
  return existing.filter((slot) => slot.id !== candidate.id && overlaps(candidate, slot));
}

const sameRoom = (a: RoomAssignment, b: RoomAssignment) => {
  if (a.kind === "room") return b.kind === "room" && a.roomId === b.roomId;
  if (a.kind === "named") return b.kind === "named" && a.name.toLowerCase() === b.name.toLowerCase();
  return false;
};

const classSectionLabel = (slot: ScheduledSlot) =>
  `${slot.classLabel ?? slot.classId} / ${slot.sectionLabel ?? slot.sectionId}`;

type OverlapRule = (candidate: SlotCandidate, other: ScheduledSlot) => SlotConflict | null;

const teacherDoubleBooked: OverlapRule = (candidate, other) => {
  if (candidate.teacherId === null || other.teacherId !== candidate.teacherId) return null;
  return {
    field: "teacher",
    message: `Teacher is already booked ${formatRange(other.startTime, other.endTime)} for ${classSectionLabel(other)}.`,
    conflictingSlotId: other.id,
  };
};

const roomDoubleBooked: OverlapRule = (candidate, other) => {
  if (!sameRoom(candidate.room, other.room)) return null;
  return {
    field: "room",
    message: `Room is already in use ${formatRange(other.startTime, other.endTime)} by ${classSectionLabel(other)}.`,
    conflictingSlotId: other.id,
  };
};

const classSectionHasOtherTeacher: OverlapRule = (candidate, other) => {
  if (other.classId !== candidate.classId || other.sectionId !== candidate.sectionId) return null;
  if (other.teacherId === candidate.teacherId) return null;
  return {
    field: "class_section",
    message: `This class/section already has another teacher ${formatRange(other.startTime, other.endTime)}.`,
    conflictingSlotId: other.id,
  };
};

// Order matters: the first violated rule is the one reported
const OVERLAP_RULES: OverlapRule[] = [teacherDoubleBooked, roomDoubleBooked, classSectionHasOtherTeacher];

/**
 * Checks a candidate slot against the persisted timetable. Pure: all data is
 * supplied in `context`, and the first violation found is returned.
 */
export function findSlotConflict(candidate: SlotCandidate, context: SlotContext): SlotConflict | null {
  if (parseClock(candidate.startTime) >= parseClock(candidate.endTime)) {
    return { field: "time", message: "Start time must be before end time." };
  }

  if (context.subjectClassId !== candidate.classId) {
    return { field: "subject", message: "Selected subject does not belong to the selected class." };
  }

  const overlapping = overlapSubset(candidate, context.existing);

  for (const rule of OVERLAP_RULES) {
    for (const other of overlapping) {
      const conflict = rule(candidate, other);
      if (conflict) return conflict;
    }
  }

  const { roomCapacity, enrolledCount } = context;
  if (
    candidate.room.kind === "room" &&
    roomCapacity !== null &&
    roomCapacity > 0 &&
    enrolledCount !== null &&
    enrolledCount > roomCapacity
  ) {
    return {
      field: "room",
      message: `Room capacity (${roomCapacity}) is less than the ${enrolledCount} students enrolled in this class/section.`,
    };
  }

  return null;
}
