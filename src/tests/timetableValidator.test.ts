// src/tests/timetableValidator.test.ts
import {
  findSlotConflict,
  overlaps,
  resolveRoom,
  ScheduledSlot,
  SlotCandidate,
  SlotContext,
} from "../services/timetableValidator";

const candidate = (overrides: Partial<SlotCandidate> = {}): SlotCandidate => ({
  classId: "c1",
  sectionId: "s1",
  subjectId: "math",
  teacherId: "t1",
  room: { kind: "none" },
  dayOfWeek: "Mon",
  startTime: "09:00",
  endTime: "10:00",
  ...overrides,
});

const scheduled = (id: string, overrides: Partial<ScheduledSlot> = {}): ScheduledSlot => ({
  ...candidate({ classId: "c2", sectionId: "s2", teacherId: "t9", startTime: "09:30", endTime: "10:30" }),
  id,
  ...overrides,
});

const context = (overrides: Partial<SlotContext> = {}): SlotContext => ({
  existing: [],
  subjectClassId: "c1",
  roomCapacity: null,
  enrolledCount: null,
  ...overrides,
});

describe("resolveRoom", () => {
  it("prefers the structured room over a free-text name", () => {
    expect(resolveRoom("r1", "Hall")).toEqual({ kind: "room", roomId: "r1" });
    expect(resolveRoom(null, "  Hall ")).toEqual({ kind: "named", name: "Hall" });
    expect(resolveRoom(undefined, "   ")).toEqual({ kind: "none" });
    expect(resolveRoom(null, undefined)).toEqual({ kind: "none" });
  });
});

describe("overlaps", () => {
  it("treats touching ranges as free", () => {
    const a = candidate({ startTime: "09:00", endTime: "10:00" });
    expect(overlaps(a, candidate({ startTime: "10:00", endTime: "11:00" }))).toBe(false);
    expect(overlaps(a, candidate({ startTime: "08:00", endTime: "09:00" }))).toBe(false);
    expect(overlaps(a, candidate({ startTime: "09:59:59", endTime: "11:00" }))).toBe(true);
  });

  it("never overlaps across days", () => {
    expect(overlaps(candidate(), candidate({ dayOfWeek: "Tue" }))).toBe(false);
  });
});

describe("findSlotConflict", () => {
  it("accepts a slot with nothing around it", () => {
    expect(findSlotConflict(candidate(), context())).toBeNull();
  });

  it("rejects start >= end before anything else", () => {
    const expected = { field: "time", message: "Start time must be before end time." };
    expect(findSlotConflict(candidate({ startTime: "10:00", endTime: "10:00" }), context())).toEqual(expected);
    expect(
      findSlotConflict(
        candidate({ startTime: "11:00", endTime: "10:00" }),
        context({ subjectClassId: null, existing: [scheduled("e1", { teacherId: "t1" })] })
      )
    ).toEqual(expected);
  });

  it("rejects a subject from another class", () => {
    expect(findSlotConflict(candidate(), context({ subjectClassId: "c2" }))).toEqual({
      field: "subject",
      message: "Selected subject does not belong to the selected class.",
    });
    expect(findSlotConflict(candidate(), context({ subjectClassId: null }))?.field).toBe("subject");
  });

  it("reports a double-booked teacher with the other slot's range and class", () => {
    const existing = [scheduled("e1", { teacherId: "t1", classLabel: "Grade 2", sectionLabel: "B" })];
    expect(findSlotConflict(candidate(), context({ existing }))).toEqual({
      field: "teacher",
      message: "Teacher is already booked 09:30-10:30 for Grade 2 / B.",
      conflictingSlotId: "e1",
    });
  });

  it("rejects every overlapping pair for the same teacher", () => {
    const ranges: [string, string][] = [
      ["08:00", "09:01"],
      ["09:59", "11:00"],
      ["09:15", "09:45"],
      ["08:00", "12:00"],
      ["09:00", "10:00"],
    ];
    for (const [startTime, endTime] of ranges) {
      const existing = [scheduled("e1", { teacherId: "t1", startTime, endTime })];
      expect(findSlotConflict(candidate(), context({ existing }))?.field).toBe("teacher");
    }
  });

  it("ignores the slot being edited", () => {
    const existing = [scheduled("e1", { teacherId: "t1" })];
    expect(findSlotConflict(candidate({ id: "e1" }), context({ existing }))).toBeNull();
  });

  it("does not treat two unassigned teachers as the same teacher", () => {
    const existing = [scheduled("e1", { teacherId: null })];
    expect(findSlotConflict(candidate({ teacherId: null }), context({ existing }))).toBeNull();
  });

  it("reports a registered room already in use", () => {
    const existing = [scheduled("e1", { room: { kind: "room", roomId: "r1" } })];
    expect(
      findSlotConflict(candidate({ room: { kind: "room", roomId: "r1" } }), context({ existing }))
    ).toEqual({
      field: "room",
      message: "Room is already in use 09:30-10:30 by c2 / s2.",
      conflictingSlotId: "e1",
    });
    expect(
      findSlotConflict(candidate({ room: { kind: "room", roomId: "r2" } }), context({ existing }))
    ).toBeNull();
  });

  it("compares free-text rooms without case", () => {
    const existing = [scheduled("e1", { room: { kind: "named", name: "Main Hall" } })];
    const conflict = findSlotConflict(
      candidate({ room: { kind: "named", name: "main hall" } }),
      context({ existing })
    );
    expect(conflict?.field).toBe("room");
    expect(conflict?.conflictingSlotId).toBe("e1");
  });

  it("does not match a free-text name against a registered room", () => {
    const existing = [scheduled("e1", { room: { kind: "room", roomId: "r1" } })];
    expect(
      findSlotConflict(candidate({ room: { kind: "named", name: "r1" } }), context({ existing }))
    ).toBeNull();
  });

  it("rejects a second teacher for the same class/section", () => {
    const existing = [scheduled("e1", { classId: "c1", sectionId: "s1", teacherId: "t2" })];
    expect(findSlotConflict(candidate(), context({ existing }))).toEqual({
      field: "class_section",
      message: "This class/section already has another teacher 09:30-10:30.",
      conflictingSlotId: "e1",
    });
    expect(findSlotConflict(candidate({ teacherId: null }), context({ existing }))?.field).toBe(
      "class_section"
    );
  });

  it("allows the same class/section with the same teacher", () => {
    const existing = [scheduled("e1", { classId: "c1", sectionId: "s1", teacherId: null })];
    expect(findSlotConflict(candidate({ teacherId: null }), context({ existing }))).toBeNull();
  });

  it("reports teacher conflicts before class/section ones", () => {
    const existing = [
      scheduled("e1", { classId: "c1", sectionId: "s1", teacherId: "t2", startTime: "09:00", endTime: "10:00" }),
      scheduled("e2", { teacherId: "t1" }),
    ];
    expect(findSlotConflict(candidate(), context({ existing }))).toMatchObject({
      field: "teacher",
      conflictingSlotId: "e2",
    });
  });

  it("rejects a room smaller than the class/section", () => {
    const room = { kind: "room" as const, roomId: "r1" };
    expect(
      findSlotConflict(candidate({ room }), context({ roomCapacity: 30, enrolledCount: 32 }))
    ).toEqual({
      field: "room",
      message: "Room capacity (30) is less than the 32 students enrolled in this class/section.",
    });
    expect(findSlotConflict(candidate({ room }), context({ roomCapacity: 30, enrolledCount: 30 }))).toBeNull();
    expect(findSlotConflict(candidate({ room }), context({ roomCapacity: null, enrolledCount: 32 }))).toBeNull();
  });
});
