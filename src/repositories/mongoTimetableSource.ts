// src/repositories/mongoTimetableSource.ts
import ClassName from "../models/ClassName";
import Room from "../models/Room";
import Section from "../models/Section";
import Student from "../models/Student";
import Subject from "../models/Subject";
import TimetableEntry from "../models/TimetableEntry";
import type { TimetableSource } from "../services/timetableService";
import { resolveRoom, ScheduledSlot } from "../services/timetableValidator";
import type { DayOfWeek } from "../types/academics";

// Shape shared by lean query results and hydrated documents
export interface EntryRecord {
  _id: unknown;
  className: unknown;
  section: unknown;
  subject: unknown;
  teacher?: unknown;
  room?: unknown;
  roomName?: string;
  dayOfWeek: DayOfWeek;
  startTime: string;
  endTime: string;
}

export function toScheduledSlot(
  entry: EntryRecord,
  labels?: { classLabel?: string; sectionLabel?: string }
): ScheduledSlot {
  return {
    id: String(entry._id),
    classId: String(entry.className),
    sectionId: String(entry.section),
    subjectId: String(entry.subject),
    teacherId: entry.teacher ? String(entry.teacher) : null,
    room: resolveRoom(entry.room ? String(entry.room) : null, entry.roomName),
    dayOfWeek: entry.dayOfWeek,
    startTime: entry.startTime,
    endTime: entry.endTime,
    ...labels,
  };
}

const toNameMap = (docs: { _id: unknown; name: string }[]) =>
  new Map(docs.map((d) => [String(d._id), d.name]));

export const mongoTimetableSource: TimetableSource = {
  async findSlotsOnDay(day: DayOfWeek, excludeId?: string) {
    const filter = excludeId ? { dayOfWeek: day, _id: { $ne: excludeId } } : { dayOfWeek: day };
    const entries = await TimetableEntry.find(filter).lean();

    const classIds = [...new Set(entries.map((e) => String(e.className)))];
    const sectionIds = [...new Set(entries.map((e) => String(e.section)))];
    const [classes, sections] = await Promise.all([
      ClassName.find({ _id: { $in: classIds } }).select("name").lean(),
      Section.find({ _id: { $in: sectionIds } }).select("name").lean(),
    ]);
    const classNames = toNameMap(classes);
    const sectionNames = toNameMap(sections);

    return entries.map((entry) =>
      toScheduledSlot(entry, {
        classLabel: classNames.get(String(entry.className)),
        sectionLabel: sectionNames.get(String(entry.section)),
      })
    );
  },

  async findSubjectClassId(subjectId: string) {
    const subject = await Subject.findById(subjectId).select("className").lean();
    return subject ? String(subject.className) : null;
  },

  async findRoomCapacity(roomId: string) {
    const room = await Room.findById(roomId).select("capacity").lean();
    return room?.capacity ?? null;
  },

  countEnrolled(classId: string, sectionId: string) {
    return Student.countDocuments({ className: classId, section: sectionId }).exec();
  },
};
