// src/routes/timetable.ts
import { Router, Request, Response } from "express";
import { FilterQuery } from "mongoose";
import TimetableEntry, { ITimetableEntry } from "../models/TimetableEntry";
import ClassName from "../models/ClassName";
import Room from "../models/Room";
import Section from "../models/Section";
import Teacher from "../models/Teacher";
import Student from "../models/Student";
import { getAuthUser, requireAuth, requirePrivileged } from "../middleware/auth";
import { asyncHandler } from "../middleware/asyncHandler";
import { notFound, preconditionFailed } from "../lib/httpError";
import { logAudit } from "../lib/auditLogger";
import { idParam, optionalIdQuery, parseWith } from "../validation/common";
import {
  TimetableEntryInput,
  timetableEntryPatchSchema,
  timetableEntrySchema,
} from "../validation/academics";
import { DAYS_OF_WEEK, DayOfWeek } from "../types/academics";
import {
  assertSlotIsFree,
  distinctPlacements,
  TimetableSource,
} from "../services/timetableService";
import { resolveRoom, SlotCandidate } from "../services/timetableValidator";
import { parseClock } from "../utils/clock";
import { mongoTimetableSource } from "../repositories/mongoTimetableSource";

const isDay = (value: unknown): value is DayOfWeek =>
  typeof value === "string" && DAYS_OF_WEEK.some((day) => day === value);

function dayQuery(value: unknown): DayOfWeek | undefined {
  if (value === undefined || value === "") return undefined;
  if (!isDay(value)) throw preconditionFailed(`day must be one of ${DAYS_OF_WEEK.join(", ")}.`);
  return value;
}

export function toCandidate(data: TimetableEntryInput, id?: string): SlotCandidate {
  return {
    id,
    classId: data.className,
    sectionId: data.section,
    subjectId: data.subject,
    teacherId: data.teacher ?? null,
    room: resolveRoom(data.room, data.roomName),
    dayOfWeek: data.dayOfWeek,
    startTime: data.startTime,
    endTime: data.endTime,
  };
}

// Subject ownership is checked by the conflict validator; the rest is checked here
async function assertReferencesExist(data: TimetableEntryInput) {
  const [cls, section, teacher, room] = await Promise.all([
    ClassName.findById(data.className).select("sections").lean(),
    Section.exists({ _id: data.section }),
    data.teacher ? Teacher.exists({ _id: data.teacher }) : true,
    data.room ? Room.exists({ _id: data.room }) : true,
  ]);

  if (!cls) throw preconditionFailed("Invalid class_id.");
  if (!section) throw preconditionFailed("Invalid section_id.");
  if (!cls.sections.some((s) => String(s) === data.section)) {
    throw preconditionFailed("Selected section does not belong to the selected class.");
  }
  if (!teacher) throw preconditionFailed("Invalid teacher_id.");
  if (!room) throw preconditionFailed("Invalid room_id.");
}

// A structured room wins, so a stale free-text name is not kept beside it
const toDocument = (data: TimetableEntryInput) => ({
  ...data,
  teacher: data.teacher ?? null,
  room: data.room ?? null,
  roomName: data.room ? "" : data.roomName ?? "",
  period: data.period ?? "",
});

type StoredEntry = Pick<
  ITimetableEntry,
  "roomName" | "dayOfWeek" | "period" | "startTime" | "endTime"
> & {
  className: unknown;
  section: unknown;
  subject: unknown;
  teacher?: unknown;
  room?: unknown;
};

const toInputShape = (entry: StoredEntry) => ({
  className: String(entry.className),
  section: String(entry.section),
  subject: String(entry.subject),
  teacher: entry.teacher ? String(entry.teacher) : null,
  room: entry.room ? String(entry.room) : null,
  roomName: entry.roomName || undefined,
  dayOfWeek: entry.dayOfWeek,
  period: entry.period || undefined,
  startTime: entry.startTime,
  endTime: entry.endTime,
});

const sortByDayAndTime = <T extends { dayOfWeek: DayOfWeek; startTime: string }>(entries: T[]) =>
  entries.sort(
    (a, b) =>
      DAYS_OF_WEEK.indexOf(a.dayOfWeek) - DAYS_OF_WEEK.indexOf(b.dayOfWeek) ||
      parseClock(a.startTime) - parseClock(b.startTime)
  );

function listEntries(filter: FilterQuery<ITimetableEntry>) {
  return TimetableEntry.find(filter)
    .populate("className", "name")
    .populate("section", "name")
    .populate("subject", "name")
    .populate("teacher", "fullName")
    .populate("room", "name capacity")
    .lean();
}

export function createTimetableRouter(source: TimetableSource): Router {
  const router = Router();

  // GET /timetable?day=&class=&section=&teacher=
  router.get(
    "/",
    requireAuth,
    asyncHandler(async (req: Request, res: Response) => {
      const filter: FilterQuery<ITimetableEntry> = {};
      const day = dayQuery(req.query.day);
      const classId = optionalIdQuery(req.query.class);
      const sectionId = optionalIdQuery(req.query.section);
      const teacherId = optionalIdQuery(req.query.teacher);

      if (day) filter.dayOfWeek = day;
      if (classId) filter.className = classId;
      if (sectionId) filter.section = sectionId;
      if (teacherId) filter.teacher = teacherId;

      res.json(sortByDayAndTime(await listEntries(filter)));
    })
  );

  router.get(
    "/my-classes",
    requireAuth,
    asyncHandler(async (req: Request, res: Response) => {
      const user = getAuthUser(req);
      const teacher = await Teacher.findOne({ user: user._id }).select("_id").lean();
      if (!teacher) throw notFound("No teacher profile is linked to this account");

      const filter: FilterQuery<ITimetableEntry> = { teacher: teacher._id };
      const day = dayQuery(req.query.day);
      if (day) filter.dayOfWeek = day;

      res.json(sortByDayAndTime(await listEntries(filter)));
    })
  );

  // Students in every class/section the caller teaches, optionally narrowed
  router.get(
    "/my-students",
    requireAuth,
    asyncHandler(async (req: Request, res: Response) => {
      const user = getAuthUser(req);
      const teacher = await Teacher.findOne({ user: user._id }).select("_id").lean();
      if (!teacher) throw notFound("No teacher profile is linked to this account");

      const filter: FilterQuery<ITimetableEntry> = { teacher: teacher._id };
      const classId = optionalIdQuery(req.query.class);
      const sectionId = optionalIdQuery(req.query.section);
      if (classId) filter.className = classId;
      if (sectionId) filter.section = sectionId;

      const slots = await TimetableEntry.find(filter).select("className section").lean();
      const placements = distinctPlacements(slots);
      if (placements.length === 0) {
        res.json([]);
        return;
      }

      const students = await Student.find({
        $or: placements.map((p) => ({ className: p.classId, section: p.sectionId })),
      })
        .populate("className", "name")
        .populate("section", "name")
        .sort({ className: 1, section: 1, fullName: 1 })
        .lean();
      res.json(students);
    })
  );

  // Dry run: same checks as a save, nothing written
  router.post(
    "/check",
    requireAuth,
    requirePrivileged,
    asyncHandler(async (req: Request, res: Response) => {
      const excludeId = optionalIdQuery(req.query.id);
      const data = parseWith(timetableEntrySchema, req.body);
      await assertSlotIsFree(toCandidate(data, excludeId), source);
      res.json({ ok: true });
    })
  );

  router.post(
    "/",
    requireAuth,
    requirePrivileged,
    asyncHandler(async (req: Request, res: Response) => {
      const data = parseWith(timetableEntrySchema, req.body);
      await assertReferencesExist(data);
      await assertSlotIsFree(toCandidate(data), source);

      const entry = await TimetableEntry.create(toDocument(data));

      await logAudit(req, {
        action: "timetable_entry_created",
        details: { entryId: entry._id, dayOfWeek: data.dayOfWeek, startTime: data.startTime, endTime: data.endTime },
      });

      res.status(201).json(entry);
    })
  );

  router.put(
    "/:id",
    requireAuth,
    requirePrivileged,
    asyncHandler(async (req: Request, res: Response) => {
      const id = idParam(req.params.id);
      const patch = parseWith(timetableEntryPatchSchema, req.body);

      const current = await TimetableEntry.findById(id).lean();
      if (!current) throw notFound("Timetable entry not found");

      const data = parseWith(timetableEntrySchema, { ...toInputShape(current), ...patch });
      await assertReferencesExist(data);
      await assertSlotIsFree(toCandidate(data, id), source);

      const entry = await TimetableEntry.findByIdAndUpdate(id, toDocument(data), {
        new: true,
        runValidators: true,
      });
      if (!entry) throw notFound("Timetable entry not found");

      await logAudit(req, {
        action: "timetable_entry_updated",
        details: { entryId: entry._id, changes: Object.keys(patch) },
      });

      res.json(entry);
    })
  );

  router.delete(
    "/:id",
    requireAuth,
    requirePrivileged,
    asyncHandler(async (req: Request, res: Response) => {
      const entry = await TimetableEntry.findByIdAndDelete(idParam(req.params.id));
      if (!entry) throw notFound("Timetable entry not found");

      await logAudit(req, {
        action: "timetable_entry_deleted",
        details: { entryId: entry._id, dayOfWeek: entry.dayOfWeek, startTime: entry.startTime },
      });

      res.json({ message: "Timetable entry deleted successfully" });
    })
  );

  return router;
}

export default createTimetableRouter(mongoTimetableSource);
