// src/routes/teachers.ts
import { Router, Request, Response } from "express";
import { FilterQuery } from "mongoose";
import Teacher, { ITeacher } from "../models/Teacher";
import TimetableEntry from "../models/TimetableEntry";
import { requireAuth, requirePrivileged } from "../middleware/auth";
import { asyncHandler } from "../middleware/asyncHandler";
import { notFound, preconditionFailed } from "../lib/httpError";
import { logAudit } from "../lib/auditLogger";
import { idParam, optionalFlagQuery, parseWith, searchPattern } from "../validation/common";
import { linkUserSchema, teacherSchema } from "../validation/directory";
import { linkTeacherUser, TeacherLinkStore, unlinkTeacherUser } from "../services/teacherLinks";
import { mongoTeacherLinkStore } from "../repositories/mongoTeacherLinkStore";

export function createTeachersRouter(links: TeacherLinkStore): Router {
  const router = Router();

  // GET /teachers?q=<text>&linked=true|false
  router.get(
    "/",
    requireAuth,
    asyncHandler(async (req: Request, res: Response) => {
      const filter: FilterQuery<ITeacher> = {};

      const pattern = searchPattern(req.query.q);
      if (pattern) {
        filter.$or = [
          { fullName: pattern },
          { contactEmail: pattern },
          { contactPhone: pattern },
          { subject: pattern },
          { designation: pattern },
        ];
      }

      const linked = optionalFlagQuery(req.query.linked);
      if (linked !== undefined) filter.user = linked ? { $ne: null } : null;

      res.json(await Teacher.find(filter).sort({ fullName: 1 }).lean());
    })
  );

  router.get(
    "/:id",
    requireAuth,
    asyncHandler(async (req: Request, res: Response) => {
      const teacher = await Teacher.findById(idParam(req.params.id)).lean();
      if (!teacher) throw notFound("Teacher not found");
      res.json(teacher);
    })
  );

  router.post(
    "/",
    requireAuth,
    requirePrivileged,
    asyncHandler(async (req: Request, res: Response) => {
      res.status(201).json(await Teacher.create(parseWith(teacherSchema, req.body)));
    })
  );

  router.put(
    "/:id",
    requireAuth,
    requirePrivileged,
    asyncHandler(async (req: Request, res: Response) => {
      const teacher = await Teacher.findByIdAndUpdate(
        idParam(req.params.id),
        parseWith(teacherSchema, req.body),
        { new: true, runValidators: true }
      );
      if (!teacher) throw notFound("Teacher not found");
      res.json(teacher);
    })
  );

  router.post(
    "/:id/link-user",
    requireAuth,
    requirePrivileged,
    asyncHandler(async (req: Request, res: Response) => {
      const { user_id } = parseWith(linkUserSchema, req.body);
      const teacher = await linkTeacherUser(idParam(req.params.id), user_id, links);

      await logAudit(req, {
        action: "teacher_user_linked",
        details: { teacherId: teacher.id, userId: user_id },
      });

      res.json(teacher);
    })
  );

  router.post(
    "/:id/unlink-user",
    requireAuth,
    requirePrivileged,
    asyncHandler(async (req: Request, res: Response) => {
      const teacher = await unlinkTeacherUser(idParam(req.params.id), links);
      await logAudit(req, { action: "teacher_user_unlinked", details: { teacherId: teacher.id } });
      res.json(teacher);
    })
  );

  router.delete(
    "/:id",
    requireAuth,
    requirePrivileged,
    asyncHandler(async (req: Request, res: Response) => {
      const id = idParam(req.params.id);

      if (await TimetableEntry.exists({ teacher: id })) {
        throw preconditionFailed("Teacher is still scheduled in the timetable.");
      }

      const teacher = await Teacher.findByIdAndDelete(id);
      if (!teacher) throw notFound("Teacher not found");
      res.json({ message: "Teacher deleted successfully" });
    })
  );

  return router;
}

export default createTeachersRouter(mongoTeacherLinkStore);
