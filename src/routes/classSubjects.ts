// src/routes/classSubjects.ts
import { Router, Request, Response } from "express";
import { FilterQuery } from "mongoose";
import ClassSubject, { IClassSubject } from "../models/ClassSubject";
import { requireAuth, requirePrivileged } from "../middleware/auth";
import { asyncHandler } from "../middleware/asyncHandler";
import { notFound } from "../lib/httpError";
import { logAudit } from "../lib/auditLogger";
import { idParam, optionalIdQuery, parseWith } from "../validation/common";
import {
  bulkAssignSchema,
  classSubjectPatchSchema,
  classSubjectSchema,
} from "../validation/academics";
import { assertAssignable, bulkAssignSubjects, ClassSubjectStore } from "../services/classSubjects";
import { mongoClassSubjectStore } from "../repositories/mongoClassSubjectStore";

export function createClassSubjectsRouter(store: ClassSubjectStore): Router {
  const router = Router();

  // GET /class-subjects?class_id=<id>
  router.get(
    "/",
    requireAuth,
    asyncHandler(async (req: Request, res: Response) => {
      const classId = optionalIdQuery(req.query.class_id ?? req.query.class);
      const filter: FilterQuery<IClassSubject> = classId ? { className: classId } : {};

      const rows = await ClassSubject.find(filter)
        .populate("className", "name")
        .populate("section", "name")
        .populate("subject", "name isTheory isPractical")
        .populate("teacher", "fullName")
        .sort({ className: 1, section: 1, order: 1 })
        .lean();
      res.json(rows);
    })
  );

  router.post(
    "/",
    requireAuth,
    requirePrivileged,
    asyncHandler(async (req: Request, res: Response) => {
      const data = parseWith(classSubjectSchema, req.body);
      await assertAssignable(data.className, [data.section], [data.subject], store);
      res.status(201).json(await ClassSubject.create(data));
    })
  );

  router.post(
    "/bulk-assign",
    requireAuth,
    requirePrivileged,
    asyncHandler(async (req: Request, res: Response) => {
      const data = parseWith(bulkAssignSchema, req.body);
      const result = await bulkAssignSubjects(
        {
          classId: data.class_id,
          sectionIds: data.section_ids,
          subjectIds: data.subject_ids,
          teacherId: data.teacher_id,
        },
        store
      );

      await logAudit(req, {
        action: "class_subjects_assigned",
        details: { classId: data.class_id, ...result },
      });

      res.json(result);
    })
  );

  router.patch(
    "/:id",
    requireAuth,
    requirePrivileged,
    asyncHandler(async (req: Request, res: Response) => {
      const row = await ClassSubject.findByIdAndUpdate(
        idParam(req.params.id),
        parseWith(classSubjectPatchSchema, req.body),
        { new: true, runValidators: true }
      );
      if (!row) throw notFound("Class subject not found");
      res.json(row);
    })
  );

  router.delete(
    "/:id",
    requireAuth,
    requirePrivileged,
    asyncHandler(async (req: Request, res: Response) => {
      const row = await ClassSubject.findByIdAndDelete(idParam(req.params.id));
      if (!row) throw notFound("Class subject not found");
      res.json({ message: "Class subject deleted successfully" });
    })
  );

  return router;
}

export default createClassSubjectsRouter(mongoClassSubjectStore);
