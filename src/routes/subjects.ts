// src/routes/subjects.ts
import { Router, Request, Response } from "express";
import { FilterQuery } from "mongoose";
import Subject, { ISubject } from "../models/Subject";
import ClassName from "../models/ClassName";
import { requireAuth, requirePrivileged } from "../middleware/auth";
import { asyncHandler } from "../middleware/asyncHandler";
import { notFound, preconditionFailed } from "../lib/httpError";
import { idParam, optionalIdQuery, parseWith } from "../validation/common";
import { subjectSchema } from "../validation/directory";

const router = Router();

async function assertClassExists(classId: string) {
  if (!(await ClassName.exists({ _id: classId }))) {
    throw preconditionFailed("Invalid class_id.");
  }
}

// GET /subjects?class=<id>
router.get(
  "/",
  requireAuth,
  asyncHandler(async (req: Request, res: Response) => {
    const classId = optionalIdQuery(req.query.class ?? req.query.class_id);
    const filter: FilterQuery<ISubject> = classId ? { className: classId } : {};

    const subjects = await Subject.find(filter)
      .populate("className", "name")
      .sort({ name: 1 })
      .lean();
    res.json(subjects);
  })
);

router.post(
  "/",
  requireAuth,
  requirePrivileged,
  asyncHandler(async (req: Request, res: Response) => {
    const data = parseWith(subjectSchema, req.body);
    await assertClassExists(data.className);
    res.status(201).json(await Subject.create(data));
  })
);

router.put(
  "/:id",
  requireAuth,
  requirePrivileged,
  asyncHandler(async (req: Request, res: Response) => {
    const data = parseWith(subjectSchema, req.body);
    await assertClassExists(data.className);

    const subject = await Subject.findByIdAndUpdate(idParam(req.params.id), data, {
      new: true,
      runValidators: true,
    });
    if (!subject) throw notFound("Subject not found");
    res.json(subject);
  })
);

router.delete(
  "/:id",
  requireAuth,
  requirePrivileged,
  asyncHandler(async (req: Request, res: Response) => {
    const subject = await Subject.findByIdAndDelete(idParam(req.params.id));
    if (!subject) throw notFound("Subject not found");
    res.json({ message: "Subject deleted successfully" });
  })
);

export default router;
