// src/routes/examRoutines.ts
import { Router, Request, Response } from "express";
import { FilterQuery } from "mongoose";
import ExamRoutine, { IExamRoutine } from "../models/ExamRoutine";
import { requireAuth, requirePrivileged } from "../middleware/auth";
import { asyncHandler } from "../middleware/asyncHandler";
import { notFound } from "../lib/httpError";
import { idParam, optionalIdQuery, parseWith } from "../validation/common";
import { examRoutineSchema } from "../validation/academics";

const router = Router();

// GET /exam-routines?class=<id>&section=<id>
router.get(
  "/",
  requireAuth,
  asyncHandler(async (req: Request, res: Response) => {
    const filter: FilterQuery<IExamRoutine> = {};
    const classId = optionalIdQuery(req.query.class);
    const sectionId = optionalIdQuery(req.query.section);
    if (classId) filter.className = classId;
    if (sectionId) filter.section = sectionId;

    const routines = await ExamRoutine.find(filter)
      .populate("className", "name")
      .populate("section", "name")
      .populate("subject", "name")
      .sort({ date: 1, startTime: 1 })
      .lean();
    res.json(routines);
  })
);

router.post(
  "/",
  requireAuth,
  requirePrivileged,
  asyncHandler(async (req: Request, res: Response) => {
    res.status(201).json(await ExamRoutine.create(parseWith(examRoutineSchema, req.body)));
  })
);

router.put(
  "/:id",
  requireAuth,
  requirePrivileged,
  asyncHandler(async (req: Request, res: Response) => {
    const routine = await ExamRoutine.findByIdAndUpdate(
      idParam(req.params.id),
      parseWith(examRoutineSchema, req.body),
      { new: true, runValidators: true }
    );
    if (!routine) throw notFound("Exam routine not found");
    res.json(routine);
  })
);

router.delete(
  "/:id",
  requireAuth,
  requirePrivileged,
  asyncHandler(async (req: Request, res: Response) => {
    const routine = await ExamRoutine.findByIdAndDelete(idParam(req.params.id));
    if (!routine) throw notFound("Exam routine not found");
    res.json({ message: "Exam routine deleted successfully" });
  })
);

export default router;
