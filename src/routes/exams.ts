// src/routes/exams.ts
import { Router, Request, Response } from "express";
import { FilterQuery } from "mongoose";
import Exam, { IExam } from "../models/Exam";
import ExamMark from "../models/ExamMark";
import ClassName from "../models/ClassName";
import { requireAuth, requirePrivileged } from "../middleware/auth";
import { asyncHandler } from "../middleware/asyncHandler";
import { notFound, preconditionFailed } from "../lib/httpError";
import { idParam, optionalIdQuery, parseWith } from "../validation/common";
import { examSchema } from "../validation/academics";

const router = Router();

async function assertPlacement(classId: string, sectionId: string) {
  const cls = await ClassName.findById(classId).select("sections").lean();
  if (!cls) throw preconditionFailed("Invalid class_id.");
  if (!cls.sections.some((s) => String(s) === sectionId)) {
    throw preconditionFailed("Selected section does not belong to the selected class.");
  }
}

// GET /exams?class=<id>&section=<id>
router.get(
  "/",
  requireAuth,
  asyncHandler(async (req: Request, res: Response) => {
    const classId = optionalIdQuery(req.query.class);
    const sectionId = optionalIdQuery(req.query.section);

    const filter: FilterQuery<IExam> = {};
    if (classId) filter.className = classId;
    if (sectionId) filter.section = sectionId;

    const exams = await Exam.find(filter)
      .populate("className", "name")
      .populate("section", "name")
      .sort({ year: -1, name: 1 })
      .lean();
    res.json(exams);
  })
);

router.get(
  "/:id",
  requireAuth,
  asyncHandler(async (req: Request, res: Response) => {
    const exam = await Exam.findById(idParam(req.params.id))
      .populate("className", "name")
      .populate("section", "name")
      .lean();
    if (!exam) throw notFound("Exam not found");
    res.json(exam);
  })
);

router.post(
  "/",
  requireAuth,
  requirePrivileged,
  asyncHandler(async (req: Request, res: Response) => {
    const data = parseWith(examSchema, req.body);
    await assertPlacement(data.className, data.section);
    res.status(201).json(await Exam.create(data));
  })
);

router.put(
  "/:id",
  requireAuth,
  requirePrivileged,
  asyncHandler(async (req: Request, res: Response) => {
    const data = parseWith(examSchema, req.body);
    await assertPlacement(data.className, data.section);

    const exam = await Exam.findByIdAndUpdate(idParam(req.params.id), data, {
      new: true,
      runValidators: true,
    });
    if (!exam) throw notFound("Exam not found");
    res.json(exam);
  })
);

router.post(
  "/:id/publish",
  requireAuth,
  requirePrivileged,
  asyncHandler(async (req: Request, res: Response) => {
    const exam = await Exam.findByIdAndUpdate(
      idParam(req.params.id),
      { $set: { isPublished: true } },
      { new: true }
    );
    if (!exam) throw notFound("Exam not found");
    res.json(exam);
  })
);

// Marks go with their exam
router.delete(
  "/:id",
  requireAuth,
  requirePrivileged,
  asyncHandler(async (req: Request, res: Response) => {
    const id = idParam(req.params.id);
    const exam = await Exam.findByIdAndDelete(id);
    if (!exam) throw notFound("Exam not found");

    const { deletedCount } = await ExamMark.deleteMany({ exam: id });
    res.json({ message: "Exam deleted successfully", deletedMarks: deletedCount });
  })
);

export default router;
