// src/routes/examMarks.ts
import { Router, Request, Response } from "express";
import ExamMark from "../models/ExamMark";
import { requireAuth, requirePrivileged } from "../middleware/auth";
import { asyncHandler } from "../middleware/asyncHandler";
import { idParam, parseWith } from "../validation/common";
import { examMarkSchema } from "../validation/academics";
import { ExamMarkSource, recordExamMark } from "../services/examMarks";
import { mongoExamMarkSource } from "../repositories/mongoExamMarkSource";

export function createExamMarksRouter(source: ExamMarkSource): Router {
  const router = Router();

  // GET /exam-marks?exam=<id>
  router.get(
    "/",
    requireAuth,
    asyncHandler(async (req: Request, res: Response) => {
      const marks = await ExamMark.find({ exam: idParam(req.query.exam) })
        .populate("student", "fullName rollNumber")
        .populate("subject", "name")
        .lean();
      res.json(marks);
    })
  );

  router.put(
    "/",
    requireAuth,
    requirePrivileged,
    asyncHandler(async (req: Request, res: Response) => {
      const data = parseWith(examMarkSchema, req.body);
      const mark = await recordExamMark(
        { examId: data.exam, studentId: data.student, subjectId: data.subject, score: data.score },
        source
      );
      res.json(mark);
    })
  );

  return router;
}

export default createExamMarksRouter(mongoExamMarkSource);
