// src/routes/students.ts
import { Router, Request, Response } from "express";
import { FilterQuery } from "mongoose";
import Student, { IStudent } from "../models/Student";
import ClassName from "../models/ClassName";
import { getAuthUser, requireAuth, requirePrivileged } from "../middleware/auth";
import { asyncHandler } from "../middleware/asyncHandler";
import { notFound, preconditionFailed } from "../lib/httpError";
import { idParam, optionalIdQuery, parseWith, searchPattern } from "../validation/common";
import { StudentInput, studentSchema } from "../validation/directory";

const router = Router();

// Section must be one of the class's sections
async function assertPlacement({ className, section }: StudentInput) {
  const cls = await ClassName.findById(className).select("sections").lean();
  if (!cls) throw preconditionFailed("Invalid class_id.");
  if (!cls.sections.some((s) => String(s) === section)) {
    throw preconditionFailed("Selected section does not belong to the selected class.");
  }
}

// ?class=<id>&section=<id>&q=<name>
function studentFilter(query: Request["query"]): FilterQuery<IStudent> {
  const filter: FilterQuery<IStudent> = {};
  const classId = optionalIdQuery(query.class);
  const sectionId = optionalIdQuery(query.section);
  const pattern = searchPattern(query.q);

  if (classId) filter.className = classId;
  if (sectionId) filter.section = sectionId;
  if (pattern) filter.fullName = pattern;
  return filter;
}

router.get(
  "/",
  requireAuth,
  asyncHandler(async (req: Request, res: Response) => {
    const students = await Student.find(studentFilter(req.query))
      .populate("className", "name")
      .populate("section", "name")
      .sort({ rollNumber: 1 })
      .lean();
    res.json(students);
  })
);

// The profile linked to the caller's account
router.get(
  "/me",
  requireAuth,
  asyncHandler(async (req: Request, res: Response) => {
    const student = await Student.findOne({ user: getAuthUser(req)._id })
      .populate("className", "name")
      .populate("section", "name")
      .lean();
    if (!student) throw notFound("No student profile linked.");
    res.json(student);
  })
);

// Slim rows for attendance sheets and teacher views
router.get(
  "/mini",
  requireAuth,
  asyncHandler(async (req: Request, res: Response) => {
    const students = await Student.find(studentFilter(req.query))
      .select("fullName rollNumber className section")
      .populate<{ className: { name: string } | null }>("className", "name")
      .populate<{ section: { name: string } | null }>("section", "name")
      .sort({ rollNumber: 1 })
      .lean();

    res.json(
      students.map((s) => ({
        id: s._id,
        fullName: s.fullName,
        rollNumber: s.rollNumber,
        className: s.className?.name ?? "",
        section: s.section?.name ?? "",
      }))
    );
  })
);

router.get(
  "/:id",
  requireAuth,
  asyncHandler(async (req: Request, res: Response) => {
    const student = await Student.findById(idParam(req.params.id))
      .populate("className", "name")
      .populate("section", "name")
      .lean();
    if (!student) throw notFound("Student not found");
    res.json(student);
  })
);

router.post(
  "/",
  requireAuth,
  requirePrivileged,
  asyncHandler(async (req: Request, res: Response) => {
    const data = parseWith(studentSchema, req.body);
    await assertPlacement(data);
    res.status(201).json(await Student.create(data));
  })
);

router.put(
  "/:id",
  requireAuth,
  requirePrivileged,
  asyncHandler(async (req: Request, res: Response) => {
    const data = parseWith(studentSchema, req.body);
    await assertPlacement(data);

    const student = await Student.findByIdAndUpdate(idParam(req.params.id), data, {
      new: true,
      runValidators: true,
    });
    if (!student) throw notFound("Student not found");
    res.json(student);
  })
);

router.delete(
  "/:id",
  requireAuth,
  requirePrivileged,
  asyncHandler(async (req: Request, res: Response) => {
    const student = await Student.findByIdAndDelete(idParam(req.params.id));
    if (!student) throw notFound("Student not found");
    res.json({ message: "Student deleted successfully" });
  })
);

export default router;
