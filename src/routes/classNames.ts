// src/routes/classNames.ts
import { Router, Request, Response } from "express";
import ClassName from "../models/ClassName";
import Section from "../models/Section";
import Student from "../models/Student";
import Subject from "../models/Subject";
import { requireAuth, requirePrivileged } from "../middleware/auth";
import { asyncHandler } from "../middleware/asyncHandler";
import { notFound, preconditionFailed } from "../lib/httpError";
import { idParam, parseWith } from "../validation/common";
import { classNameSchema } from "../validation/directory";

const router = Router();

async function assertSectionsExist(sectionIds: string[]) {
  const unique = [...new Set(sectionIds)];
  const found = await Section.countDocuments({ _id: { $in: unique } });
  if (found !== unique.length) {
    throw preconditionFailed("One or more sections do not exist.");
  }
  return unique;
}

router.get(
  "/",
  requireAuth,
  asyncHandler(async (_req: Request, res: Response) => {
    const classes = await ClassName.find()
      .populate("sections", "name")
      .sort({ name: 1 })
      .lean();
    res.json(classes);
  })
);

router.get(
  "/:id",
  requireAuth,
  asyncHandler(async (req: Request, res: Response) => {
    const cls = await ClassName.findById(idParam(req.params.id)).populate("sections", "name").lean();
    if (!cls) throw notFound("Class not found");
    res.json(cls);
  })
);

router.post(
  "/",
  requireAuth,
  requirePrivileged,
  asyncHandler(async (req: Request, res: Response) => {
    const { name, sections } = parseWith(classNameSchema, req.body);
    const cls = await ClassName.create({ name, sections: await assertSectionsExist(sections) });
    res.status(201).json(cls);
  })
);

router.put(
  "/:id",
  requireAuth,
  requirePrivileged,
  asyncHandler(async (req: Request, res: Response) => {
    const { name, sections } = parseWith(classNameSchema, req.body);
    const cls = await ClassName.findByIdAndUpdate(
      idParam(req.params.id),
      { name, sections: await assertSectionsExist(sections) },
      { new: true, runValidators: true }
    );
    if (!cls) throw notFound("Class not found");
    res.json(cls);
  })
);

router.delete(
  "/:id",
  requireAuth,
  requirePrivileged,
  asyncHandler(async (req: Request, res: Response) => {
    const id = idParam(req.params.id);

    if (await Student.exists({ className: id })) {
      throw preconditionFailed("Class still has students; move them first.");
    }

    const cls = await ClassName.findByIdAndDelete(id);
    if (!cls) throw notFound("Class not found");

    await Subject.deleteMany({ className: id });
    res.json({ message: "Class deleted successfully" });
  })
);

export default router;
