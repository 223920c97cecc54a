// src/routes/sections.ts
import { Router, Request, Response } from "express";
import Section from "../models/Section";
import ClassName from "../models/ClassName";
import Student from "../models/Student";
import { requireAuth, requirePrivileged } from "../middleware/auth";
import { asyncHandler } from "../middleware/asyncHandler";
import { notFound, preconditionFailed } from "../lib/httpError";
import { idParam, parseWith } from "../validation/common";
import { sectionSchema } from "../validation/directory";

const router = Router();

router.get(
  "/",
  requireAuth,
  asyncHandler(async (_req: Request, res: Response) => {
    res.json(await Section.find().sort({ name: 1 }).lean());
  })
);

router.post(
  "/",
  requireAuth,
  requirePrivileged,
  asyncHandler(async (req: Request, res: Response) => {
    const section = await Section.create(parseWith(sectionSchema, req.body));
    res.status(201).json(section);
  })
);

router.put(
  "/:id",
  requireAuth,
  requirePrivileged,
  asyncHandler(async (req: Request, res: Response) => {
    const section = await Section.findByIdAndUpdate(
      idParam(req.params.id),
      parseWith(sectionSchema, req.body),
      { new: true, runValidators: true }
    );
    if (!section) throw notFound("Section not found");
    res.json(section);
  })
);

router.delete(
  "/:id",
  requireAuth,
  requirePrivileged,
  asyncHandler(async (req: Request, res: Response) => {
    const id = idParam(req.params.id);

    if (await Student.exists({ section: id })) {
      throw preconditionFailed("Section still has students; move them first.");
    }

    const section = await Section.findByIdAndDelete(id);
    if (!section) throw notFound("Section not found");

    await ClassName.updateMany({ sections: id }, { $pull: { sections: id } });
    res.json({ message: "Section deleted successfully" });
  })
);

export default router;
