// src/routes/notices.ts
import { Router, Request, Response } from "express";
import Notice from "../models/Notice";
import { optionalAuth, requireAuth, requirePrivileged } from "../middleware/auth";
import { asyncHandler } from "../middleware/asyncHandler";
import { notFound } from "../lib/httpError";
import { idParam, parseWith } from "../validation/common";
import { noticeSchema } from "../validation/academics";
import { isNoticeVisible, noticeFilter } from "../services/notices";

const router = Router();

// GET /notices?category=<name>; open to visitors
router.get(
  "/",
  optionalAuth,
  asyncHandler(async (req: Request, res: Response) => {
    const category = typeof req.query.category === "string" ? req.query.category : undefined;
    const filter = noticeFilter(category, req.user?.role);
    if (!filter) {
      res.json([]);
      return;
    }
    res.json(await Notice.find(filter).sort({ publishedAt: -1, _id: -1 }).lean());
  })
);

router.get(
  "/:id",
  optionalAuth,
  asyncHandler(async (req: Request, res: Response) => {
    const notice = await Notice.findById(idParam(req.params.id)).lean();
    if (!notice || !isNoticeVisible(notice.category, req.user?.role)) {
      throw notFound("Notice not found");
    }
    res.json(notice);
  })
);

router.post(
  "/",
  requireAuth,
  requirePrivileged,
  asyncHandler(async (req: Request, res: Response) => {
    res.status(201).json(await Notice.create(parseWith(noticeSchema, req.body)));
  })
);

router.put(
  "/:id",
  requireAuth,
  requirePrivileged,
  asyncHandler(async (req: Request, res: Response) => {
    const notice = await Notice.findByIdAndUpdate(
      idParam(req.params.id),
      parseWith(noticeSchema, req.body),
      { new: true, runValidators: true }
    );
    if (!notice) throw notFound("Notice not found");
    res.json(notice);
  })
);

router.delete(
  "/:id",
  requireAuth,
  requirePrivileged,
  asyncHandler(async (req: Request, res: Response) => {
    const notice = await Notice.findByIdAndDelete(idParam(req.params.id));
    if (!notice) throw notFound("Notice not found");
    res.json({ message: "Notice deleted successfully" });
  })
);

export default router;
