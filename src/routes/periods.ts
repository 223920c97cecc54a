// src/routes/periods.ts
import { Router, Request, Response } from "express";
import Period from "../models/Period";
import { requireAuth, requirePrivileged } from "../middleware/auth";
import { asyncHandler } from "../middleware/asyncHandler";
import { notFound } from "../lib/httpError";
import { idParam, parseWith } from "../validation/common";
import { periodSchema } from "../validation/academics";

const router = Router();

router.get(
  "/",
  requireAuth,
  asyncHandler(async (_req: Request, res: Response) => {
    res.json(await Period.find().sort({ order: 1 }).lean());
  })
);

router.post(
  "/",
  requireAuth,
  requirePrivileged,
  asyncHandler(async (req: Request, res: Response) => {
    res.status(201).json(await Period.create(parseWith(periodSchema, req.body)));
  })
);

router.put(
  "/:id",
  requireAuth,
  requirePrivileged,
  asyncHandler(async (req: Request, res: Response) => {
    const period = await Period.findByIdAndUpdate(
      idParam(req.params.id),
      parseWith(periodSchema, req.body),
      { new: true, runValidators: true }
    );
    if (!period) throw notFound("Period not found");
    res.json(period);
  })
);

router.delete(
  "/:id",
  requireAuth,
  requirePrivileged,
  asyncHandler(async (req: Request, res: Response) => {
    const period = await Period.findByIdAndDelete(idParam(req.params.id));
    if (!period) throw notFound("Period not found");
    res.json({ message: "Period deleted successfully" });
  })
);

export default router;
