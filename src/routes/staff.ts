// src/routes/staff.ts
import { Router, Request, Response } from "express";
import { FilterQuery } from "mongoose";
import Staff, { IStaff } from "../models/Staff";
import { requireAuth, requirePrivileged } from "../middleware/auth";
import { asyncHandler } from "../middleware/asyncHandler";
import { notFound } from "../lib/httpError";
import { idParam, parseWith, searchPattern } from "../validation/common";
import { staffSchema } from "../validation/directory";

const router = Router();

// GET /staff?q=<name or designation>
router.get(
  "/",
  requireAuth,
  asyncHandler(async (req: Request, res: Response) => {
    const pattern = searchPattern(req.query.q);
    const filter: FilterQuery<IStaff> = pattern
      ? { $or: [{ fullName: pattern }, { designation: pattern }] }
      : {};
    res.json(await Staff.find(filter).sort({ fullName: 1 }).lean());
  })
);

router.get(
  "/:id",
  requireAuth,
  asyncHandler(async (req: Request, res: Response) => {
    const member = await Staff.findById(idParam(req.params.id)).lean();
    if (!member) throw notFound("Staff member not found");
    res.json(member);
  })
);

router.post(
  "/",
  requireAuth,
  requirePrivileged,
  asyncHandler(async (req: Request, res: Response) => {
    res.status(201).json(await Staff.create(parseWith(staffSchema, req.body)));
  })
);

router.put(
  "/:id",
  requireAuth,
  requirePrivileged,
  asyncHandler(async (req: Request, res: Response) => {
    const member = await Staff.findByIdAndUpdate(
      idParam(req.params.id),
      parseWith(staffSchema, req.body),
      { new: true, runValidators: true }
    );
    if (!member) throw notFound("Staff member not found");
    res.json(member);
  })
);

router.delete(
  "/:id",
  requireAuth,
  requirePrivileged,
  asyncHandler(async (req: Request, res: Response) => {
    const member = await Staff.findByIdAndDelete(idParam(req.params.id));
    if (!member) throw notFound("Staff member not found");
    res.json({ message: "Staff member deleted successfully" });
  })
);

export default router;
