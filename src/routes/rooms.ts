// src/routes/rooms.ts
import { Router, Request, Response } from "express";
import Room from "../models/Room";
import TimetableEntry from "../models/TimetableEntry";
import { requireAuth, requirePrivileged } from "../middleware/auth";
import { asyncHandler } from "../middleware/asyncHandler";
import { notFound, preconditionFailed } from "../lib/httpError";
import { idParam, parseWith } from "../validation/common";
import { roomSchema } from "../validation/academics";

const router = Router();

router.get(
  "/",
  requireAuth,
  asyncHandler(async (_req: Request, res: Response) => {
    res.json(await Room.find().sort({ name: 1 }).lean());
  })
);

router.post(
  "/",
  requireAuth,
  requirePrivileged,
  asyncHandler(async (req: Request, res: Response) => {
    res.status(201).json(await Room.create(parseWith(roomSchema, req.body)));
  })
);

// Lowering a capacity does not revisit slots that were already scheduled
router.put(
  "/:id",
  requireAuth,
  requirePrivileged,
  asyncHandler(async (req: Request, res: Response) => {
    const room = await Room.findByIdAndUpdate(idParam(req.params.id), parseWith(roomSchema, req.body), {
      new: true,
      runValidators: true,
    });
    if (!room) throw notFound("Room not found");
    res.json(room);
  })
);

router.delete(
  "/:id",
  requireAuth,
  requirePrivileged,
  asyncHandler(async (req: Request, res: Response) => {
    const id = idParam(req.params.id);

    if (await TimetableEntry.exists({ room: id })) {
      throw preconditionFailed("Room is still used in the timetable.");
    }

    const room = await Room.findByIdAndDelete(id);
    if (!room) throw notFound("Room not found");
    res.json({ message: "Room deleted successfully" });
  })
);

export default router;
