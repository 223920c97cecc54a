// src/routes/gradeScales.ts
import { Router, Request, Response } from "express";
import { requireAuth, requireRole } from "../middleware/auth";
import { asyncHandler } from "../middleware/asyncHandler";
import { notFound } from "../lib/httpError";
import { logAudit } from "../lib/auditLogger";
import { idParam, parseWith } from "../validation/common";
import { gradeScaleSchema } from "../validation/academics";
import {
  activateGradeScale,
  createGradeScale,
  deleteGradeScale,
  GradeScaleStore,
  updateGradeScale,
} from "../services/gradeScales";
import { mongoGradeScaleStore } from "../repositories/mongoGradeScaleStore";

export function createGradeScalesRouter(store: GradeScaleStore): Router {
  const router = Router();

  router.get(
    "/",
    requireAuth,
    asyncHandler(async (_req: Request, res: Response) => {
      res.json(await store.list());
    })
  );

  // Registered before /:id so "active" is not read as an id
  router.get(
    "/active",
    requireAuth,
    asyncHandler(async (_req: Request, res: Response) => {
      const scale = await store.findActive();
      if (!scale) throw notFound("No active grade scale");
      res.json(scale);
    })
  );

  router.get(
    "/:id",
    requireAuth,
    asyncHandler(async (req: Request, res: Response) => {
      const scale = await store.findById(idParam(req.params.id));
      if (!scale) throw notFound("Grade scale not found");
      res.json(scale);
    })
  );

  router.post(
    "/",
    requireAuth,
    requireRole("admin"),
    asyncHandler(async (req: Request, res: Response) => {
      const scale = await createGradeScale(parseWith(gradeScaleSchema, req.body), store);
      res.status(201).json(scale);
    })
  );

  router.put(
    "/:id",
    requireAuth,
    requireRole("admin"),
    asyncHandler(async (req: Request, res: Response) => {
      const id = idParam(req.params.id);
      res.json(await updateGradeScale(id, parseWith(gradeScaleSchema, req.body), store));
    })
  );

  router.post(
    "/:id/activate",
    requireAuth,
    requireRole("admin"),
    asyncHandler(async (req: Request, res: Response) => {
      const scale = await activateGradeScale(idParam(req.params.id), store);

      await logAudit(req, {
        action: "grade_scale_activated",
        details: { gradeScaleId: scale.id, name: scale.name },
      });

      res.json(scale);
    })
  );

  router.delete(
    "/:id",
    requireAuth,
    requireRole("admin"),
    asyncHandler(async (req: Request, res: Response) => {
      await deleteGradeScale(idParam(req.params.id), store);
      res.json({ message: "Grade scale deleted successfully" });
    })
  );

  return router;
}

export default createGradeScalesRouter(mongoGradeScaleStore);
