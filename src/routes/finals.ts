// src/routes/finals.ts
import { Router, Request, Response } from "express";
import { requireAuth, requirePrivileged } from "../middleware/auth";
import { asyncHandler } from "../middleware/asyncHandler";
import { logAudit } from "../lib/auditLogger";
import { parseFinalizeBody } from "../validation/finals";
import { finalizeAndPublish, FinalizationStore } from "../services/finalization";
import { mongoFinalizationStore } from "../repositories/mongoFinalizationStore";

export function createFinalsRouter(store: FinalizationStore): Router {
  const router = Router();

  // POST /finals/finalize-publish
  router.post(
    "/finalize-publish",
    requireAuth,
    requirePrivileged,
    asyncHandler(async (req: Request, res: Response) => {
      const request = parseFinalizeBody(req.body);
      const result = await finalizeAndPublish(request, store);

      await logAudit(req, {
        action: "finals_published",
        details: {
          classId: request.classId,
          sectionId: request.sectionId,
          year: request.year,
          parts: request.parts,
          finalExamId: result.finalExamId,
          published: result.published,
          upserts: result.upserts,
        },
      });

      res.json({
        status: "ok",
        final_exam_id: result.finalExamId,
        final_exam_name: result.finalExamName,
        published: result.published,
        upserts: result.upserts,
      });
    })
  );

  return router;
}

export default createFinalsRouter(mongoFinalizationStore);
