// src/routes/auditLogs.ts
import { Router, Request, Response } from "express";
import { Workbook } from "exceljs";
import { FilterQuery } from "mongoose";
import AuditLog, { IAuditLog } from "../models/AuditLog";
import { requireAuth, requireRole } from "../middleware/auth";
import { asyncHandler } from "../middleware/asyncHandler";
import { optionalIdQuery } from "../validation/common";

const router = Router();

interface PopulatedUser {
  name?: string;
  email?: string;
}

const queryString = (value: unknown) => (typeof value === "string" && value ? value : undefined);

function buildFilter(req: Request): FilterQuery<IAuditLog> {
  const filter: FilterQuery<IAuditLog> = {};
  const action = queryString(req.query.action);
  const actorId = optionalIdQuery(req.query.actorId);
  const fromDate = queryString(req.query.fromDate);
  const toDate = queryString(req.query.toDate);

  if (action) filter.action = action;
  if (actorId) filter.actor = actorId;
  if (fromDate || toDate) {
    filter.createdAt = {
      ...(fromDate ? { $gte: new Date(fromDate) } : {}),
      ...(toDate ? { $lte: new Date(toDate) } : {}),
    };
  }
  return filter;
}

const sortDirection = (req: Request) => (req.query.sort === "asc" ? 1 : -1);

const findLogs = (filter: FilterQuery<IAuditLog>, direction: 1 | -1) =>
  AuditLog.find(filter)
    .populate<{ actor: PopulatedUser | null }>("actor", "name email")
    .populate<{ targetUser: PopulatedUser | null }>("targetUser", "name email")
    .sort({ createdAt: direction });

const csvCell = (value: unknown) => `"${String(value ?? "").replace(/"/g, '""')}"`;

router.use(requireAuth, requireRole("admin"));

router.get(
  "/",
  asyncHandler(async (req: Request, res: Response) => {
    const page = Math.max(1, Number(req.query.page) || 1);
    const limit = Math.min(100, Math.max(1, Number(req.query.limit) || 10));
    const filter = buildFilter(req);

    const [logs, total] = await Promise.all([
      findLogs(filter, sortDirection(req))
        .skip((page - 1) * limit)
        .limit(limit),
      AuditLog.countDocuments(filter),
    ]);

    res.json({ data: logs, total, page, pages: Math.ceil(total / limit) });
  })
);

// EXPORT audit logs (CSV)
router.get(
  "/export/csv",
  asyncHandler(async (req: Request, res: Response) => {
    const logs = await findLogs(buildFilter(req), sortDirection(req));

    let csv = "Actor Name,Actor Email,Target Name,Target Email,Action,Details,Created At\n";
    for (const log of logs) {
      csv +=
        [
          log.actor?.name,
          log.actor?.email,
          log.targetUser?.name,
          log.targetUser?.email,
          log.action,
          JSON.stringify(log.details),
          log.createdAt.toISOString(),
        ]
          .map(csvCell)
          .join(",") + "\n";
    }

    res.setHeader("Content-Type", "text/csv");
    res.setHeader("Content-Disposition", "attachment; filename=audit_logs.csv");
    res.send(csv);
  })
);

// EXPORT audit logs (Excel)
router.get(
  "/export/excel",
  asyncHandler(async (req: Request, res: Response) => {
    const logs = await findLogs(buildFilter(req), sortDirection(req));

    const workbook = new Workbook();
    const worksheet = workbook.addWorksheet("Audit Logs");

    worksheet.columns = [
      { header: "Actor Name", key: "actorName", width: 20 },
      { header: "Actor Email", key: "actorEmail", width: 25 },
      { header: "Target User Name", key: "targetName", width: 20 },
      { header: "Target User Email", key: "targetEmail", width: 25 },
      { header: "Action", key: "action", width: 24 },
      { header: "Details", key: "details", width: 40 },
      { header: "IP", key: "ip", width: 20 },
      { header: "UserAgent", key: "userAgent", width: 40 },
      { header: "Created At", key: "createdAt", width: 25 },
    ];

    for (const log of logs) {
      worksheet.addRow({
        actorName: log.actor?.name,
        actorEmail: log.actor?.email,
        targetName: log.targetUser?.name,
        targetEmail: log.targetUser?.email,
        action: log.action,
        details: JSON.stringify(log.details),
        ip: log.ip,
        userAgent: log.userAgent,
        createdAt: log.createdAt.toISOString(),
      });
    }

    res.setHeader(
      "Content-Type",
      "application/vnd.openxmlformats-officedocument.spreadsheetml.sheet"
    );
    res.setHeader("Content-Disposition", "attachment; filename=audit_logs.xlsx");

    await workbook.xlsx.write(res);
    res.end();
  })
);

export default router;
