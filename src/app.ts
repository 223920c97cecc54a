// src/app.ts
import express, { Request, Response } from "express";
import cors from "cors";
import cookieParser from "cookie-parser";
import helmet from "helmet";
import config from "./config/config";
import { errorHandler } from "./middleware/errorHandler";
import { apiRateLimiter, sanitizeInput } from "./middleware/security";

// Routes
import authRoutes from "./routes/auth";
import adminRoutes from "./routes/admin";
import auditLogsRoutes from "./routes/auditLogs";
import sectionsRoutes from "./routes/sections";
import classNamesRoutes from "./routes/classNames";
import subjectsRoutes from "./routes/subjects";
import teachersRoutes from "./routes/teachers";
import studentsRoutes from "./routes/students";
import periodsRoutes from "./routes/periods";
import roomsRoutes from "./routes/rooms";
import timetableRoutes from "./routes/timetable";
import examsRoutes from "./routes/exams";
import examMarksRoutes from "./routes/examMarks";
import gradeScalesRoutes from "./routes/gradeScales";
import finalsRoutes from "./routes/finals";
import classSubjectsRoutes from "./routes/classSubjects";
import examRoutinesRoutes from "./routes/examRoutines";
import staffRoutes from "./routes/staff";
import noticesRoutes from "./routes/notices";

const app = express();

app.use(helmet({ contentSecurityPolicy: false }));
app.use(
  cors({
    origin: config.frontendUrl,
    credentials: true,
  })
);

app.use(cookieParser());
app.use(express.json({ limit: "1mb" }));
app.use(express.urlencoded({ extended: true, limit: "1mb" }));
app.use(sanitizeInput);
app.use(apiRateLimiter);

app.get("/health", (_req: Request, res: Response) => {
  res.status(200).json({
    status: "OK",
    timestamp: new Date().toISOString(),
    uptime: process.uptime(),
  });
});

app.use("/auth", authRoutes);
app.use("/admin", adminRoutes);
app.use("/audit-logs", auditLogsRoutes);
app.use("/sections", sectionsRoutes);
app.use("/class-names", classNamesRoutes);
app.use("/subjects", subjectsRoutes);
app.use("/teachers", teachersRoutes);
app.use("/students", studentsRoutes);
app.use("/periods", periodsRoutes);
app.use("/rooms", roomsRoutes);
app.use("/timetable", timetableRoutes);
app.use("/exams", examsRoutes);
app.use("/exam-marks", examMarksRoutes);
app.use("/grade-scales", gradeScalesRoutes);
app.use("/finals", finalsRoutes);
app.use("/class-subjects", classSubjectsRoutes);
app.use("/exam-routines", examRoutinesRoutes);
app.use("/staff", staffRoutes);
app.use("/notices", noticesRoutes);

app.use((req: Request, res: Response) => {
  res.status(404).json({
    message: `Route ${req.originalUrl} not found`,
    method: req.method,
  });
});

app.use(errorHandler);

export default app;
