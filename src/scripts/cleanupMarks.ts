// src/scripts/cleanupMarks.ts
import mongoose from "mongoose";
import Exam from "../models/Exam";
import ExamMark from "../models/ExamMark";
import config from "../config/config";

/** Removes marks whose exam no longer exists. */
export const cleanupOrphanedMarks = async () => {
  console.log("[cleanup] Checking exam marks for missing exams...");

  const referenced = await ExamMark.distinct("exam");
  const existing = await Exam.find({ _id: { $in: referenced } }).distinct("_id");
  const alive = new Set(existing.map(String));
  const missing = referenced.filter((id) => !alive.has(String(id)));

  if (missing.length === 0) {
    console.log("[cleanup] No orphaned marks");
    return 0;
  }

  const { deletedCount } = await ExamMark.deleteMany({ exam: { $in: missing } });
  console.log(`[cleanup] Removed ${deletedCount} marks of ${missing.length} deleted exam(s)`);
  return deletedCount;
};

if (require.main === module) {
  mongoose
    .connect(config.databaseURI)
    .then(async () => {
      await cleanupOrphanedMarks();
      await mongoose.disconnect();
      process.exit(0);
    })
    .catch((err: unknown) => {
      console.error(err);
      process.exit(1);
    });
}
