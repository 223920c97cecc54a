// src/models/ExamRoutine.ts
import mongoose, { Schema, Types } from "mongoose";

// A sitting on the exam calendar; independent of marks
export interface IExamRoutine {
  examName: string;
  className: Types.ObjectId;
  section?: Types.ObjectId | null;
  subject: Types.ObjectId;
  date: Date;
  startTime: string;
  endTime: string;
}

const schema = new Schema<IExamRoutine>(
  {
    examName: { type: String, required: true, trim: true },
    className: { type: Schema.Types.ObjectId, ref: "ClassName", required: true },
    section: { type: Schema.Types.ObjectId, ref: "Section", default: null },
    subject: { type: Schema.Types.ObjectId, ref: "Subject", required: true },
    date: { type: Date, required: true },
    startTime: { type: String, required: true },
    endTime: { type: String, required: true },
  },
  { timestamps: true }
);

schema.index({ className: 1, date: 1, startTime: 1 });

export default mongoose.model<IExamRoutine>("ExamRoutine", schema);
