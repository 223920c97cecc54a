// src/models/ExamMark.ts
import mongoose, { Schema, Types } from "mongoose";

export interface IExamMark {
  exam: Types.ObjectId;
  student: Types.ObjectId;
  subject: Types.ObjectId;
  score: number;
  letter: string;
  gpa: number | null;
}

const schema = new Schema<IExamMark>(
  {
    exam: { type: Schema.Types.ObjectId, ref: "Exam", required: true },
    student: { type: Schema.Types.ObjectId, ref: "Student", required: true },
    subject: { type: Schema.Types.ObjectId, ref: "Subject", required: true },
    score: { type: Number, required: true, min: 0, max: 100 },
    letter: { type: String, default: "" },
    gpa: { type: Number, default: null },
  },
  { timestamps: true }
);

schema.index({ exam: 1, student: 1, subject: 1 }, { unique: true });

export default mongoose.model<IExamMark>("ExamMark", schema);
