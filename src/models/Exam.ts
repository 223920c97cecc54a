// src/models/Exam.ts
import mongoose, { Schema, Types } from "mongoose";

export interface IExam {
  className: Types.ObjectId;
  section: Types.ObjectId;
  name: string;
  year?: number;
  isPublished: boolean;
  // Synthetic exam produced by finalization
  isFinal: boolean;
}

const schema = new Schema<IExam>(
  {
    className: { type: Schema.Types.ObjectId, ref: "ClassName", required: true },
    section: { type: Schema.Types.ObjectId, ref: "Section", required: true },
    name: { type: String, required: true, trim: true },
    year: { type: Number, min: 1900 },
    isPublished: { type: Boolean, default: false },
    isFinal: { type: Boolean, default: false },
  },
  { timestamps: true }
);

// Only safety net against two concurrent finalizations creating the same final exam
schema.index({ className: 1, section: 1, name: 1 }, { unique: true });

export default mongoose.model<IExam>("Exam", schema);
