// src/models/Notice.ts
import mongoose, { Schema } from "mongoose";

export interface INotice {
  title: string;
  body: string;
  // Free-form; "teacher" notices are hidden from students and visitors
  category: string;
  publishedAt: Date;
}

const schema = new Schema<INotice>(
  {
    title: { type: String, required: true, trim: true },
    body: { type: String, default: "" },
    category: { type: String, default: "general", lowercase: true, trim: true, index: true },
    publishedAt: { type: Date, default: Date.now },
  },
  { timestamps: true }
);

export default mongoose.model<INotice>("Notice", schema);
