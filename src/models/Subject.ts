// src/models/Subject.ts
import mongoose, { Schema, Types } from "mongoose";

export interface ISubject {
  name: string;
  className: Types.ObjectId;
  isTheory: boolean;
  isPractical: boolean;
}

const schema = new Schema<ISubject>(
  {
    name: { type: String, required: true, trim: true },
    className: { type: Schema.Types.ObjectId, ref: "ClassName", required: true },
    isTheory: { type: Boolean, default: true },
    isPractical: { type: Boolean, default: false },
  },
  { timestamps: true }
);

// One "Biology" per class
schema.index({ className: 1, name: 1 }, { unique: true });

export default mongoose.model<ISubject>("Subject", schema);
