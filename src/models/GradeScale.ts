// src/models/GradeScale.ts
import mongoose, { Schema } from "mongoose";
import type { GradeBandLike } from "../types/academics";

export interface IGradeScale {
  name: string;
  isActive: boolean;
  bands: GradeBandLike[];
}

const bandSchema = new Schema<GradeBandLike>(
  {
    minScore: { type: Number, required: true, min: 0, max: 100 },
    maxScore: { type: Number, required: true, min: 0, max: 100 },
    letter: { type: String, required: true, trim: true },
    gpa: { type: Number, required: true, min: 0 },
  },
  { _id: false }
);

const schema = new Schema<IGradeScale>(
  {
    name: { type: String, required: true, unique: true, trim: true },
    // Changed only through activateGradeScale, never on ordinary saves
    isActive: { type: Boolean, default: false },
    bands: { type: [bandSchema], default: [] },
  },
  { timestamps: true }
);

// At most one active scale, even when two activations race
schema.index({ isActive: 1 }, { unique: true, partialFilterExpression: { isActive: true } });

export default mongoose.model<IGradeScale>("GradeScale", schema);
