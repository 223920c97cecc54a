// src/models/Teacher.ts
import mongoose, { Schema, Types } from "mongoose";

export interface ITeacher {
  fullName: string;
  contactEmail?: string;
  contactPhone?: string;
  subject?: string;
  designation?: string;
  user?: Types.ObjectId | null;
}

const schema = new Schema<ITeacher>(
  {
    fullName: { type: String, required: true, trim: true },
    contactEmail: { type: String, lowercase: true, trim: true },
    contactPhone: { type: String, trim: true },
    subject: { type: String, trim: true },
    designation: { type: String, trim: true },
    user: { type: Schema.Types.ObjectId, ref: "User", default: null },
  },
  { timestamps: true }
);

// A login account maps to at most one teacher profile
schema.index({ user: 1 }, { unique: true, partialFilterExpression: { user: { $type: "objectId" } } });

export default mongoose.model<ITeacher>("Teacher", schema);
