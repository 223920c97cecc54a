// src/models/Student.ts
import mongoose, { Schema, Types } from "mongoose";

export const GENDERS = ["M", "F", "O"] as const;

export interface IStudent {
  fullName: string;
  gender?: (typeof GENDERS)[number];
  dateOfBirth?: Date;
  className: Types.ObjectId;
  section: Types.ObjectId;
  rollNumber: number;
  admissionNo?: string;
  guardianName?: string;
  guardianPhone?: string;
  contactEmail?: string;
  contactPhone?: string;
  address?: string;
  user?: Types.ObjectId | null;
}

const schema = new Schema<IStudent>(
  {
    fullName: { type: String, required: true, trim: true },
    gender: { type: String, enum: GENDERS },
    dateOfBirth: Date,
    className: { type: Schema.Types.ObjectId, ref: "ClassName", required: true },
    section: { type: Schema.Types.ObjectId, ref: "Section", required: true },
    rollNumber: { type: Number, required: true, min: 1 },
    admissionNo: { type: String, trim: true },
    guardianName: { type: String, trim: true },
    guardianPhone: { type: String, trim: true },
    contactEmail: { type: String, lowercase: true, trim: true },
    contactPhone: { type: String, trim: true },
    address: String,
    user: { type: Schema.Types.ObjectId, ref: "User", default: null },
  },
  { timestamps: true }
);

schema.index({ className: 1, section: 1, rollNumber: 1 }, { unique: true });
schema.index(
  { admissionNo: 1 },
  { unique: true, partialFilterExpression: { admissionNo: { $type: "string" } } }
);

export default mongoose.model<IStudent>("Student", schema);
