// src/models/Staff.ts
import mongoose, { Schema } from "mongoose";

// Non-teaching staff shown in the directory; no login account
export interface IStaff {
  fullName: string;
  contactEmail?: string;
  contactPhone?: string;
  designation?: string;
}

const schema = new Schema<IStaff>(
  {
    fullName: { type: String, required: true, trim: true },
    contactEmail: { type: String, lowercase: true, trim: true },
    contactPhone: { type: String, trim: true },
    designation: { type: String, trim: true },
  },
  { timestamps: true }
);

export default mongoose.model<IStaff>("Staff", schema);
