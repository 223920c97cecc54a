// src/models/ClassSubject.ts
import mongoose, { Schema, Types } from "mongoose";

// A subject taught to one section of a class, optionally by a set teacher
export interface IClassSubject {
  className: Types.ObjectId;
  section: Types.ObjectId;
  subject: Types.ObjectId;
  teacher?: Types.ObjectId | null;
  order: number;
}

const schema = new Schema<IClassSubject>(
  {
    className: { type: Schema.Types.ObjectId, ref: "ClassName", required: true },
    section: { type: Schema.Types.ObjectId, ref: "Section", required: true },
    subject: { type: Schema.Types.ObjectId, ref: "Subject", required: true },
    teacher: { type: Schema.Types.ObjectId, ref: "Teacher", default: null },
    order: { type: Number, default: 0, min: 0 },
  },
  { timestamps: true }
);

schema.index({ section: 1, subject: 1 }, { unique: true });

export default mongoose.model<IClassSubject>("ClassSubject", schema);
