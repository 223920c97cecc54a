// src/models/TimetableEntry.ts
import mongoose, { Schema, Types } from "mongoose";
import { DAYS_OF_WEEK, DayOfWeek } from "../types/academics";

export interface ITimetableEntry {
  className: Types.ObjectId;
  section: Types.ObjectId;
  subject: Types.ObjectId;
  teacher?: Types.ObjectId | null;
  room?: Types.ObjectId | null;
  // Free-text room for places that are not registered rooms ("Field", "Hall")
  roomName?: string;
  dayOfWeek: DayOfWeek;
  period: string;
  startTime: string;
  endTime: string;
}

const schema = new Schema<ITimetableEntry>(
  {
    className: { type: Schema.Types.ObjectId, ref: "ClassName", required: true },
    section: { type: Schema.Types.ObjectId, ref: "Section", required: true },
    subject: { type: Schema.Types.ObjectId, ref: "Subject", required: true },
    teacher: { type: Schema.Types.ObjectId, ref: "Teacher", default: null },
    room: { type: Schema.Types.ObjectId, ref: "Room", default: null },
    roomName: { type: String, trim: true, default: "" },
    dayOfWeek: { type: String, enum: DAYS_OF_WEEK, required: true },
    period: { type: String, trim: true, default: "" },
    startTime: { type: String, required: true },
    endTime: { type: String, required: true },
  },
  { timestamps: true }
);

// Last-resort backstop; overlaps are rejected by the conflict validator first
schema.index(
  { className: 1, section: 1, dayOfWeek: 1, period: 1, startTime: 1, endTime: 1 },
  { unique: true }
);
schema.index({ dayOfWeek: 1, startTime: 1 });
schema.index({ teacher: 1, dayOfWeek: 1 });

export default mongoose.model<ITimetableEntry>("TimetableEntry", schema);
