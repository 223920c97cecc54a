// src/models/Period.ts
import mongoose, { Schema } from "mongoose";

// School-wide time block, e.g. "1st" 09:00-09:45
export interface IPeriod {
  name: string;
  order: number;
  startTime: string;
  endTime: string;
}

const schema = new Schema<IPeriod>(
  {
    name: { type: String, required: true, trim: true },
    order: { type: Number, required: true, unique: true, min: 1 },
    startTime: { type: String, required: true },
    endTime: { type: String, required: true },
  },
  { timestamps: true }
);

export default mongoose.model<IPeriod>("Period", schema);
