// src/models/Room.ts
import mongoose, { Schema } from "mongoose";

export interface IRoom {
  name: string;
  capacity?: number | null;
}

const schema = new Schema<IRoom>(
  {
    name: { type: String, required: true, unique: true, trim: true },
    capacity: { type: Number, min: 1, default: null },
  },
  { timestamps: true }
);

export default mongoose.model<IRoom>("Room", schema);
