// src/models/Section.ts
import mongoose, { Schema } from "mongoose";

export interface ISection {
  name: string;
}

const schema = new Schema<ISection>(
  {
    name: { type: String, required: true, unique: true, trim: true },
  },
  { timestamps: true }
);

export default mongoose.model<ISection>("Section", schema);
