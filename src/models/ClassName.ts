// src/models/ClassName.ts
import mongoose, { Schema, Types } from "mongoose";

// A grade/class ("Class 6"), offered in one or more sections (A, B, C...)
export interface IClassName {
  name: string;
  sections: Types.ObjectId[];
}

const schema = new Schema<IClassName>(
  {
    name: { type: String, required: true, unique: true, trim: true },
    sections: [{ type: Schema.Types.ObjectId, ref: "Section" }],
  },
  { timestamps: true }
);

export default mongoose.model<IClassName>("ClassName", schema);
