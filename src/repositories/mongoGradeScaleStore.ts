// src/repositories/mongoGradeScaleStore.ts
import GradeScale from "../models/GradeScale";
import { withTransaction } from "../lib/transaction";
import type { GradeScaleRecord, GradeScaleStore } from "../services/gradeScales";
import type { GradeBandLike } from "../types/academics";

interface ScaleRecord {
  _id: unknown;
  name: string;
  isActive: boolean;
  bands: GradeBandLike[];
}

export const toGradeScaleRecord = (scale: ScaleRecord): GradeScaleRecord => ({
  id: String(scale._id),
  name: scale.name,
  isActive: scale.isActive,
  bands: scale.bands.map(({ minScore, maxScore, letter, gpa }) => ({ minScore, maxScore, letter, gpa })),
});

export const mongoGradeScaleStore: GradeScaleStore = {
  async list() {
    const scales = await GradeScale.find().sort({ name: 1 }).lean();
    return scales.map(toGradeScaleRecord);
  },

  async findById(id) {
    const scale = await GradeScale.findById(id).lean();
    return scale ? toGradeScaleRecord(scale) : null;
  },

  async findActive() {
    const scale = await GradeScale.findOne({ isActive: true }).lean();
    return scale ? toGradeScaleRecord(scale) : null;
  },

  async create(input) {
    const scale = await GradeScale.create({ ...input, isActive: false });
    return toGradeScaleRecord(scale);
  },

  async update(id, input) {
    const scale = await GradeScale.findByIdAndUpdate(
      id,
      { $set: { name: input.name, bands: input.bands } },
      { new: true, runValidators: true }
    ).lean();
    return scale ? toGradeScaleRecord(scale) : null;
  },

  async remove(id) {
    await GradeScale.deleteOne({ _id: id });
  },

  // A racing activation trips the partial unique index on isActive and fails with E11000
  activateExclusive(id) {
    return withTransaction(async (session) => {
      const scale = await GradeScale.findById(id).session(session);
      if (!scale) return null;

      await GradeScale.updateMany(
        { _id: { $ne: scale._id }, isActive: true },
        { $set: { isActive: false } },
        { session }
      );

      scale.isActive = true;
      await scale.save({ session });
      return toGradeScaleRecord(scale);
    });
  },
};
