// src/repositories/mongoClassSubjectStore.ts
import ClassName from "../models/ClassName";
import ClassSubject from "../models/ClassSubject";
import Subject from "../models/Subject";
import { withTransaction } from "../lib/transaction";
import type { ClassSubjectStore } from "../services/classSubjects";

export const mongoClassSubjectStore: ClassSubjectStore = {
  async findClassSectionIds(classId) {
    const cls = await ClassName.findById(classId).select("sections").lean();
    return cls ? cls.sections.map(String) : null;
  },

  async findClassSubjectIds(classId) {
    const subjects = await Subject.find({ className: classId }).select("_id").lean();
    return subjects.map((s) => s._id.toString());
  },

  createMissing(classId, assignments, teacherId) {
    return withTransaction(async (session) => {
      let created = 0;
      // One at a time: a transaction session does not take parallel operations
      for (const { sectionId, subjectId } of assignments) {
        const result = await ClassSubject.updateOne(
          { section: sectionId, subject: subjectId },
          { $setOnInsert: { className: classId, teacher: teacherId } },
          { upsert: true, session }
        );
        created += result.upsertedCount;
      }
      return created;
    });
  },
};
