// src/repositories/mongoFinalizationStore.ts
import { ClientSession } from "mongoose";
import ClassName from "../models/ClassName";
import Exam from "../models/Exam";
import ExamMark from "../models/ExamMark";
import GradeScale from "../models/GradeScale";
import Section from "../models/Section";
import Student from "../models/Student";
import Subject from "../models/Subject";
import { withTransaction } from "../lib/transaction";
import type {
  FinalizationSource,
  FinalizationStore,
  FinalMarkRow,
} from "../services/finalization";

class MongoFinalizationSource implements FinalizationSource {
  constructor(private readonly session: ClientSession) {}

  async classExists(classId: string) {
    const found = await ClassName.exists({ _id: classId }).session(this.session);
    return found !== null;
  }

  async sectionExists(sectionId: string) {
    const found = await Section.exists({ _id: sectionId }).session(this.session);
    return found !== null;
  }

  async findExistingExamIds(examIds: string[]) {
    const exams = await Exam.find({ _id: { $in: examIds } })
      .select("_id")
      .session(this.session)
      .lean();
    return exams.map((e) => String(e._id));
  }

  async findStudentIds(classId: string, sectionId: string) {
    const students = await Student.find({ className: classId, section: sectionId })
      .select("_id")
      .sort({ rollNumber: 1 })
      .session(this.session)
      .lean();
    return students.map((s) => String(s._id));
  }

  async findSubjectIds(classId: string) {
    const subjects = await Subject.find({ className: classId })
      .select("_id")
      .sort({ name: 1 })
      .session(this.session)
      .lean();
    return subjects.map((s) => String(s._id));
  }

  async findMarks(examIds: string[]) {
    const marks = await ExamMark.find({ exam: { $in: examIds } })
      .select("exam student subject score")
      .session(this.session)
      .lean();
    return marks.map((m) => ({
      examId: String(m.exam),
      studentId: String(m.student),
      subjectId: String(m.subject),
      score: m.score,
    }));
  }

  async findActiveBands() {
    const scale = await GradeScale.findOne({ isActive: true }).session(this.session).lean();
    return scale ? scale.bands : null;
  }

  async getOrCreateFinalExam(key: { classId: string; sectionId: string; name: string; year: number }) {
    // Atomic get-or-create; the (className, section, name) index settles races
    const exam = await Exam.findOneAndUpdate(
      { className: key.classId, section: key.sectionId, name: key.name },
      { $setOnInsert: { isPublished: false, isFinal: true, year: key.year } },
      { upsert: true, new: true, session: this.session }
    ).lean();
    if (!exam) throw new Error(`Final exam "${key.name}" could not be created`);
    return { id: String(exam._id), name: exam.name, isPublished: exam.isPublished };
  }

  async upsertMarks(rows: FinalMarkRow[]) {
    if (rows.length === 0) return;
    await ExamMark.bulkWrite(
      rows.map((row) => ({
        updateOne: {
          filter: { exam: row.examId, student: row.studentId, subject: row.subjectId },
          update: { $set: { score: row.score, letter: row.letter, gpa: row.gpa } },
          upsert: true,
        },
      })),
      { session: this.session }
    );
  }

  async publishExam(examId: string) {
    await Exam.updateOne({ _id: examId }, { $set: { isPublished: true } }, { session: this.session });
  }
}

export const mongoFinalizationStore: FinalizationStore = {
  transaction<T>(work: (source: FinalizationSource) => Promise<T>) {
    return withTransaction((session) => work(new MongoFinalizationSource(session)));
  },
};
