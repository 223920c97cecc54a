// src/repositories/mongoExamMarkSource.ts
import Exam from "../models/Exam";
import ExamMark from "../models/ExamMark";
import Student from "../models/Student";
import Subject from "../models/Subject";
import type { ExamMarkSource } from "../services/examMarks";
import { loadActiveBands } from "../services/gradeScales";
import { mongoGradeScaleStore } from "./mongoGradeScaleStore";

export const mongoExamMarkSource: ExamMarkSource = {
  async findExam(examId) {
    const exam = await Exam.findById(examId).select("className section isFinal").lean();
    return exam
      ? { classId: String(exam.className), sectionId: String(exam.section), isFinal: exam.isFinal }
      : null;
  },

  async findStudent(studentId) {
    const student = await Student.findById(studentId).select("className section").lean();
    return student ? { classId: String(student.className), sectionId: String(student.section) } : null;
  },

  async findSubjectClassId(subjectId) {
    const subject = await Subject.findById(subjectId).select("className").lean();
    return subject ? String(subject.className) : null;
  },

  findActiveBands() {
    return loadActiveBands(mongoGradeScaleStore);
  },

  async saveMark(mark) {
    await ExamMark.updateOne(
      { exam: mark.examId, student: mark.studentId, subject: mark.subjectId },
      { $set: { score: mark.score, letter: mark.letter, gpa: mark.gpa } },
      { upsert: true, runValidators: true }
    );
    return mark;
  },
};
