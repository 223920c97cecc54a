// src/repositories/mongoTeacherLinkStore.ts
import Teacher from "../models/Teacher";
import User from "../models/User";
import type { TeacherLinkStore, TeacherSummary } from "../services/teacherLinks";

interface StoredTeacher {
  _id: { toString(): string };
  fullName: string;
  contactEmail?: string;
  contactPhone?: string;
  subject?: string;
  designation?: string;
  user?: { toString(): string } | null;
}

const toSummary = (teacher: StoredTeacher): TeacherSummary => ({
  id: teacher._id.toString(),
  fullName: teacher.fullName,
  contactEmail: teacher.contactEmail ?? "",
  contactPhone: teacher.contactPhone ?? "",
  subject: teacher.subject ?? "",
  designation: teacher.designation ?? "",
  user: teacher.user ? teacher.user.toString() : null,
});

export const mongoTeacherLinkStore: TeacherLinkStore = {
  async findTeacher(teacherId) {
    const teacher = await Teacher.findById(teacherId).lean();
    return teacher ? toSummary(teacher) : null;
  },

  async findUserRole(userId) {
    const user = await User.findById(userId).select("role").lean();
    return user ? user.role : null;
  },

  async findTeacherIdForUser(userId) {
    const teacher = await Teacher.findOne({ user: userId }).select("_id").lean();
    return teacher ? teacher._id.toString() : null;
  },

  async setTeacherUser(teacherId, userId) {
    const teacher = await Teacher.findByIdAndUpdate(teacherId, { user: userId }, { new: true }).lean();
    return teacher ? toSummary(teacher) : null;
  },
};
