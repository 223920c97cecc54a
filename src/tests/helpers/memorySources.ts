// src/tests/helpers/memorySources.ts
import type { TimetableSource } from "../../services/timetableService";
import type { ScheduledSlot } from "../../services/timetableValidator";
import type {
  ComponentMark,
  ExamRef,
  FinalizationSource,
  FinalizationStore,
  FinalMarkRow,
} from "../../services/finalization";
import type {
  GradeScaleInput,
  GradeScaleRecord,
  GradeScaleStore,
} from "../../services/gradeScales";
import type { ExamMarkSource, GradedMark } from "../../services/examMarks";
import type { AccountProfile, AccountStore, ProfileChanges } from "../../services/accounts";
import type { TeacherLinkStore, TeacherSummary } from "../../services/teacherLinks";
import type { Assignment, ClassSubjectStore } from "../../services/classSubjects";
import type { DayOfWeek, GradeBandLike } from "../../types/academics";

export class MemoryTimetableSource implements TimetableSource {
  slots: ScheduledSlot[] = [];
  subjectClasses = new Map<string, string>();
  roomCapacities = new Map<string, number | null>();
  enrolment = new Map<string, number>();
  countCalls = 0;

  async findSlotsOnDay(day: DayOfWeek, excludeId?: string) {
    return this.slots.filter((s) => s.dayOfWeek === day && s.id !== excludeId);
  }

  async findSubjectClassId(subjectId: string) {
    return this.subjectClasses.get(subjectId) ?? null;
  }

  async findRoomCapacity(roomId: string) {
    return this.roomCapacities.get(roomId) ?? null;
  }

  async countEnrolled(classId: string, sectionId: string) {
    this.countCalls++;
    return this.enrolment.get(`${classId}:${sectionId}`) ?? 0;
  }
}

export interface MemoryExam {
  id: string;
  classId: string;
  sectionId: string;
  name: string;
  year?: number;
  isPublished: boolean;
  isFinal: boolean;
}

export interface MemoryState {
  classes: string[];
  sections: string[];
  exams: MemoryExam[];
  students: { id: string; classId: string; sectionId: string }[];
  subjects: { id: string; classId: string }[];
  marks: FinalMarkRow[];
  bands: GradeBandLike[] | null;
}

const emptyState = (): MemoryState => ({
  classes: [],
  sections: [],
  exams: [],
  students: [],
  subjects: [],
  marks: [],
  bands: null,
});

class MemoryFinalizationSource implements FinalizationSource {
  constructor(
    private readonly state: MemoryState,
    private readonly nextId: () => string,
    private readonly failOnUpsert: boolean
  ) {}

  async classExists(classId: string) {
    return this.state.classes.includes(classId);
  }

  async sectionExists(sectionId: string) {
    return this.state.sections.includes(sectionId);
  }

  async findExistingExamIds(examIds: string[]) {
    return this.state.exams.filter((e) => examIds.includes(e.id)).map((e) => e.id);
  }

  async findStudentIds(classId: string, sectionId: string) {
    return this.state.students
      .filter((s) => s.classId === classId && s.sectionId === sectionId)
      .map((s) => s.id);
  }

  async findSubjectIds(classId: string) {
    return this.state.subjects.filter((s) => s.classId === classId).map((s) => s.id);
  }

  async findMarks(examIds: string[]): Promise<ComponentMark[]> {
    return this.state.marks
      .filter((m) => examIds.includes(m.examId))
      .map(({ examId, studentId, subjectId, score }) => ({ examId, studentId, subjectId, score }));
  }

  async findActiveBands() {
    return this.state.bands;
  }

  async getOrCreateFinalExam(key: { classId: string; sectionId: string; name: string; year: number }): Promise<ExamRef> {
    let exam = this.state.exams.find(
      (e) => e.classId === key.classId && e.sectionId === key.sectionId && e.name === key.name
    );
    if (!exam) {
      exam = { id: this.nextId(), ...key, isPublished: false, isFinal: true };
      this.state.exams.push(exam);
    }
    return { id: exam.id, name: exam.name, isPublished: exam.isPublished };
  }

  async upsertMarks(rows: FinalMarkRow[]) {
    for (const row of rows) {
      const index = this.state.marks.findIndex(
        (m) => m.examId === row.examId && m.studentId === row.studentId && m.subjectId === row.subjectId
      );
      if (index >= 0) this.state.marks[index] = { ...row };
      else this.state.marks.push({ ...row });
    }
    if (this.failOnUpsert) throw new Error("write failed");
  }

  async publishExam(examId: string) {
    const exam = this.state.exams.find((e) => e.id === examId);
    if (exam) exam.isPublished = true;
  }
}

/** Works on a copy of the state and keeps it only when `work` resolves. */
export class MemoryFinalizationStore implements FinalizationStore {
  state: MemoryState = emptyState();
  failOnUpsert = false;
  private counter = 0;

  async transaction<T>(work: (source: FinalizationSource) => Promise<T>): Promise<T> {
    const draft = structuredClone(this.state);
    const result = await work(
      new MemoryFinalizationSource(draft, () => `final-${++this.counter}`, this.failOnUpsert)
    );
    this.state = draft;
    return result;
  }
}

export class MemoryGradeScaleStore implements GradeScaleStore {
  scales: GradeScaleRecord[] = [];
  private counter = 0;

  async list() {
    return [...this.scales].sort((a, b) => a.name.localeCompare(b.name));
  }

  async findById(id: string) {
    return this.scales.find((s) => s.id === id) ?? null;
  }

  async findActive() {
    return this.scales.find((s) => s.isActive) ?? null;
  }

  async create(input: GradeScaleInput) {
    const scale: GradeScaleRecord = {
      id: (++this.counter).toString(16).padStart(24, "0"),
      ...input,
      isActive: false,
    };
    this.scales.push(scale);
    return scale;
  }

  async update(id: string, input: GradeScaleInput) {
    const scale = this.scales.find((s) => s.id === id);
    if (!scale) return null;
    Object.assign(scale, input);
    return scale;
  }

  async remove(id: string) {
    this.scales = this.scales.filter((s) => s.id !== id);
  }

  async activateExclusive(id: string) {
    const target = this.scales.find((s) => s.id === id);
    if (!target) return null;
    for (const scale of this.scales) scale.isActive = scale.id === id;
    return target;
  }
}

export class MemoryExamMarkSource implements ExamMarkSource {
  exams = new Map<string, { classId: string; sectionId: string; isFinal: boolean }>();
  students = new Map<string, { classId: string; sectionId: string }>();
  subjectClasses = new Map<string, string>();
  bands: GradeBandLike[] | null = null;
  marks: GradedMark[] = [];

  async findExam(examId: string) {
    return this.exams.get(examId) ?? null;
  }

  async findStudent(studentId: string) {
    return this.students.get(studentId) ?? null;
  }

  async findSubjectClassId(subjectId: string) {
    return this.subjectClasses.get(subjectId) ?? null;
  }

  async findActiveBands() {
    return this.bands;
  }

  async saveMark(mark: GradedMark) {
    this.marks = this.marks.filter(
      (m) => !(m.examId === mark.examId && m.studentId === mark.studentId && m.subjectId === mark.subjectId)
    );
    this.marks.push(mark);
    return mark;
  }
}

interface MemoryAccount extends AccountProfile {
  passwordHash: string;
  tokenVersion: number;
}

export class MemoryAccountStore implements AccountStore {
  accounts = new Map<string, MemoryAccount>();
  // userId -> linked teacher's contactPhone
  teacherPhones = new Map<string, string>();

  async findPasswordHash(userId: string) {
    return this.accounts.get(userId)?.passwordHash ?? null;
  }

  async setPassword(userId: string, hash: string, mustChangePassword: boolean) {
    const account = this.accounts.get(userId);
    if (!account) return null;
    account.passwordHash = hash;
    account.mustChangePassword = mustChangePassword;
    account.tokenVersion += 1;
    return account.tokenVersion;
  }

  async updateProfile(userId: string, { email, phone }: ProfileChanges) {
    const account = this.accounts.get(userId);
    if (!account) return null;
    if (email !== undefined) account.email = email;
    if (phone !== undefined) {
      account.phone = phone;
      if (this.teacherPhones.has(userId)) this.teacherPhones.set(userId, phone);
    }
    return {
      id: account.id,
      name: account.name,
      email: account.email,
      role: account.role,
      phone: account.phone,
      mustChangePassword: account.mustChangePassword,
    };
  }
}

export class MemoryTeacherLinkStore implements TeacherLinkStore {
  teachers: TeacherSummary[] = [];
  userRoles = new Map<string, string>();

  async findTeacher(teacherId: string) {
    return this.teachers.find((t) => t.id === teacherId) ?? null;
  }

  async findUserRole(userId: string) {
    return this.userRoles.get(userId) ?? null;
  }

  async findTeacherIdForUser(userId: string) {
    return this.teachers.find((t) => t.user === userId)?.id ?? null;
  }

  async setTeacherUser(teacherId: string, userId: string | null) {
    const teacher = this.teachers.find((t) => t.id === teacherId);
    if (!teacher) return null;
    teacher.user = userId;
    return teacher;
  }
}

export class MemoryClassSubjectStore implements ClassSubjectStore {
  // classId -> section ids
  classSections = new Map<string, string[]>();
  // subjectId -> classId
  subjectClasses = new Map<string, string>();
  rows: (Assignment & { classId: string; teacherId: string | null })[] = [];

  async findClassSectionIds(classId: string) {
    return this.classSections.get(classId) ?? null;
  }

  async findClassSubjectIds(classId: string) {
    return [...this.subjectClasses].filter(([, c]) => c === classId).map(([subjectId]) => subjectId);
  }

  async createMissing(classId: string, assignments: Assignment[], teacherId: string | null) {
    let created = 0;
    for (const a of assignments) {
      const exists = this.rows.some((r) => r.sectionId === a.sectionId && r.subjectId === a.subjectId);
      if (exists) continue;
      this.rows.push({ ...a, classId, teacherId });
      created++;
    }
    return created;
  }
}
