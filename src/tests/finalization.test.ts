// src/tests/finalization.test.ts
import { finalizeAndPublish, FinalizeRequest } from "../services/finalization";
import { MemoryFinalizationStore } from "./helpers/memorySources";

const request = (overrides: Partial<FinalizeRequest> = {}): FinalizeRequest => ({
  classId: "c1",
  sectionId: "s1",
  year: 2026,
  parts: [
    { examId: "exam-a", weight: 40 },
    { examId: "exam-b", weight: 60 },
  ],
  ...overrides,
});

const seed = (store: MemoryFinalizationStore) => {
  store.state = {
    classes: ["c1"],
    sections: ["s1"],
    exams: [
      { id: "exam-a", classId: "c1", sectionId: "s1", name: "Midterm", isPublished: true, isFinal: false },
      { id: "exam-b", classId: "c1", sectionId: "s1", name: "Annual", isPublished: true, isFinal: false },
    ],
    students: [
      { id: "st1", classId: "c1", sectionId: "s1" },
      { id: "st2", classId: "c1", sectionId: "s1" },
    ],
    subjects: [{ id: "sub1", classId: "c1" }],
    marks: [
      { examId: "exam-a", studentId: "st1", subjectId: "sub1", score: 80, letter: "A+", gpa: 5 },
      { examId: "exam-b", studentId: "st1", subjectId: "sub1", score: 70, letter: "A", gpa: 4 },
      { examId: "exam-b", studentId: "st2", subjectId: "sub1", score: 90, letter: "A+", gpa: 5 },
    ],
    bands: [
      { minScore: 80, maxScore: 100, letter: "A+", gpa: 5 },
      { minScore: 70, maxScore: 79, letter: "A", gpa: 4 },
    ],
  };
};

const finalMarks = (store: MemoryFinalizationStore, examId: string) =>
  store.state.marks
    .filter((m) => m.examId === examId)
    .sort((a, b) => a.studentId.localeCompare(b.studentId));

describe("finalizeAndPublish", () => {
  let store: MemoryFinalizationStore;

  beforeEach(() => {
    store = new MemoryFinalizationStore();
    seed(store);
  });

  it("combines weighted components and grades them on the active scale", async () => {
    const result = await finalizeAndPublish(request(), store);

    expect(result).toEqual({
      finalExamId: "final-1",
      finalExamName: "Final Result 2026",
      published: true,
      upserts: 2,
    });
    expect(finalMarks(store, "final-1")).toEqual([
      { examId: "final-1", studentId: "st1", subjectId: "sub1", score: 74, letter: "A", gpa: 4 },
      { examId: "final-1", studentId: "st2", subjectId: "sub1", score: 54, letter: "", gpa: null },
    ]);
    expect(store.state.exams.find((e) => e.id === "final-1")).toMatchObject({
      name: "Final Result 2026",
      isFinal: true,
      isPublished: true,
    });
  });

  it("is idempotent", async () => {
    const first = await finalizeAndPublish(request(), store);
    const marksAfterFirst = finalMarks(store, first.finalExamId);

    const second = await finalizeAndPublish(request(), store);

    expect(second.finalExamId).toBe(first.finalExamId);
    expect(finalMarks(store, second.finalExamId)).toEqual(marksAfterFirst);
    expect(store.state.exams).toHaveLength(3);
    expect(store.state.marks).toHaveLength(5);
  });

  it("uses the given name and leaves the exam unpublished on request", async () => {
    const result = await finalizeAndPublish(request({ name: "  Term Final ", publish: false }), store);
    expect(result).toMatchObject({ finalExamName: "Term Final", published: false });
  });

  it("grades without letters when no scale is active", async () => {
    store.state.bands = null;
    await finalizeAndPublish(request(), store);
    expect(finalMarks(store, "final-1").map((m) => [m.letter, m.gpa])).toEqual([
      ["", null],
      ["", null],
    ]);
  });

  it.each([
    [99, 59],
    [101, 61],
  ])("rejects weights summing to %i", async (total, second) => {
    const parts = [
      { examId: "exam-a", weight: 40 },
      { examId: "exam-b", weight: second },
    ];
    await expect(finalizeAndPublish(request({ parts }), store)).rejects.toMatchObject({
      statusCode: 400,
      code: "PRECONDITION_FAILED",
      message: `Weights must sum to 100 (got ${total}).`,
    });
    expect(store.state.exams).toHaveLength(2);
  });

  it("rejects an empty component list", async () => {
    await expect(finalizeAndPublish(request({ parts: [] }), store)).rejects.toThrow(
      "parts must be a non-empty list of {exam_id, weight}."
    );
  });

  it("checks class, section, exams and enrolment in order", async () => {
    await expect(finalizeAndPublish(request({ classId: "c9", sectionId: "s9" }), store)).rejects.toThrow(
      "Invalid class_id."
    );
    await expect(finalizeAndPublish(request({ sectionId: "s9" }), store)).rejects.toThrow(
      "Invalid section_id."
    );
    await expect(
      finalizeAndPublish(
        request({ parts: [{ examId: "exam-a", weight: 40 }, { examId: "missing", weight: 60 }] }),
        store
      )
    ).rejects.toThrow("One or more exam_id not found.");

    store.state.students = [];
    await expect(finalizeAndPublish(request(), store)).rejects.toThrow(
      "No students or subjects found for this class/section."
    );
  });

  it("reports an exam listed twice as not found", async () => {
    const parts = [
      { examId: "exam-a", weight: 50 },
      { examId: "exam-a", weight: 50 },
    ];
    await expect(finalizeAndPublish(request({ parts }), store)).rejects.toThrow(
      "One or more exam_id not found."
    );
    expect(store.state.exams).toHaveLength(2);
  });

  it("refuses to overwrite a component exam", async () => {
    await expect(finalizeAndPublish(request({ name: "Midterm" }), store)).rejects.toThrow(
      '"Midterm" is one of the component exams; choose another name.'
    );
    expect(store.state.marks).toHaveLength(3);
  });

  it("writes nothing when a write fails", async () => {
    store.failOnUpsert = true;
    await expect(finalizeAndPublish(request(), store)).rejects.toThrow("write failed");
    expect(store.state.exams).toHaveLength(2);
    expect(store.state.marks).toHaveLength(3);
  });
});
