// src/tests/teacherLinks.test.ts
import { linkTeacherUser, unlinkTeacherUser } from "../services/teacherLinks";
import { MemoryTeacherLinkStore } from "./helpers/memorySources";

const profile = (id: string, user: string | null = null) => ({
  id,
  fullName: `Teacher ${id}`,
  contactEmail: "",
  contactPhone: "",
  subject: "",
  designation: "",
  user,
});

describe("teacher account links", () => {
  let store: MemoryTeacherLinkStore;

  beforeEach(() => {
    store = new MemoryTeacherLinkStore();
    store.teachers = [profile("t1"), profile("t2", "u2")];
    store.userRoles.set("u1", "teacher");
    store.userRoles.set("u2", "teacher");
    store.userRoles.set("u3", "student");
  });

  it("links a teacher account", async () => {
    const teacher = await linkTeacherUser("t1", "u1", store);
    expect(teacher).toEqual(profile("t1", "u1"));
  });

  it("relinking the same pair is allowed", async () => {
    await expect(linkTeacherUser("t2", "u2", store)).resolves.toMatchObject({ user: "u2" });
  });

  it("refuses an account that is not a teacher", async () => {
    await expect(linkTeacherUser("t1", "u3", store)).rejects.toThrow("Selected user is not a Teacher.");
  });

  it("refuses an account linked to another profile", async () => {
    await expect(linkTeacherUser("t1", "u2", store)).rejects.toThrow(
      "This user is already linked to another teacher profile."
    );
    expect(store.teachers[0].user).toBeNull();
  });

  it("reports missing teachers and users", async () => {
    await expect(linkTeacherUser("t9", "u1", store)).rejects.toMatchObject({
      statusCode: 404,
      message: "Teacher not found",
    });
    await expect(linkTeacherUser("t1", "u9", store)).rejects.toMatchObject({
      statusCode: 404,
      message: "User not found.",
    });
  });

  it("unlinks", async () => {
    await expect(unlinkTeacherUser("t2", store)).resolves.toMatchObject({ id: "t2", user: null });
  });
});
