// src/tests/accounts.test.ts
import express from "express";
import cookieParser from "cookie-parser";
import bcrypt from "bcryptjs";
import request from "supertest";
import { createAuthRouter } from "../routes/auth";
import { createAdminRouter } from "../routes/admin";
import { errorHandler } from "../middleware/errorHandler";
import type { UserSafe } from "../types/express";
import { MemoryAccountStore } from "./helpers/memorySources";
import { authCookie, userRecord } from "./helpers/testUsers";

const mockUsers = new Map<string, UserSafe>();

jest.mock("../models/User", () => ({
  ...jest.requireActual<typeof import("../models/User")>("../models/User"),
  __esModule: true,
  default: {
    findById: (id: string) => ({
      select: () => ({ lean: async () => mockUsers.get(String(id)) ?? null }),
    }),
  },
}));

jest.mock("../models/AuditLog", () => ({
  __esModule: true,
  default: { create: async () => ({}) },
}));

describe("account self-service and password resets", () => {
  const teacher = userRecord("teacher", { email: "teacher@school.test" });
  const admin = userRecord("admin");
  const teacherId = teacher._id.toString();
  let store: MemoryAccountStore;
  let app: express.Express;

  beforeAll(() => {
    jest.spyOn(console, "error").mockImplementation(() => undefined);
    for (const user of [teacher, admin]) mockUsers.set(user._id.toString(), user);
  });

  beforeEach(() => {
    store = new MemoryAccountStore();
    store.accounts.set(teacherId, {
      id: teacherId,
      name: teacher.name,
      email: teacher.email,
      role: "teacher",
      phone: "",
      mustChangePassword: false,
      passwordHash: bcrypt.hashSync("test-password", 4),
      tokenVersion: 0,
    });
    store.teacherPhones.set(teacherId, "");

    app = express();
    app.use(express.json());
    app.use(cookieParser());
    app.use("/auth", createAuthRouter(store));
    app.use("/admin", createAdminRouter(store));
    app.use(errorHandler);
  });

  const changePassword = (body: object) =>
    request(app).post("/auth/change-password").set("Cookie", authCookie(teacher)).send(body);

  describe("POST /auth/change-password", () => {
    it("stores the new password and renews the session", async () => {
      const res = await changePassword({ currentPassword: "test-password", newPassword: "new-secret" });

      expect(res.status).toBe(200);
      expect(res.body).toEqual({ message: "Password updated successfully." });
      expect(res.get("Set-Cookie")?.[0]).toMatch(/^token=/);

      const account = store.accounts.get(teacherId);
      expect(account?.tokenVersion).toBe(1);
      expect(bcrypt.compareSync("new-secret", account?.passwordHash ?? "")).toBe(true);
    });

    it("checks the current password", async () => {
      const res = await changePassword({ currentPassword: "wrong-password", newPassword: "new-secret" });
      expect(res.status).toBe(400);
      expect(res.body.message).toBe("Current password is incorrect.");
      expect(store.accounts.get(teacherId)?.tokenVersion).toBe(0);
    });

    it("requires six characters", async () => {
      const res = await changePassword({ currentPassword: "test-password", newPassword: "short" });
      expect(res.status).toBe(400);
      expect(res.body.message).toBe("New password must be at least 6 characters long.");
    });

    it("refuses to reuse the current password", async () => {
      const res = await changePassword({ currentPassword: "test-password", newPassword: "test-password" });
      expect(res.status).toBe(400);
      expect(res.body.message).toBe("New password cannot be the same as the current password.");
    });

    it("requires a session", async () => {
      const res = await request(app)
        .post("/auth/change-password")
        .send({ currentPassword: "test-password", newPassword: "new-secret" });
      expect(res.status).toBe(401);
    });
  });

  describe("PATCH /auth/update-profile", () => {
    it("updates the phone on the account and the teacher profile", async () => {
      const res = await request(app)
        .patch("/auth/update-profile")
        .set("Cookie", authCookie(teacher))
        .send({ phone: " 555-0100 " });

      expect(res.status).toBe(200);
      expect(res.body).toEqual({
        id: teacherId,
        name: "Test teacher",
        email: "teacher@school.test",
        role: "teacher",
        phone: "555-0100",
        mustChangePassword: false,
      });
      expect(store.teacherPhones.get(teacherId)).toBe("555-0100");
    });

    it("rejects an empty update", async () => {
      const res = await request(app)
        .patch("/auth/update-profile")
        .set("Cookie", authCookie(teacher))
        .send({});
      expect(res.status).toBe(400);
      expect(res.body.message).toBe("Nothing to update.");
    });

    it("rejects a malformed e-mail", async () => {
      const res = await request(app)
        .patch("/auth/update-profile")
        .set("Cookie", authCookie(teacher))
        .send({ email: "not-an-email" });
      expect(res.status).toBe(400);
      expect(res.body.code).toBe("MALFORMED_INPUT");
    });
  });

  describe("PUT /admin/users/:id/reset-password", () => {
    const reset = (body: object, id = teacherId) =>
      request(app).put(`/admin/users/${id}/reset-password`).set("Cookie", authCookie(admin)).send(body);

    it("generates a temporary password when none is given", async () => {
      const res = await reset({});

      expect(res.status).toBe(200);
      expect(res.body.message).toBe("Password reset.");
      expect(res.body.temp_password).toMatch(/^[A-Za-z0-9_-]{11}$/);

      const account = store.accounts.get(teacherId);
      expect(account?.mustChangePassword).toBe(true);
      expect(account?.tokenVersion).toBe(1);
      expect(bcrypt.compareSync(res.body.temp_password, account?.passwordHash ?? "")).toBe(true);
    });

    it("uses the password the admin chose", async () => {
      const res = await reset({ new_password: "temp-pass-1" });
      expect(res.body).toEqual({ message: "Password reset.", temp_password: "temp-pass-1" });
    });

    it("answers 404 for an unknown user", async () => {
      const res = await reset({}, "64d000000000000000000001");
      expect(res.status).toBe(404);
      expect(res.body.message).toBe("User not found");
    });

    it("is for admins only", async () => {
      const res = await request(app)
        .put(`/admin/users/${teacherId}/reset-password`)
        .set("Cookie", authCookie(teacher))
        .send({});
      expect(res.status).toBe(403);
    });
  });
});
