// src/routes/admin.ts
import { Router, Request, Response } from "express";
import bcrypt from "bcryptjs";
import { z } from "zod";
import { FilterQuery, Types } from "mongoose";
import User, { IUser, USER_ROLES, USER_STATUSES } from "../models/User";
import { getAuthUser, requireAuth, requireRole } from "../middleware/auth";
import { asyncHandler } from "../middleware/asyncHandler";
import { HttpError, notFound } from "../lib/httpError";
import { logAudit } from "../lib/auditLogger";
import { idParam, parseWith, searchPattern } from "../validation/common";
import { resetPasswordSchema } from "../validation/accounts";
import { AccountStore, PASSWORD_HASH_ROUNDS, resetPassword } from "../services/accounts";
import { mongoAccountStore } from "../repositories/mongoAccountStore";

const createUserSchema = z
  .object({
    name: z.string().trim().min(1).max(120),
    email: z.string().trim().toLowerCase().email(),
    password: z.string().min(8, "Password must be at least 8 characters."),
    role: z.enum(USER_ROLES),
  })
  .strict();

const roleSchema = z.object({ role: z.enum(USER_ROLES) }).strict();
const statusSchema = z.object({ status: z.enum(USER_STATUSES) }).strict();

export function createAdminRouter(accounts: AccountStore): Router {
  const router = Router();

  router.use(requireAuth, requireRole("admin"));

  // 👥 Get all users, optionally ?role=<role>&q=<name or email>
  router.get(
    "/users",
    asyncHandler(async (req: Request, res: Response) => {
      const filter: FilterQuery<IUser> = {};
      if (req.query.role !== undefined && req.query.role !== "") {
        filter.role = parseWith(z.enum(USER_ROLES), req.query.role);
      }
      const pattern = searchPattern(req.query.q);
      if (pattern) filter.$or = [{ name: pattern }, { email: pattern }];

      const users = await User.find(filter).sort({ name: 1 }).lean();
      res.json(users);
    })
  );

  // ➕ Create user
  router.post(
    "/users",
    asyncHandler(async (req: Request, res: Response) => {
      const { name, email, password, role } = parseWith(createUserSchema, req.body);

      if (await User.exists({ email })) {
        throw new HttpError(400, "A user with this email already exists", "PRECONDITION_FAILED");
      }

      const hashed = await bcrypt.hash(password, PASSWORD_HASH_ROUNDS);
      const user = await User.create({ name, email, password: hashed, role });

      await logAudit(req, {
        action: "user_created",
        targetUser: user._id,
        details: { email, role },
      });

      res.status(201).json({ id: user._id, name: user.name, email: user.email, role: user.role });
    })
  );

  // 🔄 Update role
  router.put(
    "/users/:id/role",
    asyncHandler(async (req: Request, res: Response) => {
      const id = idParam(req.params.id);
      const { role } = parseWith(roleSchema, req.body);

      if (getAuthUser(req)._id.toString() === id) {
        throw new HttpError(403, "You cannot change your own role", "FORBIDDEN");
      }

      const user = await User.findById(id);
      if (!user) throw notFound("User not found");

      const previousRole = user.role;
      user.role = role;
      // Invalidate sessions issued with the old role
      user.tokenVersion = (user.tokenVersion || 0) + 1;
      await user.save();

      await logAudit(req, {
        action: "user_role_changed",
        targetUser: user._id,
        details: { from: previousRole, to: role },
      });

      res.json({ message: "Role updated", id: user._id, role: user.role });
    })
  );

  // ⛔ Suspend / reactivate
  router.put(
    "/users/:id/status",
    asyncHandler(async (req: Request, res: Response) => {
      const id = idParam(req.params.id);
      const { status } = parseWith(statusSchema, req.body);

      if (getAuthUser(req)._id.toString() === id) {
        throw new HttpError(403, "You cannot change your own status", "FORBIDDEN");
      }

      const user = await User.findByIdAndUpdate(id, { status }, { new: true });
      if (!user) throw notFound("User not found");

      await logAudit(req, {
        action: "user_status_changed",
        targetUser: user._id,
        details: { status },
      });

      res.json({ message: "Status updated", id: user._id, status: user.status });
    })
  );

  // 🔑 Reset password; generated when new_password is left out, shown once
  router.put(
    "/users/:id/reset-password",
    asyncHandler(async (req: Request, res: Response) => {
      const id = idParam(req.params.id);
      const { new_password } = parseWith(resetPasswordSchema, req.body);
      const temporary = await resetPassword(id, new_password, accounts);

      await logAudit(req, { action: "password_reset", targetUser: new Types.ObjectId(id) });

      res.json({ message: "Password reset.", temp_password: temporary });
    })
  );

  return router;
}

export default createAdminRouter(mongoAccountStore);
