// src/routes/auth.ts
import { Router, Request, Response } from "express";
import bcrypt from "bcryptjs";
import User from "../models/User";
import { clearAuthCookie, setAuthCookie } from "../lib/jwt";
import { getAuthUser, requireAuth } from "../middleware/auth";
import { asyncHandler } from "../middleware/asyncHandler";
import { HttpError } from "../lib/httpError";
import { logAudit } from "../lib/auditLogger";
import { loginRateLimiter, sanitizeInput } from "../middleware/security";
import { parseWith } from "../validation/common";
import { changePasswordSchema, updateProfileSchema } from "../validation/accounts";
import { AccountStore, changePassword, updateProfile } from "../services/accounts";
import { mongoAccountStore } from "../repositories/mongoAccountStore";

// Compared against when the e-mail is unknown so both paths cost one bcrypt round
const DUMMY_HASH = "$2a$12$LRYuW9uB6S1EjSM0rE9Q9u3Z9Q9Z9Q9Z9Q9Z9Q9Z9Q9Z9Q9Z9Q9Z9";

export function createAuthRouter(accounts: AccountStore): Router {
  const router = Router();

  router.post(
    "/login",
    loginRateLimiter,
    sanitizeInput,
    asyncHandler(async (req: Request, res: Response) => {
      const email = String(req.body?.email || "")
        .toLowerCase()
        .trim();
      const password = String(req.body?.password || "");

      if (!email || !password) {
        throw new HttpError(400, "Missing credentials", "MALFORMED_INPUT");
      }

      const user = await User.findOne({ email }).select("+password");
      const isPasswordValid = await bcrypt.compare(password, user?.password || DUMMY_HASH);

      if (!user || !isPasswordValid) {
        throw new HttpError(401, "Invalid credentials", "UNAUTHENTICATED");
      }

      if (user.status === "suspended") {
        throw new HttpError(403, "Account suspended. Contact administration.", "FORBIDDEN");
      }

      setAuthCookie(res, {
        id: user._id.toString(),
        role: user.role,
        version: user.tokenVersion || 0,
      });

      await logAudit(req, {
        action: "login_success",
        actor: user._id,
        details: { email: user.email, role: user.role },
      });

      res.json({
        message: "Login successful",
        user: {
          name: user.name,
          email: user.email,
          role: user.role,
          mustChangePassword: user.mustChangePassword ?? false,
        },
      });
    })
  );

  router.get(
    "/me",
    requireAuth,
    asyncHandler(async (req: Request, res: Response) => {
      const user = getAuthUser(req);
      res.json({ id: user._id, role: user.role, email: user.email, name: user.name });
    })
  );

  router.post(
    "/logout",
    requireAuth,
    asyncHandler(async (req: Request, res: Response) => {
      const user = getAuthUser(req);
      clearAuthCookie(res);
      await logAudit(req, { action: "logout", actor: user._id });
      res.json({ message: "Logged out" });
    })
  );

  router.post(
    "/change-password",
    requireAuth,
    asyncHandler(async (req: Request, res: Response) => {
      const user = getAuthUser(req);
      const version = await changePassword(
        user._id.toString(),
        parseWith(changePasswordSchema, req.body),
        accounts
      );

      // Other sessions are revoked; this one continues on the new version
      setAuthCookie(res, { id: user._id.toString(), role: user.role, version });
      await logAudit(req, { action: "password_changed" });

      res.json({ message: "Password updated successfully." });
    })
  );

  router.patch(
    "/update-profile",
    requireAuth,
    asyncHandler(async (req: Request, res: Response) => {
      const user = getAuthUser(req);
      const changes = parseWith(updateProfileSchema, req.body);
      const profile = await updateProfile(user._id.toString(), changes, accounts);

      await logAudit(req, { action: "profile_updated", details: { fields: Object.keys(changes) } });
      res.json(profile);
    })
  );

  return router;
}

export default createAuthRouter(mongoAccountStore);
