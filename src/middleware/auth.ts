// src/middleware/auth.ts
import { Request, Response, NextFunction } from "express";
import { clearAuthCookie, TokenPayload, verifyToken } from "../lib/jwt";
import { unauthenticated } from "../lib/httpError";
import User, { UserRole } from "../models/User";
import type { UserSafe } from "../types/express";

export async function requireAuth(req: Request, res: Response, next: NextFunction): Promise<void> {
  const token: unknown = req.cookies?.token;

  if (typeof token !== "string" || !token) {
    res.status(401).json({ message: "Not authenticated" });
    return;
  }

  let payload: TokenPayload | null;
  try {
    payload = verifyToken(token);
  } catch {
    res.status(401).json({ message: "Session expired or invalid" });
    return;
  }
  if (!payload) {
    res.status(401).json({ message: "Invalid token" });
    return;
  }

  try {
    // Re-read the user so suspensions and password changes apply immediately
    const userDoc = await User.findById(payload.id)
      .select("name email role status tokenVersion")
      .lean();

    if (!userDoc || userDoc.status === "suspended") {
      clearAuthCookie(res);
      res.status(403).json({ message: "Session revoked. Access denied." });
      return;
    }

    if (payload.version !== (userDoc.tokenVersion ?? 0)) {
      clearAuthCookie(res);
      res.status(401).json({ message: "Session expired due to security update." });
      return;
    }

    req.user = {
      _id: userDoc._id,
      name: userDoc.name,
      email: userDoc.email,
      role: userDoc.role,
      status: userDoc.status,
      tokenVersion: userDoc.tokenVersion ?? 0,
    };
    next();
  } catch (err) {
    next(err);
  }
}

export function requireRole(...roles: UserRole[]) {
  return (req: Request, res: Response, next: NextFunction) => {
    const user = req.user;

    if (!user) {
      res.status(401).json({ message: "Not authenticated" });
      return;
    }

    if (user.role === "admin") return next();

    if (!roles.includes(user.role)) {
      res.status(403).json({ message: "Forbidden: insufficient role" });
      return;
    }

    next();
  };
}

/** Roles allowed to edit the timetable and publish results. */
export const requirePrivileged = requireRole("admin", "staff");

/** The user set by requireAuth; throws 401 when the route is not behind it. */
export function getAuthUser(req: Request): UserSafe {
  if (!req.user) throw unauthenticated();
  return req.user;
}

/** Lets anonymous requests through; a cookie that is sent must still be valid. */
export async function optionalAuth(req: Request, res: Response, next: NextFunction): Promise<void> {
  const token: unknown = req.cookies?.token;
  if (typeof token !== "string" || !token) {
    next();
    return;
  }
  await requireAuth(req, res, next);
}
