// src/types/express.d.ts
import { Types } from "mongoose";
import type { UserRole, UserStatus } from "../models/User";

// Authenticated user attached by requireAuth (never carries the password)
export interface UserSafe {
  _id: Types.ObjectId;
  name: string;
  email: string;
  role: UserRole;
  status: UserStatus;
  tokenVersion: number;
}

declare global {
  namespace Express {
    interface Request {
      user?: UserSafe;
    }
  }
}

export {};
