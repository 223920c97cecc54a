// src/models/User.ts
import mongoose, { Schema, Types } from "mongoose";

export const USER_ROLES = ["admin", "staff", "teacher", "student"] as const;
export type UserRole = (typeof USER_ROLES)[number];

export const USER_STATUSES = ["active", "suspended"] as const;
export type UserStatus = (typeof USER_STATUSES)[number];

export const isUserRole = (value: unknown): value is UserRole =>
  USER_ROLES.some((role) => role === value);

export interface IUser {
  _id: Types.ObjectId;
  name: string;
  email: string;
  password: string;
  role: UserRole;
  status: UserStatus;
  tokenVersion: number;
  phone?: string;
  // Set when an admin issues a temporary password
  mustChangePassword: boolean;
}

const userSchema = new Schema<IUser>(
  {
    name: { type: String, required: true, trim: true },
    email: { type: String, required: true, unique: true, lowercase: true, trim: true },
    password: { type: String, required: true, select: false },
    role: { type: String, enum: USER_ROLES, required: true },
    status: { type: String, enum: USER_STATUSES, default: "active" },
    tokenVersion: { type: Number, default: 0, required: true },
    phone: { type: String, trim: true },
    mustChangePassword: { type: Boolean, default: false },
  },
  { timestamps: true }
);

const User = mongoose.model<IUser>("User", userSchema);

export default User;
