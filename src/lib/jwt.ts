// src/lib/jwt.ts
import jwt from "jsonwebtoken";
import { Response } from "express";
import config from "../config/config";
import { isUserRole, type UserRole } from "../models/User";

export interface TokenPayload {
  id: string;
  role: UserRole;
  version: number;
}

export const signToken = (payload: TokenPayload) =>
  jwt.sign(payload, config.jwtSecret, { expiresIn: config.jwtExpiresInSeconds });

// Create JWT and store in HttpOnly cookie
export const setAuthCookie = (res: Response, payload: TokenPayload) => {
  res.cookie("token", signToken(payload), {
    httpOnly: true,
    sameSite: "strict",
    secure: config.isProduction,
    maxAge: config.jwtExpiresInSeconds * 1000,
  });
};

export const clearAuthCookie = (res: Response) => {
  res.clearCookie("token", {
    httpOnly: true,
    sameSite: "strict",
    secure: config.isProduction,
  });
};

// Verify JWT and check the claims we rely on
export const verifyToken = (token: string): TokenPayload | null => {
  const decoded = jwt.verify(token, config.jwtSecret);
  if (typeof decoded === "string") return null;

  const { id, role, version } = decoded;
  if (typeof id !== "string" || !isUserRole(role)) return null;

  return {
    id,
    role,
    version: typeof version === "number" ? version : 0,
  };
};
