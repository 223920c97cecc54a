// src/services/accounts.ts
import crypto from "crypto";
import bcrypt from "bcryptjs";
import { HttpError, notFound, preconditionFailed } from "../lib/httpError";

export const PASSWORD_HASH_ROUNDS = 12;
export const MIN_NEW_PASSWORD_LENGTH = 6;

export interface AccountProfile {
  id: string;
  name: string;
  email: string;
  role: string;
  phone: string;
  mustChangePassword: boolean;
}

export interface ProfileChanges {
  email?: string;
  phone?: string;
}

export interface AccountStore {
  findPasswordHash(userId: string): Promise<string | null>;
  /** Stores the hash, bumps tokenVersion and returns the new version. */
  setPassword(userId: string, hash: string, mustChangePassword: boolean): Promise<number | null>;
  /** Also copies a new phone number onto a linked teacher profile. */
  updateProfile(userId: string, changes: ProfileChanges): Promise<AccountProfile | null>;
}

export interface PasswordChange {
  currentPassword: string;
  newPassword: string;
}

/** Returns the tokenVersion the caller's new session must carry. */
export async function changePassword(
  userId: string,
  { currentPassword, newPassword }: PasswordChange,
  store: AccountStore
): Promise<number> {
  const hash = await store.findPasswordHash(userId);
  if (!hash) throw notFound("User not found");

  if (!(await bcrypt.compare(currentPassword, hash))) {
    throw preconditionFailed("Current password is incorrect.");
  }
  if (newPassword.length < MIN_NEW_PASSWORD_LENGTH) {
    throw preconditionFailed(
      `New password must be at least ${MIN_NEW_PASSWORD_LENGTH} characters long.`
    );
  }
  if (newPassword === currentPassword) {
    throw preconditionFailed("New password cannot be the same as the current password.");
  }

  const version = await store.setPassword(
    userId,
    await bcrypt.hash(newPassword, PASSWORD_HASH_ROUNDS),
    false
  );
  if (version === null) throw notFound("User not found");
  return version;
}

export const generateTemporaryPassword = () => crypto.randomBytes(8).toString("base64url");

/**
 * Sets a password chosen by an admin, or a generated one, and makes the
 * user change it at next login. Existing sessions are revoked.
 */
export async function resetPassword(
  userId: string,
  newPassword: string | undefined,
  store: AccountStore
): Promise<string> {
  const temporary = newPassword || generateTemporaryPassword();
  const version = await store.setPassword(
    userId,
    await bcrypt.hash(temporary, PASSWORD_HASH_ROUNDS),
    true
  );
  if (version === null) throw notFound("User not found");
  return temporary;
}

export async function updateProfile(userId: string, changes: ProfileChanges, store: AccountStore) {
  if (changes.email === undefined && changes.phone === undefined) {
    throw new HttpError(400, "Nothing to update.", "MALFORMED_INPUT");
  }
  const profile = await store.updateProfile(userId, changes);
  if (!profile) throw notFound("User not found");
  return profile;
}
