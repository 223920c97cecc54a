// src/repositories/mongoAccountStore.ts
import User from "../models/User";
import Teacher from "../models/Teacher";
import type { AccountProfile, AccountStore } from "../services/accounts";

interface StoredAccount {
  _id: { toString(): string };
  name: string;
  email: string;
  role: string;
  phone?: string;
  mustChangePassword?: boolean;
}

const toProfile = (user: StoredAccount): AccountProfile => ({
  id: user._id.toString(),
  name: user.name,
  email: user.email,
  role: user.role,
  phone: user.phone ?? "",
  mustChangePassword: user.mustChangePassword ?? false,
});

export const mongoAccountStore: AccountStore = {
  async findPasswordHash(userId) {
    const user = await User.findById(userId).select("+password").lean();
    return user ? user.password : null;
  },

  async setPassword(userId, hash, mustChangePassword) {
    const user = await User.findByIdAndUpdate(
      userId,
      { $set: { password: hash, mustChangePassword }, $inc: { tokenVersion: 1 } },
      { new: true }
    ).lean();
    return user ? user.tokenVersion : null;
  },

  async updateProfile(userId, { email, phone }) {
    const user = await User.findByIdAndUpdate(
      userId,
      {
        ...(email !== undefined ? { email } : {}),
        ...(phone !== undefined ? { phone } : {}),
      },
      { new: true, runValidators: true }
    ).lean();
    if (!user) return null;

    if (phone !== undefined) {
      await Teacher.updateOne({ user: user._id }, { contactPhone: phone });
    }
    return toProfile(user);
  },
};
