// src/config/defaultData.ts
import bcrypt from "bcryptjs";
import User from "../models/User";
import config from "./config";

const RETRY_DELAY_MS = 2000;

export const ensureDefaultAdmin = async (retries = 3) => {
  if (!config.adminEmail || !config.adminPassword) {
    console.warn("[seed] ADMIN_EMAIL / ADMIN_PASSWORD not set, skipping admin seed");
    return;
  }

  for (let i = 0; i < retries; i++) {
    try {
      const existing = await User.countDocuments({ role: "admin" });
      if (existing > 0) {
        console.log(`[seed] ${existing} admin account(s) found`);
        return;
      }

      const password = await bcrypt.hash(config.adminPassword, 12);
      const admin = await User.create({
        name: config.adminName,
        email: config.adminEmail.toLowerCase().trim(),
        password,
        role: "admin",
      });
      console.log("[seed] Default admin created ->", admin.email);
      return;
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      console.error(`[seed] Attempt ${i + 1} failed:`, message);
      if (i === retries - 1) {
        console.error("[seed] Failed to ensure default admin after retries");
      } else {
        await new Promise((resolve) => setTimeout(resolve, RETRY_DELAY_MS));
      }
    }
  }
};
