// src/config/config.ts
import dotenv from "dotenv";

dotenv.config();

const isProduction = process.env.NODE_ENV === "production";

const config = Object.freeze({
  env: process.env.NODE_ENV || "development",
  isProduction,
  port: Number(process.env.PORT) || 8000,
  databaseURI: process.env.MONGODB_URI || "mongodb://localhost:27017/school",
  frontendUrl: process.env.FRONTEND_URL || "http://localhost:3000",
  // Production refuses to start without a real secret (see server.ts)
  jwtSecret: process.env.JWT_SECRET || (isProduction ? "" : "change-me"),
  jwtExpiresInSeconds: Number(process.env.JWT_EXPIRES_IN_SECONDS) || 24 * 60 * 60,
  adminEmail: process.env.ADMIN_EMAIL || "",
  adminPassword: process.env.ADMIN_PASSWORD || "",
  adminName: process.env.ADMIN_NAME || "School Administrator",
});

export default config;
