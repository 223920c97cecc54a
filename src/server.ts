// src/server.ts
import app from "./app";
import connectDB from "./config/db";
import config from "./config/config";
import { ensureDefaultAdmin } from "./config/defaultData";
import { cleanupOrphanedMarks } from "./scripts/cleanupMarks";

const startServer = async () => {
  try {
    if (!config.jwtSecret) {
      throw new Error("JWT_SECRET must be set in production");
    }

    await connectDB();
    await cleanupOrphanedMarks();
    await ensureDefaultAdmin();
    console.log("[startup] Default data initialized");

    app.listen(config.port, () => {
      console.log(`Server running on http://localhost:${config.port}`);
      console.log(`Frontend: ${config.frontendUrl}`);
      console.log(`Environment: ${config.env}`);
    });
  } catch (error) {
    console.error("Failed to start server:", error);
    process.exit(1);
  }
};

void startServer();
