// src/config/db.ts
import mongoose from "mongoose";
import config from "./config";

const connectDB = async () => {
  try {
    await mongoose.connect(config.databaseURI);
    console.log("[db] MongoDB connected");
  } catch (error) {
    console.error("[db] MongoDB connection error:", error);
    process.exit(1);
  }
};

export default connectDB;
