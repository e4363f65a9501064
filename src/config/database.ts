// src/config/database.ts

import mongoose from "mongoose";
import { createLog } from "../lib/logger";

const log = createLog("MongoDB");

let isConnected = false;

export const connectDatabase = async (
  url: string,
  timeoutMs: number,
): Promise<mongoose.Connection> => {
  if (isConnected) {
    log.info("Using existing MongoDB connection");
    return mongoose.connection;
  }

  try {
    const conn = await mongoose.connect(url, {
      bufferCommands: false,
      maxPoolSize: 10,
      serverSelectionTimeoutMS: timeoutMs,
      socketTimeoutMS: timeoutMs * 2,
    });

    isConnected = true;
    log.success(`Connected: ${conn.connection.host}`);
    return conn.connection;
  } catch (error) {
    log.error("Database connection error", error);
    throw error;
  }
};

export const disconnectDatabase = async (): Promise<void> => {
  if (!isConnected) return;
  await mongoose.disconnect();
  isConnected = false;
  log.info("Disconnected");
};
