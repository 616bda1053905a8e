import mongoose from "mongoose";
import { env } from "./env.js";
import { initRepositories } from "../repositories/index.js";
import { mongoRepositories } from "../repositories/mongo/index.js";

export const connectDB = async (): Promise<void> => {
  try {
    await mongoose.connect(env.MONGO_URI);
    initRepositories(mongoRepositories);
    console.log("[MONGODB]: MongoDB connected");
  } catch (err) {
    throw new Error(`[MONGODB]: MongoDB connection error: ${err}`);
  }
}

export const disconnectDB = async (): Promise<void> => {
  try {
    await mongoose.connection.close();
    console.log("[MONGODB]: MongoDB disconnected");
  } catch (err) {
    throw new Error(`[MONGODB]: MongoDB disconnection error: ${err}`);
  }
}
