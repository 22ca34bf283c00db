import mongoose from "mongoose";
import { logger } from "../utils/logger";

export async function connectToDatabase(uri: string): Promise<typeof mongoose> {
  mongoose.connection.on("error", (err) => {
    logger.error("[Mongo] Connection error", err);
  });
  mongoose.connection.on("disconnected", () => {
    logger.warning("[Mongo] Disconnected");
  });

  const connection = await mongoose.connect(uri, {
    serverSelectionTimeoutMS: 5_000,
  });
  logger.success("[Mongo] Connected");
  return connection;
}

export async function disconnectFromDatabase(): Promise<void> {
  await mongoose.disconnect();
}
