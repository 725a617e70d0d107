import mongoose from "mongoose";

// Prevent query buffering (critical): a down database must fail requests, not queue them
mongoose.set("bufferCommands", false);
mongoose.set("strictQuery", true);

let connecting: Promise<typeof mongoose> | null = null;

export async function connectDB(uri: string, dbName: string) {
  if (!connecting) {
    connecting = mongoose
      .connect(uri, {
        dbName,
        serverSelectionTimeoutMS: 5000,
        socketTimeoutMS: 10_000,
      })
      .catch((err: unknown) => {
        connecting = null;
        throw err;
      });
  }
  return connecting;
}

export async function disconnectDB() {
  if (!connecting) return;
  connecting = null;
  await mongoose.disconnect();
}
