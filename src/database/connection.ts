import mongoose from "mongoose";

let connected = false;

export function isDatabaseConnected(): boolean {
  return connected && mongoose.connection.readyState === 1;
}

export async function connectDatabase(uri: string | undefined): Promise<boolean> {
  if (isDatabaseConnected()) {
    return true;
  }
  if (!uri) {
    return false;
  }

  await mongoose.connect(uri, {
    maxPoolSize: 10,
    serverSelectionTimeoutMS: 5000,
  });
  // Indexes back the unique service names and the staff guards.
  await mongoose.syncIndexes();
  connected = true;
  return true;
}

export async function disconnectDatabase(): Promise<void> {
  if (!connected) {
    return;
  }
  await mongoose.disconnect();
  connected = false;
}
