import { isValidTimeZone, parsePositiveInt } from "./core";

export interface AppConfig {
  port: number;
  databaseUrl?: string;
  defaultTimeZone: string;
  maxServiceGapMin?: number;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const databaseUrl = env.DATABASE_URL?.trim() || env.MONGODB_URI?.trim() || undefined;
  const timeZone = env.DEFAULT_TIMEZONE?.trim() || "UTC";
  const gapRaw = env.MAX_SERVICE_GAP_MIN?.trim();

  return {
    port: parsePositiveInt(env.PORT, 8000, 65_535),
    databaseUrl,
    defaultTimeZone: isValidTimeZone(timeZone) ? timeZone : "UTC",
    maxServiceGapMin: gapRaw ? parsePositiveInt(gapRaw, 30, 24 * 60) : undefined,
  };
}
