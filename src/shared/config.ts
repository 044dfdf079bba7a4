import fs from "fs";
import path from "path";
import dotenv from "dotenv";

const isProdEnv = process.env.CONVENTUS_ENV === "prod" || process.env.NODE_ENV === "production";
const envFile = isProdEnv ? ".env.prod" : ".env.dev";
const envPath = path.resolve(process.cwd(), envFile);
const envFileExists = fs.existsSync(envPath);

if (envFileExists) {
  dotenv.config({ path: envPath });
}

export const envInfo = {
  envFile,
  envPath,
  envFileExists
};

const requiredEnv = (key: string): string => {
  const value = process.env[key];
  if (!value) {
    throw new Error(`Missing required env var: ${key}`);
  }
  return value;
};

export const positiveInt = (value: string | undefined, fallback: number): number => {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) return fallback;
  return parsed;
};

export const config = {
  port: positiveInt(process.env.PORT, 3000),
  dbUrl: process.env.DATABASE_URL ?? "",
  rijksApiKey: process.env.RIJKSMUSEUM_API_KEY ?? "",
  httpTimeoutMs: positiveInt(process.env.HTTP_TIMEOUT_MS, 10_000),
  detailConcurrency: positiveInt(process.env.DETAIL_CONCURRENCY, 5),
  metDetailCap: positiveInt(process.env.MET_DETAIL_CAP, 100),
  userAgent: "museum-conventus/0.1 (+https://example.local)",
  requireEnv: requiredEnv
};

export type AppConfig = typeof config;
