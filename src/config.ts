import { config as loadEnv } from "dotenv";
import path from "node:path";

const envPath = path.resolve(__dirname, "../.env");
loadEnv({ path: envPath });

export const readNumber = (key: string, fallback: number, env: NodeJS.ProcessEnv = process.env): number => {
  const raw = env[key];
  if (raw === undefined || raw.trim() === "") return fallback;
  const value = Number(raw);
  if (!Number.isFinite(value)) {
    throw new Error(`Invalid numeric environment variable: ${key}=${raw}`);
  }
  return value;
};

export const serverConfig = {
  port: readNumber("PORT", 5000),
  host: process.env.HOST ?? "0.0.0.0",
  maxTextLength: readNumber("MAX_TEXT_LENGTH", 5000),
};

export const classifierConfig = {
  lexiconDir: process.env.LEXICON_DIR ?? path.resolve(__dirname, "../data"),
  similarityThreshold: readNumber("SIMILARITY_THRESHOLD", 0.8),
};
