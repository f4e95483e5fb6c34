import path from "path";
import dotenv from "dotenv";

dotenv.config();

export type StoreKind = "mongo" | "file" | "memory";

export interface AppConfig {
  port: number;
  store: StoreKind;
  databaseUrl?: string;
  databaseName?: string;
  dataDir: string;
  corsOrigins: string[] | "*";
}

const DEFAULT_PORT = 8000;
const DEFAULT_DATA_DIR = path.join(__dirname, "../data");

function parsePort(value: string | undefined): number {
  if (!value) {
    return DEFAULT_PORT;
  }
  const port = Number(value);
  if (!Number.isInteger(port) || port <= 0) {
    throw new Error(`PORT must be a positive integer, got "${value}"`);
  }
  return port;
}

function parseOrigins(value: string | undefined): string[] | "*" {
  if (!value || value.trim() === "*") {
    return "*";
  }
  return value
    .split(",")
    .map((origin) => origin.trim())
    .filter((origin) => origin.length > 0);
}

/**
 * Read service settings from the environment (after .env is loaded).
 * DATABASE_URL selects MongoDB; STORE=memory forces the in-memory store;
 * otherwise documents go to JSON files under DATA_DIR.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const databaseUrl = env.DATABASE_URL || undefined;

  let store: StoreKind = "file";
  if (env.STORE === "memory") {
    store = "memory";
  } else if (databaseUrl) {
    store = "mongo";
  }

  return {
    port: parsePort(env.PORT),
    store,
    databaseUrl,
    databaseName: env.DATABASE_NAME || undefined,
    dataDir: env.DATA_DIR || DEFAULT_DATA_DIR,
    corsOrigins: parseOrigins(env.CORS_ORIGINS),
  };
}
