import { config as loadEnv } from "dotenv";

if (process.env.NODE_ENV !== "production") {
  loadEnv();
}

export type StoreKind = "sqlite" | "memory";

export type ServerConfig = {
  host: string;
  port: number;
  store: StoreKind;
  dbPath: string;
  logLevel: string;
  version: string;
  // true reflects the request origin back; a list pins the allowed origins
  corsOrigin: true | string[];
};

const DEFAULT_PORT = 3333;

const resolvePort = (value?: string): number => {
  const port = Number(value ?? DEFAULT_PORT);
  return Number.isInteger(port) && port > 0 && port < 65536 ? port : DEFAULT_PORT;
};

const resolveStore = (value?: string): StoreKind => {
  if (value === undefined || value === "") return "sqlite";
  if (value === "sqlite" || value === "memory") return value;
  throw new Error(`STORE must be "sqlite" or "memory", got "${value}"`);
};

const resolveCorsOrigin = (value?: string): true | string[] => {
  const origins = (value ?? "")
    .split(",")
    .map((origin) => origin.trim())
    .filter((origin) => origin.length > 0);
  return origins.length > 0 ? origins : true;
};

export function loadServerConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  const isTest = env.NODE_ENV === "test";

  return {
    host: env.HOST || "0.0.0.0",
    port: resolvePort(env.PORT),
    store: resolveStore(env.STORE),
    dbPath: env.DB_PATH || "./data/annotation.db",
    logLevel: env.LOG_LEVEL ?? (isTest ? "silent" : "info"),
    version: env.APP_VERSION || "dev",
    corsOrigin: resolveCorsOrigin(env.CORS_ORIGINS),
  };
}
