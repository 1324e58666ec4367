import path from "path";

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

export type NoticeStoreKind = "memory" | "pg";

export type ApiConfig = {
  port: number;
  authSecret: string;
  nonceSecret: string;
  nonceLifetimeSeconds: number;
  noticeStore: NoticeStoreKind;
  databaseUrl: string | null;
  noticesFile: string;
  dismissUrl: string;
};

export const DEFAULT_NONCE_LIFETIME_SECONDS = 24 * 60 * 60;
export const DEFAULT_DISMISS_URL = "/notices/dismiss";
export const DEFAULT_NOTICES_FILE = "config/notices.json";

function requireEnv(env: NodeJS.ProcessEnv, key: string): string {
  const value = env[key];
  if (!value || value.trim() === "") {
    throw new ConfigError(`Missing required environment variable: ${key}`);
  }
  return value;
}

function optionalEnv(env: NodeJS.ProcessEnv, key: string): string | undefined {
  const value = env[key];
  if (value === undefined || value.trim() === "") return undefined;
  return value.trim();
}

function parsePositiveInt(key: string, raw: string): number {
  const parsed = Number(raw);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new ConfigError(`${key} must be a positive integer, received: ${raw}`);
  }
  return parsed;
}

function parseStoreKind(raw: string | undefined): NoticeStoreKind {
  if (raw === undefined) return "memory";
  const normalized = raw.toLowerCase();
  if (normalized === "memory" || normalized === "pg") return normalized;
  throw new ConfigError(`NOTICE_STORE must be "memory" or "pg", received: ${raw}`);
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): ApiConfig {
  const port = parsePositiveInt("PORT", requireEnv(env, "PORT"));
  const authSecret = requireEnv(env, "AUTH_SECRET");
  const nonceSecret = optionalEnv(env, "NONCE_SECRET") ?? authSecret;
  const lifetimeRaw = optionalEnv(env, "NONCE_LIFETIME_SECONDS");
  const nonceLifetimeSeconds = lifetimeRaw
    ? parsePositiveInt("NONCE_LIFETIME_SECONDS", lifetimeRaw)
    : DEFAULT_NONCE_LIFETIME_SECONDS;
  if (nonceLifetimeSeconds < 2) {
    throw new ConfigError("NONCE_LIFETIME_SECONDS must be at least 2");
  }
  const noticeStore = parseStoreKind(optionalEnv(env, "NOTICE_STORE"));
  const databaseUrl = optionalEnv(env, "DATABASE_URL") ?? null;
  if (noticeStore === "pg" && !databaseUrl) {
    throw new ConfigError("DATABASE_URL is required when NOTICE_STORE=pg");
  }
  return {
    port,
    authSecret,
    nonceSecret,
    nonceLifetimeSeconds,
    noticeStore,
    databaseUrl,
    // Relative paths resolve against the working directory (apps/api under npm scripts).
    noticesFile: path.resolve(optionalEnv(env, "NOTICES_FILE") ?? DEFAULT_NOTICES_FILE),
    dismissUrl: optionalEnv(env, "NOTICE_DISMISS_URL") ?? DEFAULT_DISMISS_URL
  };
}
