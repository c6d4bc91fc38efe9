import dotenv from "dotenv";
import type { LogLevel } from "./logger";

dotenv.config();

export interface EnvConfig {
  nodeEnv: string;
  debugMode: boolean;
  logLevel: LogLevel;
  port: number;
  jwtSecret: string;
  jwtTtlHours: number;
  supabaseUrl?: string;
  supabaseApiKey?: string;
  upstreamApiUrl: string;
  upstreamTimeoutMs: number;
  recommendationsDefaultLimit: number;
  trendingSkillsDefaultLimit: number;
}

const DEVELOPMENT_JWT_SECRET = "dev-only-jwt-secret";

function getOptionalTrimmed(source: NodeJS.ProcessEnv, name: string): string | undefined {
  const value = source[name];
  if (typeof value !== "string") {
    return undefined;
  }
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : undefined;
}

export function loadEnv(source: NodeJS.ProcessEnv = process.env): EnvConfig {
  const nodeEnv = source.NODE_ENV ?? "development";
  const portRaw = source.PORT ?? "3001";
  const port = Number(portRaw);
  const jwtTtlRaw = source.JWT_TTL_HOURS ?? "24";
  const jwtTtlHours = Number(jwtTtlRaw);
  const upstreamTimeoutRaw = source.UPSTREAM_TIMEOUT_MS ?? "15000";
  const upstreamTimeoutMs = Number(upstreamTimeoutRaw);
  const recommendationsLimitRaw = source.RECOMMENDATIONS_DEFAULT_LIMIT ?? "5";
  const recommendationsDefaultLimit = Number(recommendationsLimitRaw);
  const trendingLimitRaw = source.TRENDING_SKILLS_DEFAULT_LIMIT ?? "10";
  const trendingSkillsDefaultLimit = Number(trendingLimitRaw);
  const debugMode = parseBoolean(source.DEBUG_MODE ?? "false");
  const logLevel = parseLogLevel((source.LOG_LEVEL ?? (debugMode ? "debug" : "info")).trim().toLowerCase());

  if (!Number.isInteger(port) || port <= 0) {
    throw new Error(`Invalid PORT value: ${portRaw}`);
  }
  if (!Number.isFinite(jwtTtlHours) || jwtTtlHours <= 0) {
    throw new Error(`Invalid JWT_TTL_HOURS value: ${jwtTtlRaw}`);
  }
  if (!Number.isInteger(upstreamTimeoutMs) || upstreamTimeoutMs < 100) {
    throw new Error(`Invalid UPSTREAM_TIMEOUT_MS value: ${upstreamTimeoutRaw}`);
  }
  if (!Number.isInteger(recommendationsDefaultLimit) || recommendationsDefaultLimit < 0) {
    throw new Error(`Invalid RECOMMENDATIONS_DEFAULT_LIMIT value: ${recommendationsLimitRaw}`);
  }
  if (!Number.isInteger(trendingSkillsDefaultLimit) || trendingSkillsDefaultLimit < 0) {
    throw new Error(`Invalid TRENDING_SKILLS_DEFAULT_LIMIT value: ${trendingLimitRaw}`);
  }

  return {
    nodeEnv,
    debugMode,
    logLevel,
    port,
    jwtSecret: resolveJwtSecret(source, nodeEnv),
    jwtTtlHours,
    supabaseUrl: getOptionalTrimmed(source, "SUPABASE_URL"),
    supabaseApiKey:
      getOptionalTrimmed(source, "SUPABASE_SERVICE_ROLE_KEY") ??
      getOptionalTrimmed(source, "SUPABASE_PUBLISHABLE_KEY"),
    upstreamApiUrl: (getOptionalTrimmed(source, "UPSTREAM_API_URL") ?? "http://localhost:8000").replace(/\/+$/, ""),
    upstreamTimeoutMs,
    recommendationsDefaultLimit,
    trendingSkillsDefaultLimit,
  };
}

function resolveJwtSecret(source: NodeJS.ProcessEnv, nodeEnv: string): string {
  const secret = getOptionalTrimmed(source, "JWT_SECRET_KEY");
  if (secret) {
    return secret;
  }
  if (nodeEnv === "development" || nodeEnv === "test") {
    return DEVELOPMENT_JWT_SECRET;
  }
  throw new Error("Missing required environment variable: JWT_SECRET_KEY");
}

function parseBoolean(value: string): boolean {
  const normalized = value.trim().toLowerCase();
  if (normalized === "true" || normalized === "1" || normalized === "yes") {
    return true;
  }
  if (normalized === "false" || normalized === "0" || normalized === "no") {
    return false;
  }
  throw new Error(`Invalid boolean value: ${value}`);
}

function parseLogLevel(value: string): LogLevel {
  if (value === "debug" || value === "info" || value === "warn" || value === "error") {
    return value;
  }
  throw new Error(`Invalid LOG_LEVEL value: ${value}`);
}
