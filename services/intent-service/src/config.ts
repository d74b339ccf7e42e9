import dotenv from "dotenv";
import { ConfigError } from "./errors";

dotenv.config();

type Env = Record<string, string | undefined>;

function parseNumber(value: string | undefined, fallback: number): number {
  if (!value) {
    return fallback;
  }
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : fallback;
}

function parsePositive(value: string | undefined, fallback: number): number {
  const parsed = parseNumber(value, fallback);
  return parsed > 0 ? parsed : fallback;
}

function optionalString(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

function requireString(env: Env, key: string): string {
  const value = optionalString(env[key]);
  if (!value) {
    throw new ConfigError(`${key} must be provided via environment variables`);
  }
  return value;
}

function parseUrl(env: Env, key: string): URL {
  const raw = requireString(env, key);
  try {
    return new URL(raw);
  } catch {
    throw new ConfigError(`${key} is not a valid URL: ${raw}`);
  }
}

export type UpstreamCredentials = {
  readonly baseUrl: URL;
  readonly apiKey: string;
  readonly accountId?: string;
};

export type RetryPolicy = {
  readonly attempts: number;
  readonly baseDelayMs: number;
};

export type ServiceConfig = {
  port: number;
  serviceName: string;
  logLevel: string;
  eweb: {
    credentials: UpstreamCredentials;
    defaultSupplierId?: string;
    timeoutMs: number;
    pageSize: number;
    retry: RetryPolicy;
  };
};

export function loadConfig(env: Env = process.env): ServiceConfig {
  return {
    port: parseNumber(env.PORT, 3000),
    serviceName: env.SERVICE_NAME ?? "intent-service",
    logLevel: env.LOG_LEVEL ?? "info",
    eweb: {
      credentials: Object.freeze({
        baseUrl: parseUrl(env, "EWEB_BASE_URL"),
        apiKey: requireString(env, "EWEB_API_KEY"),
        accountId: optionalString(env.EWEB_ACCOUNT_ID)
      }),
      defaultSupplierId: optionalString(env.EWEB_DEFAULT_SUPPLIER_ID),
      timeoutMs: parsePositive(env.EWEB_TIMEOUT_MS, 30_000),
      pageSize: Math.max(1, Math.floor(parsePositive(env.EWEB_PAGE_SIZE, 100))),
      retry: {
        attempts: Math.max(1, Math.floor(parseNumber(env.EWEB_RETRY_ATTEMPTS, 3))),
        baseDelayMs: parsePositive(env.EWEB_RETRY_BASE_DELAY_MS, 200)
      }
    }
  };
}
