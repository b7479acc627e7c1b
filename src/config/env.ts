/**
 * Environment Configuration
 *
 * All configuration comes from environment variables.
 * See .env.example for the full list.
 */

export interface Config {
  NODE_ENV: string;
  PORT: number;

  // SMTP relay
  SMTP_HOST: string;
  SMTP_PORT: number;
  SMTP_SECURE: boolean;
  SMTP_TIMEOUT_MS: number;

  // Rate limiting
  RATE_LIMIT_PER_SECOND: number;
  RATE_LIMIT_CLEANUP_INTERVAL_MS: number;
  RATE_LIMIT_IDLE_TTL_MS: number;

  BODY_LIMIT: string;
}

type Env = Record<string, string | undefined>;

function positiveInt(env: Env, name: string, fallback: number): number {
  const raw = env[name];
  if (raw === undefined || raw === "") {
    return fallback;
  }

  const value = Number(raw);
  if (!Number.isInteger(value) || value <= 0) {
    console.warn(`⚠️  ${name}=${raw} is not a positive integer, using ${fallback}`);
    return fallback;
  }
  return value;
}

export function loadConfig(env: Env): Config {
  const smtpPort = positiveInt(env, "SMTP_PORT", 587);
  const secure = env.SMTP_SECURE;

  return {
    NODE_ENV: env.NODE_ENV || "development",
    PORT: positiveInt(env, "PORT", 1112),

    SMTP_HOST: env.SMTP_HOST || "localhost",
    SMTP_PORT: smtpPort,
    // Implicit TLS only on the submissions port unless told otherwise
    SMTP_SECURE: secure === undefined || secure === "" ? smtpPort === 465 : secure === "true" || secure === "1",
    SMTP_TIMEOUT_MS: positiveInt(env, "SMTP_TIMEOUT_MS", 30_000),

    RATE_LIMIT_PER_SECOND: positiveInt(env, "RATE_LIMIT_PER_SECOND", 10),
    RATE_LIMIT_CLEANUP_INTERVAL_MS: positiveInt(env, "RATE_LIMIT_CLEANUP_INTERVAL_MS", 30 * 60 * 1000),
    RATE_LIMIT_IDLE_TTL_MS: positiveInt(env, "RATE_LIMIT_IDLE_TTL_MS", 60 * 60 * 1000),

    BODY_LIMIT: env.BODY_LIMIT || "1mb",
  };
}

export const config = loadConfig(process.env);

// Validation
if (!process.env.SMTP_HOST) {
  console.warn(`⚠️  WARNING: SMTP_HOST is not set. Relaying through ${config.SMTP_HOST}:${config.SMTP_PORT}.`);
}
