import type { DatabaseConfig } from './database.js';
import { ValidationError } from './errors.js';

export interface PublisherConfig {
  /** Namespaces publish leases so several environments can share one store. */
  environment: string;
  draftTimeoutMs: number;
  leaseTtlMs: number;
}

export interface AppConfig {
  database: DatabaseConfig;
  port: number;
  logLevel: string;
  rulesDir: string | null;
  publisher: PublisherConfig;
}

type Env = Record<string, string | undefined>;

function readInt(env: Env, name: string, fallback: number): number {
  const raw = env[name];
  if (raw === undefined || raw === '') return fallback;
  const value = Number(raw);
  if (!Number.isInteger(value) || value < 0) {
    throw new ValidationError(`${name} must be a non-negative integer, got "${raw}"`, name);
  }
  return value;
}

export function loadConfig(env: Env = process.env): AppConfig {
  return {
    database: {
      host: env.DB_HOST ?? 'localhost',
      port: readInt(env, 'DB_PORT', 5432),
      database: env.DB_NAME ?? 'eligibility',
      user: env.DB_USER ?? 'eligibility',
      password: env.DB_PASSWORD ?? 'eligibility',
      max: readInt(env, 'DB_POOL_MAX', 10),
    },
    port: readInt(env, 'PORT', 3000),
    logLevel: env.LOG_LEVEL ?? 'info',
    rulesDir: env.RULES_DIR && env.RULES_DIR !== '' ? env.RULES_DIR : null,
    publisher: {
      environment: env.PUBLISH_ENVIRONMENT ?? 'default',
      draftTimeoutMs: readInt(env, 'PUBLISH_DRAFT_TIMEOUT_MS', 120_000),
      leaseTtlMs: readInt(env, 'PUBLISH_LEASE_TTL_MS', 15 * 60_000),
    },
  };
}
