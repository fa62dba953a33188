import { z } from 'zod';
import fs from 'fs';
import path from 'path';
import dotenv from 'dotenv';
import { ConfigError, errorMessage } from '../core/errors.js';

dotenv.config();

export const logLevelSchema = z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace']);

const credentialSchema = z.object({
  username: z.string().min(1),
  password: z.string().min(1),
});

const ConfigSchema = z.object({
  api: z.object({
    baseUrl: z.string().url(),
  }),
  admin: credentialSchema,
  testUser: credentialSchema,
  readiness: z.object({
    timeoutMs: z.number().int().nonnegative().default(30000),
    intervalMs: z.number().int().positive().default(1000),
    probeTimeoutMs: z.number().int().positive().default(2000),
  }),
  http: z.object({
    requestTimeoutMs: z.number().int().positive().default(10000),
    transferTimeoutMs: z.number().int().positive().default(60000),
  }),
  fixtures: z.object({
    dir: z.string().min(1),
  }),
  logging: z.object({
    level: logLevelSchema.default('info'),
    json: z.boolean().default(true),
  }),
});

export type HarnessConfig = z.infer<typeof ConfigSchema>;
export type LoggingConfig = HarnessConfig['logging'];
export type ConfigOverrides = { [K in keyof HarnessConfig]?: Partial<HarnessConfig[K]> };

// Non-numeric values pass through as strings so validation rejects them
function numberFromEnv(name: string): number | string | undefined {
  const raw = process.env[name];
  if (raw === undefined || raw === '') return undefined;
  const n = Number(raw);
  return Number.isNaN(n) ? raw : n;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function section(raw: Record<string, unknown>, key: string): Record<string, unknown> {
  const value = raw[key];
  return isRecord(value) ? value : {};
}

// Drops undefined so env lookups that are unset don't mask schema defaults
function defined(obj: Record<string, unknown>): Record<string, unknown> {
  return Object.fromEntries(Object.entries(obj).filter(([, v]) => v !== undefined));
}

export function loadConfig(
  configPath = 'workflow.config.json',
  overrides: ConfigOverrides = {},
): HarnessConfig {
  const full = path.resolve(process.cwd(), configPath);
  let fileRaw: Record<string, unknown> = {};
  if (fs.existsSync(full)) {
    try {
      const parsed: unknown = JSON.parse(fs.readFileSync(full, 'utf8'));
      if (isRecord(parsed)) fileRaw = parsed;
    } catch (e) {
      throw new ConfigError(`Failed to parse config file ${full}: ${errorMessage(e)}`, e);
    }
  }
  const merged = {
    api: {
      baseUrl: process.env.API_BASE_URL || 'http://localhost:8080/api',
      ...section(fileRaw, 'api'),
      ...overrides.api,
    },
    admin: {
      username: process.env.ADMIN_USERNAME || 'admin',
      password: process.env.ADMIN_PASSWORD || 'verysecret',
      ...section(fileRaw, 'admin'),
      ...overrides.admin,
    },
    testUser: {
      username: process.env.TEST_USERNAME || 'testuser',
      password: process.env.TEST_PASSWORD || 'testpassword',
      ...section(fileRaw, 'testUser'),
      ...overrides.testUser,
    },
    readiness: {
      ...defined({
        timeoutMs: numberFromEnv('READINESS_TIMEOUT_MS'),
        intervalMs: numberFromEnv('READINESS_INTERVAL_MS'),
      }),
      ...section(fileRaw, 'readiness'),
      ...overrides.readiness,
    },
    http: {
      ...defined({ requestTimeoutMs: numberFromEnv('HTTP_TIMEOUT_MS') }),
      ...section(fileRaw, 'http'),
      ...overrides.http,
    },
    fixtures: {
      dir: process.env.FIXTURE_DIR || process.cwd(),
      ...section(fileRaw, 'fixtures'),
      ...overrides.fixtures,
    },
    logging: {
      level: process.env.LOG_LEVEL || 'info',
      json: process.env.LOG_PRETTY !== '1',
      ...section(fileRaw, 'logging'),
      ...overrides.logging,
    },
  };
  const parsed = ConfigSchema.safeParse(merged);
  if (!parsed.success) {
    throw new ConfigError(`Invalid harness configuration: ${parsed.error.message}`, parsed.error);
  }
  // Trailing slash would double up when joined with endpoint paths
  parsed.data.api.baseUrl = parsed.data.api.baseUrl.replace(/\/+$/, '');
  return parsed.data;
}
