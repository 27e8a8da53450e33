import { z } from 'zod';
import fs from 'fs';
import path from 'path';
import dotenv from 'dotenv';

dotenv.config();

export const DEFAULT_CONFIG_FILE = 'build-siren.config.json';

const LogLevelSchema = z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']);

const LoggingSchema = z.object({
  level: LogLevelSchema.default('info'),
  json: z.boolean().default(true),
});

const SirenAddressSchema = z
  .string()
  .regex(/^[^\s:]+:\d{1,5}$/, 'sirenAddress must look like host:port')
  .transform((value) => {
    const idx = value.lastIndexOf(':');
    return { host: value.slice(0, idx), port: Number(value.slice(idx + 1)) };
  })
  .refine((addr) => addr.port > 0 && addr.port < 65536, 'sirenAddress port out of range');

const TimeZoneSchema = z.string().refine((tz) => {
  try {
    new Intl.DateTimeFormat('en-US', { timeZone: tz });
    return true;
  } catch {
    return false;
  }
}, 'timeZone must be a valid IANA time zone');

const ConfigSchema = z.object({
  monitor: z.object({
    serverBaseUrl: z
      .string()
      .url()
      .transform((u) => u.replace(/\/+$/, '')),
    contextRoot: z
      .string()
      .default('')
      .transform((c) => (c === '' || c.startsWith('/') ? c : `/${c}`).replace(/\/+$/, '')),
    credential: z.object({
      username: z.string().min(1),
      password: z.string(),
    }),
    sirenAddress: SirenAddressSchema,
    pollIntervalSeconds: z.number().positive().default(10),
    suppressAfterHours: z.boolean().default(true),
    timeZone: TimeZoneSchema.optional(),
    // 0 disables the bound and waits indefinitely
    requestTimeoutMs: z.number().int().nonnegative().default(15000),
    sirenTimeoutMs: z.number().int().nonnegative().default(5000),
  }),
  http: z.object({
    enabled: z.boolean().default(false),
    host: z.string().default('0.0.0.0'),
    port: z.number().int().min(0).max(65535).default(3000),
  }),
  logging: LoggingSchema,
});

export type AppConfig = z.infer<typeof ConfigSchema>;
export type LoggingConfig = z.infer<typeof LoggingSchema>;

type RawSection = Record<string, unknown>;

function isRecord(value: unknown): value is RawSection {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readConfigFile(configPath: string): Record<string, RawSection> {
  const full = path.resolve(process.cwd(), configPath);
  if (!fs.existsSync(full)) return {};
  let parsed: unknown;
  try {
    parsed = JSON.parse(fs.readFileSync(full, 'utf8'));
  } catch (e) {
    throw new Error(`Failed to parse config file ${full}: ${(e as Error).message}`);
  }
  if (!isRecord(parsed)) {
    throw new Error(`Config file ${full} must contain a JSON object`);
  }
  const sections: Record<string, RawSection> = {};
  for (const [key, value] of Object.entries(parsed)) {
    if (isRecord(value)) {
      sections[key] = value;
    }
  }
  return sections;
}

function envNumber(name: string): number | undefined {
  const raw = process.env[name];
  if (raw === undefined || raw.trim() === '') return undefined;
  return Number(raw);
}

const ENV_FLAGS = ['1', '0', 'true', 'false', 'yes', 'no', 'on', 'off'] as const;

const EnvFlagSchema = z
  .enum(ENV_FLAGS)
  .transform((flag) => flag === '1' || flag === 'true' || flag === 'yes' || flag === 'on');

function envBoolean(name: string): boolean | undefined {
  const raw = process.env[name]?.trim().toLowerCase();
  if (!raw) return undefined;
  const parsed = EnvFlagSchema.safeParse(raw);
  if (!parsed.success) {
    throw new Error(`${name} must be one of ${ENV_FLAGS.join(', ')}; got "${raw}"`);
  }
  return parsed.data;
}

/** Drops undefined entries so schema defaults apply. */
function defined(obj: Record<string, unknown>): Record<string, unknown> {
  return Object.fromEntries(Object.entries(obj).filter(([, v]) => v !== undefined));
}

export function loadConfig(configPath = DEFAULT_CONFIG_FILE): AppConfig {
  const fileRaw = readConfigFile(configPath);
  const env = process.env;
  const username = env.TEAMCITY_USERNAME;
  const merged = {
    monitor: {
      ...defined({
        serverBaseUrl: env.TEAMCITY_URL,
        contextRoot: env.TEAMCITY_CONTEXT_ROOT,
        credential:
          username !== undefined
            ? { username, password: env.TEAMCITY_PASSWORD ?? '' }
            : undefined,
        sirenAddress: env.SIREN_ADDRESS,
        pollIntervalSeconds: envNumber('POLL_INTERVAL_SECONDS'),
        suppressAfterHours: envBoolean('SUPPRESS_AFTER_HOURS'),
        timeZone: env.MONITOR_TIME_ZONE || undefined,
        requestTimeoutMs: envNumber('REQUEST_TIMEOUT_MS'),
        sirenTimeoutMs: envNumber('SIREN_TIMEOUT_MS'),
      }),
      ...(fileRaw.monitor || {}),
    },
    http: {
      ...defined({ enabled: envBoolean('HEALTH_SERVER'), port: envNumber('PORT') }),
      ...(fileRaw.http || {}),
    },
    logging: loggingSection(fileRaw),
  };
  return ConfigSchema.parse(merged);
}

function loggingSection(fileRaw: Record<string, RawSection>): RawSection {
  return { ...defined({ level: process.env.LOG_LEVEL }), ...(fileRaw.logging || {}) };
}

/**
 * Logging settings only. The logger must come up even when the monitor
 * section is incomplete, so it never validates the rest of the file.
 */
export function loadLoggingConfig(configPath = DEFAULT_CONFIG_FILE): LoggingConfig {
  return LoggingSchema.parse(loggingSection(readConfigFile(configPath)));
}
