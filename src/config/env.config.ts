import 'dotenv/config';
import { z } from 'zod';

const LogLevel = z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']);

const toNumber = (fallback: number) =>
  z.preprocess((v) => (v === undefined || v === '' ? fallback : Number(v)), z.number());

const toOptionalNumber = () =>
  z.preprocess((v) => (v === undefined || v === '' ? undefined : Number(v)), z.number()).optional();

const toBool = (fallback: boolean) =>
  z.preprocess((v) => {
    if (v === undefined || v === '') return fallback;
    if (typeof v === 'boolean') return v;
    const s = String(v).toLowerCase().trim();
    return ['1', 'true', 'yes', 'y', 'on'].includes(s);
  }, z.boolean());

const toIdList = () =>
  z.preprocess(
    (v) =>
      v === undefined || v === ''
        ? []
        : String(v)
            .split(',')
            .map((s) => s.trim())
            .filter(Boolean)
            .map(Number),
    z.array(z.number().int()),
  );

const toList = (separator: string) =>
  z.preprocess(
    (v) =>
      v === undefined || v === ''
        ? []
        : String(v)
            .split(separator)
            .map((s) => s.trim())
            .filter(Boolean),
    z.array(z.string()),
  );

export const ApiClientKeySchema = z.object({
  key: z.string().min(1),
  extra: z.string().min(1),
  name: z.string().default(''),
  permissions: z.array(z.string()).default([]),
});

export type ApiClientKey = z.infer<typeof ApiClientKeySchema>;

const toApiKeys = () =>
  z.preprocess((v) => {
    if (v === undefined || v === '') return [];
    if (typeof v !== 'string') return v;
    try {
      return JSON.parse(v);
    } catch {
      return v;
    }
  }, z.array(ApiClientKeySchema));

export const ConfigSchema = z.object({
  NODE_ENV: z.string().default('development'),
  LOG_LEVEL: LogLevel.default('info'),
  TIMEZONE: z.string().default('Europe/Moscow'),

  DATABASE_PATH: z.string().min(1).default('./data/bookings.db'),
  REDIS_URL: z.string().optional(),
  STATE_TTL_SECONDS: toNumber(86400),

  TELEGRAM_BOT_TOKEN: z.string().optional(),

  MANAGERS: toIdList(),
  BLACKLIST: toIdList(),
  MANAGERS_CONTACTS: toList(';'),
  ITEMS_FILE: z.string().optional(),

  BOT_RATE_LIMIT_MESSAGES: toNumber(20),
  BOT_RATE_LIMIT_WINDOW: toNumber(60),
  BOT_MAX_BOOKING_DAYS: toNumber(365),
  BOT_MIN_BOOKING_ADVANCE_HOURS: toNumber(0),
  BOT_PAGINATION_SIZE: toOptionalNumber(),
  BOT_REMINDER_TIME: z
    .string()
    .regex(/^([01]\d|2[0-3]):[0-5]\d$/, 'expected HH:MM')
    .default('09:00'),

  EXPORTS_PATH: z.string().default('./exports'),

  MIRROR_URL: z.string().url().optional(),
  MIRROR_TOKEN: z.string().optional(),
  MIRROR_TIMEOUT_MS: toNumber(10000),

  SYNC_POLL_INTERVAL_MS: toNumber(2000),
  SYNC_BATCH_SIZE: toNumber(20),
  SYNC_MAX_RETRIES: toNumber(5),
  SYNC_BASE_DELAY_MS: toNumber(2000),
  SYNC_MAX_DELAY_MS: toNumber(60000),

  API_ENABLED: toBool(false),
  PORT: toNumber(8080),
  API_AUTH_ENABLED: toBool(true),
  API_HEADER_KEY: z.string().default('x-api-key'),
  API_HEADER_EXTRA: z.string().default('x-api-extra'),
  API_KEYS: toApiKeys(),
  API_RATE_LIMIT_RPS: toNumber(0),
  API_RATE_LIMIT_BURST: toNumber(5),
});

export type AppConfig = z.infer<typeof ConfigSchema>;

export function parseConfig(env: Record<string, string | undefined>): Readonly<AppConfig> {
  const parsed = ConfigSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `- ${i.path.join('.')}: ${i.message}`).join('\n');
    const message = [
      'Invalid environment configuration:',
      issues,
      'Update your .env or environment variables and try again.',
    ].join('\n');
    throw new Error(message);
  }
  return Object.freeze(parsed.data);
}

export const config: Readonly<AppConfig> = parseConfig(process.env);
