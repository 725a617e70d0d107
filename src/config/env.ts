import 'dotenv/config';
import ms from 'ms';
import { z } from 'zod';

const duration = z
  .string()
  .refine((v) => {
    const parsed = ms(v);
    // token lifetimes are whole seconds
    return Number.isFinite(parsed) && parsed >= 1000;
  }, { message: 'Expected a duration of at least one second, such as "15m" or "7d"' });

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
  PORT: z.coerce.number().int().min(0).default(4000),
  MONGO_URI: z.string().default('mongodb://127.0.0.1:27017/contacts_dev'),
  DB_NAME: z.string().default('contacts_dev'),
  REDIS_URL: z.string().default('redis://127.0.0.1:6379'),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),

  JWT_SECRET: z.string().min(8),
  JWT_ACCESS_EXPIRES: duration.default('15m'),
  JWT_REFRESH_EXPIRES: duration.default('7d'),
  JWT_EMAIL_EXPIRES: duration.default('24h'),
  BCRYPT_ROUNDS: z.coerce.number().int().min(4).max(15).default(10),

  RATE_LIMIT_WINDOW_SEC: z.coerce.number().int().positive().default(60),
  RATE_LIMIT_MAX: z.coerce.number().int().positive().default(100),
  AUTH_RATE_LIMIT_MAX: z.coerce.number().int().positive().default(10),
  IDENTITY_CACHE_TTL_SEC: z.coerce.number().int().positive().default(60),

  APP_URL: z.string().url().default('http://localhost:4000'),
  MAIL_FROM: z.string().default('Contacts <no-reply@example.com>'),
  RESEND_API_KEY: z.string().optional(),
  REFRESH_COOKIE_NAME: z.string().default('rt'),
});

export type Env = Readonly<z.infer<typeof envSchema>>;

/**
 * Validates raw environment values. Throws with every offending key listed.
 */
export function loadEnv(source: Record<string, string | undefined> = process.env): Env {
  const parsed = envSchema.safeParse(source);
  if (!parsed.success) {
    const problems = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new Error(`Invalid environment: ${problems}`);
  }
  return Object.freeze(parsed.data);
}

export function durationMs(value: string): number {
  const parsed = ms(value);
  if (!Number.isFinite(parsed) || parsed <= 0) {
    throw new Error(`Invalid duration "${value}"`);
  }
  return parsed;
}
