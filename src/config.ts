import dotenv from 'dotenv';
import path from 'path';
import { z } from 'zod';

dotenv.config({ path: path.resolve(process.cwd(), './.env') });

const booleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .default('false')
  .transform((v) => v === 'true' || v === '1');

// comma separated weekday numbers, 0 = Sunday ... 6 = Saturday
const weekdayList = z
  .string()
  .default('0')
  .transform((raw, ctx) => {
    const days = raw
      .split(',')
      .map((s) => s.trim())
      .filter((s) => s !== '')
      .map(Number);
    if (days.some((d) => !Number.isInteger(d) || d < 0 || d > 6)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'WEEKLY_OFF_DAYS must list weekdays 0-6' });
      return z.NEVER;
    }
    return [...new Set(days)];
  });

const SECONDS_PER_UNIT: Record<string, number> = { '': 1, s: 1, m: 60, h: 3600, d: 86400 };

// "3600", "45m", "8h" or "7d", as seconds
const durationSeconds = z
  .string()
  .default('8h')
  .transform((raw, ctx) => {
    const m = /^(\d+)\s*([smhd]?)$/.exec(raw.trim());
    if (!m) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'Expected a duration such as 3600, 45m, 8h or 7d' });
      return z.NEVER;
    }
    return Number(m[1]) * (SECONDS_PER_UNIT[m[2]] ?? 1);
  });

const envSchema = z.object({
  NODE_ENV: z.string().default('development'),
  PORT: z.coerce.number().int().positive().default(4000),
  FRONTEND_URL: z.string().default('http://localhost:3000'),

  DATABASE_URL: z.string().optional(),
  DB_HOST: z.string().default('localhost'),
  DB_PORT: z.coerce.number().int().positive().default(5432),
  DB_USER: z.string().default('postgres'),
  DB_PASSWORD: z.string().default('postgres'),
  DB_NAME: z.string().default('attendance'),
  DB_SSL: booleanFlag,
  RUN_MIGRATIONS_ON_START: booleanFlag,

  JWT_SECRET: z.string().min(1).default('replace-with-secure-secret'),
  JWT_EXPIRES_IN: durationSeconds,
  ADMIN_PASSWORD: z.string().optional(),

  WEEKLY_OFF_DAYS: weekdayList,
  AUDIT_RETENTION_DAYS: z.coerce.number().int().positive().default(90),
  DEFAULT_FULL_DAY_MINUTES: z.coerce.number().int().positive().default(171),
  DEFAULT_HALF_DAY_MINUTES: z.coerce.number().int().positive().default(121),
  // day-first (31/01/2026) or month-first (01/31/2026) slash dates in uploads
  CALL_LOG_DATE_ORDER: z.enum(['DMY', 'MDY']).default('DMY'),

  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error', 'none']).optional(),
});

export type Env = z.infer<typeof envSchema>;

function loadEnv(): Env {
  const parsed = envSchema.safeParse(process.env);
  if (!parsed.success) {
    const problems = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new Error(`Invalid environment: ${problems}`);
  }
  return parsed.data;
}

const env = loadEnv();

function defaultLogLevel(nodeEnv: string): NonNullable<Env['LOG_LEVEL']> {
  if (nodeEnv === 'test') return 'none';
  if (nodeEnv === 'production') return 'warn';
  return 'info';
}

export const config = {
  env: env.NODE_ENV,
  port: env.PORT,
  frontendUrl: env.FRONTEND_URL,
  database: {
    url: env.DATABASE_URL,
    host: env.DB_HOST,
    port: env.DB_PORT,
    username: env.DB_USER,
    password: env.DB_PASSWORD,
    name: env.DB_NAME,
    ssl: env.DB_SSL,
    runMigrationsOnStart: env.RUN_MIGRATIONS_ON_START,
  },
  auth: {
    jwtSecret: env.JWT_SECRET,
    jwtExpiresInSeconds: env.JWT_EXPIRES_IN,
    adminPassword: env.ADMIN_PASSWORD,
  },
  attendance: {
    weeklyOffDays: env.WEEKLY_OFF_DAYS,
    auditRetentionDays: env.AUDIT_RETENTION_DAYS,
    defaultThresholds: {
      fullDayMinutes: env.DEFAULT_FULL_DAY_MINUTES,
      halfDayMinutes: env.DEFAULT_HALF_DAY_MINUTES,
    },
  },
  callLogs: {
    sheetDateOrder: env.CALL_LOG_DATE_ORDER,
  },
  logLevel: env.LOG_LEVEL ?? defaultLogLevel(env.NODE_ENV),
} as const;

