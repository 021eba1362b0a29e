import { z } from 'zod';
import { LOG_LEVELS, LogLevel, defaultLogLevel } from '../utils/logger';

export const DEFAULT_DATABASE_URL = 'postgresql://app:pass@db:5432/appdb';

function parseIntegerInRange(
  raw: unknown,
  field: string,
  { min, max, defaultValue }: { min: number; max: number; defaultValue: number }
): number {
  if (raw === undefined || raw === null || raw === '') {
    return defaultValue;
  }
  const numeric = typeof raw === 'number' ? raw : Number(String(raw).trim());
  if (!Number.isFinite(numeric)) {
    throw new Error(`${field} must be a finite number`);
  }
  const integer = Math.floor(numeric);
  if (integer < min || integer > max) {
    throw new Error(`${field} must be between ${min} and ${max}`);
  }
  return integer;
}

const envSchema = z.object({
  NODE_ENV: z.string().optional(),
  PORT: z.union([z.string(), z.number()]).optional(),
  DATABASE_URL: z
    .preprocess((value) => {
      if (typeof value !== 'string') {
        return value;
      }
      const trimmed = value.trim();
      return trimmed.length ? trimmed : undefined;
    }, z.string().regex(/^postgres(ql)?:\/\//, 'DATABASE_URL must be a postgres:// or postgresql:// URL'))
    .optional(),
  DB_POOL_MAX: z.union([z.string(), z.number()]).optional(),
  CLIENT_ORIGIN: z.string().optional(),
  LOG_LEVEL: z
    .preprocess((value) => {
      if (typeof value !== 'string') {
        return value;
      }
      const normalised = value.trim().toLowerCase();
      return normalised.length ? normalised : undefined;
    }, z.enum(LOG_LEVELS, { errorMap: () => ({ message: `LOG_LEVEL must be one of ${LOG_LEVELS.join(', ')}` }) }))
    .optional(),
});

export interface AppConfig {
  environment: string;
  logLevel: LogLevel;
  server: {
    port: number;
  };
  database: {
    url: string;
    poolMax: number;
  };
  cors: {
    allowedOrigins: string[];
    allowAllOrigins: boolean;
  };
}

function parseOrigins(raw: string | undefined, environment: string): string[] {
  const source = raw ?? (environment === 'production' ? '' : 'http://localhost:3000');
  return source
    .split(',')
    .map((origin) => origin.trim())
    .filter(Boolean);
}

export function loadAppConfig(source: NodeJS.ProcessEnv): AppConfig {
  const parsed = envSchema.safeParse(source);

  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`).join('; ');
    throw new Error(`Invalid environment configuration: ${issues}`);
  }

  const env = parsed.data;
  const environment = env.NODE_ENV?.trim() || 'development';
  const allowedOrigins = parseOrigins(env.CLIENT_ORIGIN, environment);

  return {
    environment,
    logLevel: env.LOG_LEVEL ?? defaultLogLevel(environment),
    server: {
      port: parseIntegerInRange(env.PORT, 'PORT', { min: 1, max: 65535, defaultValue: 8000 }),
    },
    database: {
      url: env.DATABASE_URL ?? DEFAULT_DATABASE_URL,
      poolMax: parseIntegerInRange(env.DB_POOL_MAX, 'DB_POOL_MAX', { min: 1, max: 100, defaultValue: 10 }),
    },
    cors: {
      allowedOrigins,
      allowAllOrigins: allowedOrigins.includes('*'),
    },
  };
}
