import dotenv from 'dotenv';
import { z } from 'zod';

dotenv.config();

const EnvSchema = z.object({
  NODE_ENV: z
    .enum(['development', 'test', 'production'])
    .default('development'),
  PORT: z.coerce.number().int().positive().default(3000),
  HOST: z.string().default('0.0.0.0'),
  LOG_LEVEL: z
    .enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'])
    .default('info'),
  CORS_ORIGINS: z.string().optional(),
  DATABASE_URL: z.string().optional(),
  DB_HOST: z.string().optional(),
  DB_PORT: z.coerce.number().int().positive().optional(),
  DB_NAME: z.string().optional(),
  DB_USER: z.string().optional(),
  DB_PASSWORD: z.string().optional(),
  DB_SSL: z
    .union([z.literal('true'), z.literal('false')])
    .optional(),
  LEDGER_ADMINISTRATOR: z.string().optional(),
  ADMIN_API_KEY: z.string().optional(),
  HEIGHT_CLOCK: z.enum(['manual', 'block-time']).default('manual'),
  BLOCK_INTERVAL_SECONDS: z.coerce.number().int().positive().default(600),
  GENESIS_UNIX_TIME: z.coerce.number().int().nonnegative().optional(),
  INITIAL_HEIGHT: z.coerce.number().int().nonnegative().default(0)
});

const env = EnvSchema.parse(process.env);

function parseCorsOrigins(value: string | undefined): string[] | true {
  if (!value) {
    return true;
  }

  const origins = value
    .split(',')
    .map((entry) => entry.trim())
    .filter((entry) => entry.length > 0);

  return origins.length > 0 ? origins : true;
}

export const appConfig = {
  ...env,
  corsOrigins: parseCorsOrigins(env.CORS_ORIGINS),
  dbSsl: env.DB_SSL ? env.DB_SSL === 'true' : undefined,
  hasDatabaseConfig:
    Boolean(env.DATABASE_URL) ||
    Boolean(env.DB_HOST && env.DB_NAME && env.DB_USER)
};

export type AppConfig = typeof appConfig;
