import dotenv from 'dotenv';
import { z } from 'zod';

dotenv.config();

export type Environment = 'PRODUCTION' | 'DEBUG';

const EnvSchema = z.object({
  ENVIRONMENT: z
    .string()
    .default('PRODUCTION')
    .transform(value => value.toUpperCase())
    .pipe(z.enum(['PRODUCTION', 'DEBUG'])),
  PORT: z.coerce.number().int().positive().default(3000),
  LOG_LEVEL: z.enum(['error', 'warn', 'info', 'debug', 'silent']).default('info'),
  APPOINTMENT_STORE: z.enum(['postgres', 'memory']).default('postgres'),
  DB_HOST: z.string().optional(),
  DB_PORT: z.coerce.number().int().positive().default(5432),
  DB_NAME: z.string().optional(),
  DB_USER: z.string().optional(),
  DB_PASSWORD: z.string().optional(),
  DB_SSL: z
    .enum(['true', 'false'])
    .default('false')
    .transform(value => value === 'true'),
  OPENAI_API_KEY: z.string().optional(),
  OPENAI_MODEL: z.string().default('gpt-4o-mini'),
  CONVERSATION_MAX_AGE_MS: z.coerce.number().int().positive().default(12 * 60 * 60 * 1000),
});

export type AppConfig = z.infer<typeof EnvSchema>;

/**
 * Parse an environment map into the application config.
 * Throws with every invalid variable listed.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const problems = parsed.error.issues
      .map(issue => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid environment configuration: ${problems}`);
  }
  return parsed.data;
}

export const config: AppConfig = loadConfig();
export const ENVIRONMENT: Environment = config.ENVIRONMENT;

if (ENVIRONMENT === 'PRODUCTION' && config.APPOINTMENT_STORE === 'postgres' && !config.DB_HOST) {
  console.warn('⚠️  WARNING: ENVIRONMENT is PRODUCTION but DB_HOST is not set');
}
