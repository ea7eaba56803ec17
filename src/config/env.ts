import { z } from 'zod';
import { ConfigError } from '../errors';

// Empty strings count as unset so a blank line in .env disables the service.
const optionalSecret = z
  .string()
  .optional()
  .transform((value) => (value && value.trim().length > 0 ? value : undefined));

export const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
  LOG_LEVEL: z.enum(LOG_LEVELS).optional(),
  PORT: z.coerce.number().int().positive().default(8000),
  ALLOWED_ORIGINS: z
    .string()
    .default('*')
    .transform((value) =>
      value
        .split(',')
        .map((origin) => origin.trim())
        .filter((origin) => origin.length > 0)
    ),
  REQUEST_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
  AZURE_OPENAI_ENDPOINT: z.string().url('AZURE_OPENAI_ENDPOINT must be a valid URL'),
  AZURE_OPENAI_API_KEY: z.string().min(1, 'AZURE_OPENAI_API_KEY is required'),
  AZURE_OPENAI_DEPLOYMENT: z.string().min(1, 'AZURE_OPENAI_DEPLOYMENT is required'),
  AZURE_OPENAI_API_VERSION: z.string().min(1).default('2024-02-15-preview'),
  AZURE_STORAGE_CONNECTION_STRING: optionalSecret,
  AZURE_STORAGE_CONTAINER_NAME: z.string().min(3).max(63).default('ai-api-logs'),
  APPLICATIONINSIGHTS_CONNECTION_STRING: optionalSecret
});

type ParsedEnv = z.infer<typeof envSchema>;

export type AppConfig = Readonly<
  Omit<ParsedEnv, 'ALLOWED_ORIGINS'> & { ALLOWED_ORIGINS: readonly string[] }
>;

/**
 * Parses the process environment once at startup.
 * Throws a ConfigError naming every missing or invalid variable.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsedEnv = envSchema.safeParse(env);

  if (!parsedEnv.success) {
    throw new ConfigError(parsedEnv.error.flatten().fieldErrors);
  }

  return Object.freeze({
    ...parsedEnv.data,
    ALLOWED_ORIGINS: Object.freeze([...parsedEnv.data.ALLOWED_ORIGINS])
  });
}
