/**
 * Configuration module for the Search Keys SDK
 * Connection settings can be read from environment variables
 */
import { z } from 'zod';
import { ConfigurationError } from './exceptions';

const logLevels = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

const configSchema = z.object({
  // Server connection
  SEARCH_HOST: z.string().url('SEARCH_HOST must be a valid URL'),
  SEARCH_API_KEY: z.string().min(1).optional(),

  // Request defaults
  SEARCH_TIMEOUT_MS: z
    .string()
    .regex(/^\d+$/, 'SEARCH_TIMEOUT_MS must be a positive integer')
    .default('30000')
    .transform((value) => parseInt(value, 10))
    .refine((value) => value > 0, 'SEARCH_TIMEOUT_MS must be a positive integer'),

  // Logging
  LOG_LEVEL: z.enum(logLevels).default('info'),
});

export type LogLevel = (typeof logLevels)[number];

export type Config = z.infer<typeof configSchema>;

export function loadConfig(env: Record<string, string | undefined> = process.env): Config {
  const result = configSchema.safeParse(env);

  if (!result.success) {
    const fields = result.error.flatten().fieldErrors;
    const names = Object.keys(fields).join(', ');
    throw new ConfigurationError(`Configuration validation failed: ${names}`, { fields });
  }

  return result.data;
}
