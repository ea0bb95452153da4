import { z } from 'zod';
import { ValidationError } from './errors.js';

/**
 * Environment Variable Validation
 * Ensures Freshsales credentials are present before a client is built
 */

type EnvSource = Record<string, string | undefined>;

// Base runtime config
const RuntimeEnvSchema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'staging', 'production']).default('development'),
  LOG_LEVEL: z
    .enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'])
    .default('info'),
});

// Freshsales config
const FreshsalesEnvSchema = z.object({
  FRESHSALES_DOMAIN: z.string().min(1, 'Freshsales domain is required'),
  FRESHSALES_API_KEY: z.string().min(1, 'Freshsales API key is required'),
  /** Page size for view listings (1-100) */
  FRESHSALES_PER_PAGE: z
    .string()
    .regex(/^\d+$/, 'Must be an integer')
    .optional()
    .transform((v) => (v ? parseInt(v, 10) : undefined))
    .pipe(z.number().int().min(1).max(100).optional()),
  /** Per-request timeout in milliseconds */
  FRESHSALES_TIMEOUT_MS: z
    .string()
    .regex(/^\d+$/, 'Must be an integer')
    .optional()
    .transform((v) => (v ? parseInt(v, 10) : 30000)),
});

export const ClientEnvSchema = RuntimeEnvSchema.merge(FreshsalesEnvSchema);

export type ClientEnv = z.infer<typeof ClientEnvSchema>;

/**
 * Validate environment variables
 * @throws ValidationError listing every failing variable
 */
export function validateEnv(env: EnvSource = process.env): ClientEnv {
  const result = ClientEnvSchema.safeParse(env);

  if (!result.success) {
    const errors = result.error.flatten().fieldErrors;
    const errorMessages = Object.entries(errors)
      .map(([field, messages]) => `  ${field}: ${(messages ?? []).join(', ')}`)
      .join('\n');

    throw new ValidationError(`Environment validation failed:\n${errorMessages}`, errors);
  }

  return result.data;
}
