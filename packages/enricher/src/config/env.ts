import { z } from 'zod';
import { ConfigurationError } from '../shared/errors';

const positiveIntFromString = (fallback: string) =>
  z
    .string()
    .default(fallback)
    .transform(Number)
    .pipe(z.number().int().positive());

const envSchema = z.object({
  APOLLO_API_KEY: z
    .string({ required_error: 'APOLLO_API_KEY is required' })
    .trim()
    .min(1, 'APOLLO_API_KEY must not be empty'),

  APOLLO_BASE_URL: z
    .string()
    .default('https://api.apollo.io/v1/')
    .pipe(z.string().url('APOLLO_BASE_URL must be a valid URL'))
    .transform((val) => (val.endsWith('/') ? val : `${val}/`)),

  APOLLO_TIMEOUT_MS: positiveIntFromString('10000'),

  // Simulated cost of one successful mobile unlock
  MOBILE_UNLOCK_CREDIT_COST: positiveIntFromString('1'),

  INPUT_FILE: z
    .string()
    .min(1, 'INPUT_FILE must not be empty')
    .default('input_linkedin.txt'),

  OUTPUT_FILE: z
    .string()
    .min(1, 'OUTPUT_FILE must not be empty')
    .default('apollo_contact_data.csv'),

  LOG_LEVEL: z
    .enum(['debug', 'info', 'warn', 'error'])
    .default('info'),

  NODE_ENV: z
    .enum(['development', 'production', 'test'])
    .default('development'),
});

export type Env = z.infer<typeof envSchema>;

/**
 * Validates the given environment (defaults to `process.env`).
 * Throws a ConfigurationError listing every failing variable.
 */
export function loadEnv(source: NodeJS.ProcessEnv = process.env): Env {
  const result = envSchema.safeParse(source);

  if (!result.success) {
    const formatted = result.error.issues
      .map((issue) => `  - ${issue.path.join('.')}: ${issue.message}`)
      .join('\n');

    throw new ConfigurationError('Environment validation failed:\n' + formatted);
  }

  return result.data;
}
