import dotenv from 'dotenv';
import { z } from 'zod';
import type { EnvConfig } from '../types';

dotenv.config();

const unitInterval = z.coerce.number().min(0).max(1);

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  LOG_LEVEL: z.enum(['error', 'warn', 'info', 'http', 'debug']).default('info'),
  MATCHING_CHUNK_SIZE: z.coerce.number().int().positive().default(1000),
  MATCHING_AUTO_APPROVE_THRESHOLD: unitInterval.default(0.85),
  MATCHING_MANUAL_REVIEW_THRESHOLD: unitInterval.default(0.5),
  MATCHING_INVOICE_STATUSES: z
    .string()
    .default('AUTHORISED')
    .transform((value) =>
      value
        .split(',')
        .map((status) => status.trim())
        .filter((status) => status.length > 0)
    )
    .pipe(z.array(z.string()).min(1, 'At least one invoice status is required')),
});

/**
 * Parses and validates environment variables.
 * Throws with every failing variable listed so misconfiguration is caught at startup.
 */
export const parseEnv = (source: NodeJS.ProcessEnv): EnvConfig => {
  const parsed = envSchema.safeParse(source);

  if (!parsed.success) {
    const issues = parsed.error.errors
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid environment configuration: ${issues}`);
  }

  return parsed.data;
};

export const env: EnvConfig = parseEnv(process.env);

export default env;
