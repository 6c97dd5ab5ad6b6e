/**
 * Configuration Module
 *
 * Loads and validates environment variables for placesweep.
 * Uses Zod for runtime validation with sensible defaults.
 *
 * PLACESWEEP_DATA_DIR is read by the storage layer (see storage/paths).
 *
 * @module config
 */

import 'dotenv/config';
import { z } from 'zod';
import { ConfigurationError } from '../search/errors.js';
import { MAX_SEARCH_RADIUS_KM } from '../schemas/search.js';

/**
 * Numeric variable; unset or blank falls back to the default.
 */
function numberVar<T extends z.ZodTypeAny>(schema: T) {
  return z.preprocess(
    (value) => (typeof value === 'string' && value.trim() === '' ? undefined : value),
    schema
  );
}

// Environment schema with optional values and defaults
const envSchema = z.object({
  // Pacing
  PLACESWEEP_MIN_DELAY: numberVar(z.coerce.number().nonnegative().default(1)),
  PLACESWEEP_MAX_DELAY: numberVar(z.coerce.number().nonnegative().default(3)),
  PLACESWEEP_MAX_RETRIES: numberVar(z.coerce.number().int().min(1).default(3)),
  PLACESWEEP_BACKOFF_BASE: numberVar(z.coerce.number().nonnegative().default(1)),
  PLACESWEEP_BACKOFF_MAX: numberVar(z.coerce.number().nonnegative().default(30)),
  PLACESWEEP_REQUEST_TIMEOUT_MS: numberVar(z.coerce.number().int().positive().default(30000)),

  // Search defaults
  PLACESWEEP_GL: z
    .string()
    .regex(/^[A-Za-z]{2}$/, 'Country code must be two letters')
    .transform((code) => code.toLowerCase())
    .default('eg'),
  PLACESWEEP_SEARCH_RADIUS_KM: numberVar(
    z.coerce.number().positive().max(MAX_SEARCH_RADIUS_KM).default(10)
  ),
  PLACESWEEP_LANGUAGE: z.string().min(1).default('en'),

  // Runtime options
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
});

type Env = z.infer<typeof envSchema>;

function buildConfig(env: Env) {
  return {
    // Environment
    nodeEnv: env.NODE_ENV,
    isProduction: env.NODE_ENV === 'production',
    isDevelopment: env.NODE_ENV === 'development',
    isTest: env.NODE_ENV === 'test',

    // Rate limiting and retries (seconds unless noted)
    rateLimit: {
      minDelay: env.PLACESWEEP_MIN_DELAY,
      maxDelay: env.PLACESWEEP_MAX_DELAY,
      maxRetries: env.PLACESWEEP_MAX_RETRIES,
      backoffBase: env.PLACESWEEP_BACKOFF_BASE,
      backoffMax: env.PLACESWEEP_BACKOFF_MAX,
    },

    // Provider client
    requestTimeoutMs: env.PLACESWEEP_REQUEST_TIMEOUT_MS,
    language: env.PLACESWEEP_LANGUAGE,

    // Search defaults
    search: {
      gl: env.PLACESWEEP_GL,
      radiusKm: env.PLACESWEEP_SEARCH_RADIUS_KM,
    },
  } as const;
}

export type Config = ReturnType<typeof buildConfig>;

/**
 * Validate an environment and build the configuration from it.
 *
 * @throws ConfigurationError listing every invalid variable
 */
export function loadConfig(source: NodeJS.ProcessEnv = process.env): Config {
  const parseResult = envSchema.safeParse(source);
  if (!parseResult.success) {
    const issues = parseResult.error.issues.map(
      (issue) => `${issue.path.join('.')}: ${issue.message}`
    );
    throw new ConfigurationError('Invalid environment variables', issues);
  }
  return buildConfig(parseResult.data);
}

function loadOrExit(): Config {
  try {
    return loadConfig();
  } catch (error) {
    console.error(error instanceof Error ? error.message : String(error));
    process.exit(1);
  }
}

/**
 * Application configuration singleton
 */
export const config: Config = loadOrExit();
