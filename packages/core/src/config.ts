import { z } from 'zod';

export const DEFAULT_BASE_URL = 'http://localhost:5000';

/**
 * Configuration schema for the uploader
 */
export const UploaderConfigSchema = z.object({
  /** Backend base URL; resolved paths are appended to it */
  baseUrl: z.string().url().default(DEFAULT_BASE_URL),

  /** Number of same-type objects submitted together */
  chunkSize: z.number().int().positive().default(100),

  /** Ask the backend to bypass its validation */
  force: z.boolean().default(false),

  /** Connection pool cap for the shared session */
  maxConnections: z.number().int().positive().default(20),

  /** Number of chunks in flight at once, across all types */
  maxConcurrentChunks: z.number().int().positive().default(10),

  /** Health probe attempts per endpoint */
  healthcheckAttempts: z.number().int().positive().default(100),

  /** Delay between health probe attempts in milliseconds */
  healthcheckDelayMs: z.number().nonnegative().default(1000),

  /** Total attempts for a single object, including the first */
  maxSubmitAttempts: z.number().int().positive().default(7),

  /** Delay before the first retry in milliseconds */
  initialRetryDelay: z.number().nonnegative().default(1000),

  /** Lower bound for any retry delay in milliseconds */
  minRetryDelay: z.number().nonnegative().default(1000),

  /** Upper bound for any retry delay in milliseconds */
  maxRetryDelay: z.number().positive().default(60000),

  /** Multiplier for exponential backoff */
  retryMultiplier: z.number().positive().default(2),

  /** Request timeout in milliseconds */
  requestTimeout: z.number().positive().default(30000),

  /** Static headers sent with every request, e.g. credentials */
  headers: z.record(z.string()).default({}),
});

export type UploaderConfig = z.infer<typeof UploaderConfigSchema>;

export type UploaderConfigInput = z.input<typeof UploaderConfigSchema>;

/**
 * Creates a validated configuration object by merging provided options with
 * environment variables and defaults.
 *
 * @throws {z.ZodError} If configuration is invalid
 *
 * @example
 * ```typescript
 * const config = createConfig({
 *   baseUrl: 'http://registry.internal:5000',
 *   chunkSize: 50,
 *   headers: { Authorization: `Bearer ${token}` },
 * });
 * ```
 */
export function createConfig(options: UploaderConfigInput = {}): UploaderConfig {
  const env = process.env;
  const envHeaders: Record<string, string> = env.BATCH_UPLOADER_TOKEN
    ? { Authorization: `Bearer ${env.BATCH_UPLOADER_TOKEN}` }
    : {};

  const config = {
    ...options,
    baseUrl: options.baseUrl ?? env.BATCH_UPLOADER_BASE_URL,
    chunkSize: options.chunkSize ?? parseNumberEnv(env.BATCH_UPLOADER_CHUNK_SIZE),
    force: options.force ?? parseBooleanEnv(env.BATCH_UPLOADER_FORCE),
    maxConnections: options.maxConnections ?? parseNumberEnv(env.BATCH_UPLOADER_MAX_CONNECTIONS),
    headers: { ...envHeaders, ...options.headers },
  };

  return UploaderConfigSchema.parse(config);
}

function parseNumberEnv(value: string | undefined): number | undefined {
  if (!value) {
    return undefined;
  }

  const parsed = Number(value);
  return Number.isNaN(parsed) ? undefined : parsed;
}

function parseBooleanEnv(value: string | undefined): boolean | undefined {
  if (!value) {
    return undefined;
  }

  return value === '1' || value.toLowerCase() === 'true';
}
