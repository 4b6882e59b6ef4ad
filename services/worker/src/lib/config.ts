import { config as loadDotenv } from 'dotenv';
import { resolve, dirname } from 'path';
import { fileURLToPath } from 'url';
import { z } from 'zod';

// Load environment variables from .env file in the repo root
// config.ts is at: services/worker/src/lib/config.ts
const currentFile = fileURLToPath(import.meta.url);
const currentDir = dirname(currentFile);
const rootDir = resolve(currentDir, '..', '..', '..', '..');
loadDotenv({ path: resolve(rootDir, '.env') });

const ConfigSchema = z.object({
  nodeEnv: z.enum(['development', 'production', 'test']).default('development'),
  logLevel: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),

  // Set by the Lambda runtime; every AWS client is pinned to it
  awsRegion: z.string().min(1),
  functionName: z.string().min(1).optional(),

  // S3 / MinIO
  s3Endpoint: z.string().url().optional(),
  s3ForcePathStyle: z
    .enum(['true', 'false'])
    .default('false')
    .transform((value) => value === 'true'),

  // Cross-account role assumption
  roleSessionName: z.string().min(1).default('NewAccountRole'),
  assumeRoleRetryDelaySeconds: z.coerce.number().nonnegative().default(5),

  // Destination bucket reachability
  bucketAccessRetryDelaySeconds: z.coerce.number().nonnegative().default(5),
  bucketAccessMaxRetries: z.coerce.number().int().nonnegative().default(5),
});

export type Config = z.infer<typeof ConfigSchema>;

let config: Config | null = null;

export function loadConfig(): Config {
  if (config) {
    return config;
  }

  const raw = {
    nodeEnv: process.env.NODE_ENV,
    logLevel: process.env.LOG_LEVEL,
    awsRegion: process.env.AWS_REGION,
    functionName: process.env.AWS_LAMBDA_FUNCTION_NAME,
    s3Endpoint: process.env.S3_ENDPOINT,
    s3ForcePathStyle: process.env.S3_FORCE_PATH_STYLE,
    roleSessionName: process.env.ROLE_SESSION_NAME,
    assumeRoleRetryDelaySeconds: process.env.ASSUME_ROLE_RETRY_DELAY_SECONDS,
    bucketAccessRetryDelaySeconds: process.env.BUCKET_ACCESS_RETRY_DELAY_SECONDS,
    bucketAccessMaxRetries: process.env.BUCKET_ACCESS_MAX_RETRIES,
  };

  const result = ConfigSchema.safeParse(raw);

  if (!result.success) {
    throw new Error(`Invalid configuration: ${result.error.message}`);
  }

  config = result.data;
  return config;
}

/**
 * Drop the cached configuration so the next loadConfig() re-reads the environment
 */
export function resetConfig(): void {
  config = null;
}
