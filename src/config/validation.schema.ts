import { z } from 'zod';

const booleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .default('false')
  .transform((value) => value === 'true' || value === '1');

const prefix = z
  .string()
  .min(1)
  .refine((value) => value.endsWith('/'), { message: 'Prefix must end with "/"' });

export const envSchema = z.object({
  // Core
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error', 'silent']).default('info'),

  // AWS
  AWS_REGION: z.string().default('us-east-1'),
  AWS_ACCESS_KEY_ID: z.string().optional(),
  AWS_SECRET_ACCESS_KEY: z.string().optional(),
  AWS_ENDPOINT: z.string().url().optional(), // For LocalStack

  // S3 layout
  S3_BUCKET_NAME: z.string().optional(),
  INPUT_PREFIX: prefix.default('input/'),
  TEXT_PREFIX: prefix.default('text/'),
  METADATA_PREFIX: prefix.default('metadata/'),
  ERROR_PREFIX: prefix.default('errors/'),
  INPUT_EXTENSION: z
    .string()
    .regex(/^\.[A-Za-z0-9]+$/, 'Extension must look like ".pdf"')
    .default('.pdf'),

  // Extraction
  SYNC_SIZE_LIMIT_MB: z.coerce.number().positive().default(5),
  MAX_DOCUMENT_SIZE_MB: z.coerce.number().positive().default(500),
  TEXTRACT_MAX_WAIT_SECONDS: z.coerce.number().min(0).default(300),
  TEXTRACT_POLL_INTERVAL_MS: z.coerce.number().min(0).default(5000),
  MIN_CONFIDENCE_THRESHOLD: z.coerce.number().min(0).max(100).default(80),
  MIN_AVERAGE_CONFIDENCE: z.coerce.number().min(0).max(100).default(85),
  MAX_LOW_CONFIDENCE_RATIO: z.coerce.number().min(0).max(1).default(0.1),
  FAIL_ON_LOW_QUALITY: booleanFlag,

  // Retry
  RETRY_ATTEMPTS: z.coerce.number().int().min(1).max(10).default(3),
  RETRY_DELAY_MS: z.coerce.number().min(0).default(5000),

  // SQS (long-running consumer only)
  SQS_DOCUMENT_EVENTS_URL: z.string().url().optional(),
  SQS_WAIT_TIME_SECONDS: z.coerce.number().min(0).max(20).default(20),
  SQS_VISIBILITY_TIMEOUT: z.coerce.number().min(0).max(43200).default(900),
});

export type EnvConfig = z.infer<typeof envSchema>;

export function validateEnv(config: Record<string, unknown>): EnvConfig {
  const result = envSchema.safeParse(config);

  if (!result.success) {
    const errors = result.error.errors
      .map((e) => `  - ${e.path.join('.')}: ${e.message}`)
      .join('\n');
    throw new Error(`Environment validation failed:\n${errors}`);
  }

  return result.data;
}
