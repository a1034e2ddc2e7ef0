/**
 * Application Configuration Module
 *
 * Loads and validates environment variables, providing type-safe access
 * to all configuration values throughout the service.
 *
 * ## Configuration Sources:
 * 1. Environment variables (`.env` file, Lambda environment or container env)
 * 2. Validated by Zod schema in `validation.schema.ts`
 * 3. Transformed into typed AppConfig object
 *
 * ## Usage:
 * ```typescript
 * constructor(private configService: ConfigService<AppConfig>) {}
 *
 * const retry = this.configService.getOrThrow('retry', { infer: true });
 * ```
 *
 * @module Configuration
 */

import { validateEnv, EnvConfig } from './validation.schema';

const MEGABYTE = 1024 * 1024;

export interface AppConfig {
  nodeEnv: string;
  logLevel: string;
  aws: {
    region: string;
    endpoint?: string;
    credentials?: {
      accessKeyId: string;
      secretAccessKey: string;
    };
  };
  /**
   * Bucket layout. `bucketName` is optional: notifications always name their
   * bucket, and when set it restricts processing to that bucket.
   */
  s3: {
    bucketName?: string;
    inputPrefix: string;
    textPrefix: string;
    metadataPrefix: string;
    errorPrefix: string;
    inputExtension: string;
  };
  /**
   * Textract extraction settings.
   *
   * ### syncSizeLimitBytes (SYNC_SIZE_LIMIT_MB)
   * Documents at or above this size go through the asynchronous
   * StartDocumentTextDetection job; smaller ones are sent as bytes to
   * DetectDocumentText, which caps payloads at 5 MB.
   *
   * ### maxWaitTimeMs / pollIntervalMs
   * Wait budget and polling cadence for asynchronous jobs. A job still
   * running once the budget is spent fails with EXTRACTION_TIMEOUT, which
   * is never retried.
   *
   * ### failOnLowQuality (FAIL_ON_LOW_QUALITY)
   * When enabled, results below the quality thresholds fail the document
   * instead of being written with `isHighQuality: false`.
   */
  extraction: {
    syncSizeLimitBytes: number;
    maxDocumentSizeBytes: number;
    maxWaitTimeMs: number;
    pollIntervalMs: number;
    minConfidenceThreshold: number;
    minAverageConfidence: number;
    maxLowConfidenceRatio: number;
    failOnLowQuality: boolean;
  };
  retry: {
    attempts: number;
    delayMs: number;
  };
  sqs: {
    documentEventsUrl?: string;
    waitTimeSeconds: number;
    visibilityTimeout: number;
  };
}

export function buildAppConfig(env: EnvConfig): AppConfig {
  const config: AppConfig = {
    nodeEnv: env.NODE_ENV,
    logLevel: env.LOG_LEVEL,
    aws: {
      region: env.AWS_REGION,
      endpoint: env.AWS_ENDPOINT,
    },
    s3: {
      bucketName: env.S3_BUCKET_NAME,
      inputPrefix: env.INPUT_PREFIX,
      textPrefix: env.TEXT_PREFIX,
      metadataPrefix: env.METADATA_PREFIX,
      errorPrefix: env.ERROR_PREFIX,
      inputExtension: env.INPUT_EXTENSION.toLowerCase(),
    },
    extraction: {
      syncSizeLimitBytes: Math.round(env.SYNC_SIZE_LIMIT_MB * MEGABYTE),
      maxDocumentSizeBytes: Math.round(env.MAX_DOCUMENT_SIZE_MB * MEGABYTE),
      maxWaitTimeMs: env.TEXTRACT_MAX_WAIT_SECONDS * 1000,
      pollIntervalMs: env.TEXTRACT_POLL_INTERVAL_MS,
      minConfidenceThreshold: env.MIN_CONFIDENCE_THRESHOLD,
      minAverageConfidence: env.MIN_AVERAGE_CONFIDENCE,
      maxLowConfidenceRatio: env.MAX_LOW_CONFIDENCE_RATIO,
      failOnLowQuality: env.FAIL_ON_LOW_QUALITY,
    },
    retry: {
      attempts: env.RETRY_ATTEMPTS,
      delayMs: env.RETRY_DELAY_MS,
    },
    sqs: {
      documentEventsUrl: env.SQS_DOCUMENT_EVENTS_URL,
      waitTimeSeconds: env.SQS_WAIT_TIME_SECONDS,
      visibilityTimeout: env.SQS_VISIBILITY_TIMEOUT,
    },
  };

  // Add AWS credentials only if explicitly provided
  if (env.AWS_ACCESS_KEY_ID && env.AWS_SECRET_ACCESS_KEY) {
    config.aws.credentials = {
      accessKeyId: env.AWS_ACCESS_KEY_ID,
      secretAccessKey: env.AWS_SECRET_ACCESS_KEY,
    };
  }

  return config;
}

export default (): AppConfig => buildAppConfig(validateEnv(process.env));
