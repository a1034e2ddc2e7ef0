import { Inject, Injectable, OnModuleDestroy } from '@nestjs/common';
import {
  S3Client,
  S3ServiceException,
  PutObjectCommand,
  GetObjectCommand,
  HeadObjectCommand,
  ListObjectsV2Command,
  DeleteObjectCommand,
  DeleteObjectsCommand,
} from '@aws-sdk/client-s3';
import { PinoLoggerService } from '../../logging/pino-logger.service';

export const S3_CLIENT = 'S3_CLIENT';

export interface PutOptions {
  contentType?: string;
  metadata?: Record<string, string>;
}

export interface S3ObjectSummary {
  key: string;
  size: number;
  contentType?: string;
  etag?: string;
  lastModified?: Date;
}

// DeleteObjects accepts at most 1000 keys per request
const DELETE_BATCH_SIZE = 1000;

@Injectable()
export class S3Service implements OnModuleDestroy {
  private readonly logger: PinoLoggerService;

  constructor(
    @Inject(S3_CLIENT) private readonly client: S3Client,
    logger: PinoLoggerService,
  ) {
    this.logger = logger.forContext(S3Service.name);
  }

  async putObject(
    bucket: string,
    key: string,
    body: string | Uint8Array,
    options?: PutOptions,
  ): Promise<{ key: string; etag: string }> {
    const response = await this.client.send(
      new PutObjectCommand({
        Bucket: bucket,
        Key: key,
        Body: body,
        ContentType: options?.contentType,
        Metadata: options?.metadata,
      }),
    );

    this.logger.info(
      { bucket, key, size: typeof body === 'string' ? Buffer.byteLength(body) : body.length },
      'Object written',
    );

    return { key, etag: response.ETag ?? '' };
  }

  async getObject(bucket: string, key: string): Promise<Uint8Array> {
    const response = await this.client.send(new GetObjectCommand({ Bucket: bucket, Key: key }));

    if (!response.Body) {
      throw new Error(`Object s3://${bucket}/${key} has no body`);
    }

    const bytes = await response.Body.transformToByteArray();
    this.logger.debug({ bucket, key, size: bytes.length }, 'Object read');
    return bytes;
  }

  async headObject(bucket: string, key: string): Promise<S3ObjectSummary | null> {
    try {
      const response = await this.client.send(
        new HeadObjectCommand({ Bucket: bucket, Key: key }),
      );

      return {
        key,
        size: response.ContentLength ?? 0,
        contentType: response.ContentType,
        etag: response.ETag,
        lastModified: response.LastModified,
      };
    } catch (error: unknown) {
      if (isNotFound(error)) {
        return null;
      }
      throw error;
    }
  }

  /**
   * Lists every object under the prefix, following continuation tokens.
   */
  async listObjects(bucket: string, prefix: string): Promise<S3ObjectSummary[]> {
    const objects: S3ObjectSummary[] = [];
    let continuationToken: string | undefined;

    do {
      const response = await this.client.send(
        new ListObjectsV2Command({
          Bucket: bucket,
          Prefix: prefix,
          ContinuationToken: continuationToken,
        }),
      );

      for (const object of response.Contents ?? []) {
        if (!object.Key) {
          continue;
        }
        objects.push({
          key: object.Key,
          size: object.Size ?? 0,
          etag: object.ETag,
          lastModified: object.LastModified,
        });
      }

      continuationToken = response.IsTruncated ? response.NextContinuationToken : undefined;
    } while (continuationToken);

    this.logger.debug({ bucket, prefix, count: objects.length }, 'Objects listed');
    return objects;
  }

  async deleteObject(bucket: string, key: string): Promise<void> {
    await this.client.send(new DeleteObjectCommand({ Bucket: bucket, Key: key }));

    this.logger.info({ bucket, key }, 'Object deleted');
  }

  async deleteObjects(bucket: string, keys: string[]): Promise<void> {
    if (keys.length === 0) {
      return;
    }

    for (let i = 0; i < keys.length; i += DELETE_BATCH_SIZE) {
      const batch = keys.slice(i, i + DELETE_BATCH_SIZE);

      await this.client.send(
        new DeleteObjectsCommand({
          Bucket: bucket,
          Delete: {
            Objects: batch.map((key) => ({ Key: key })),
            Quiet: true, // Only errors are returned
          },
        }),
      );

      this.logger.info({ bucket, count: batch.length, total: keys.length }, 'Batch delete completed');
    }
  }

  onModuleDestroy() {
    this.client.destroy();
  }
}

function isNotFound(error: unknown): boolean {
  if (error instanceof S3ServiceException) {
    return (
      error.name === 'NotFound' ||
      error.name === 'NoSuchKey' ||
      error.$metadata.httpStatusCode === 404
    );
  }
  return false;
}
