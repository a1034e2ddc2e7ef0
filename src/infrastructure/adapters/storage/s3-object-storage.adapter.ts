import { Injectable, Logger } from '@nestjs/common';
import type {
  ObjectInfo,
  ObjectStoragePort,
  PutObjectOptions,
  PutObjectResult,
} from '../../../application/ports/output/object-storage.port';
import { S3Service } from '../../../shared/aws/s3/s3.service';

/**
 * S3 Object Storage Adapter
 * Implements ObjectStoragePort using AWS S3
 */
@Injectable()
export class S3ObjectStorageAdapter implements ObjectStoragePort {
  private readonly logger = new Logger(S3ObjectStorageAdapter.name);

  constructor(private readonly s3Service: S3Service) {}

  async putObject(
    bucket: string,
    key: string,
    body: string | Uint8Array,
    options?: PutObjectOptions,
  ): Promise<PutObjectResult> {
    this.logger.debug(`Writing object to S3: ${bucket}/${key}`);

    const result = await this.s3Service.putObject(bucket, key, body, {
      contentType: options?.contentType,
      metadata: options?.metadata,
    });

    return {
      bucket,
      key,
      etag: result.etag,
      location: `s3://${bucket}/${key}`,
    };
  }

  async getObject(bucket: string, key: string): Promise<Uint8Array> {
    this.logger.debug(`Reading object from S3: ${bucket}/${key}`);
    return this.s3Service.getObject(bucket, key);
  }

  async headObject(bucket: string, key: string): Promise<ObjectInfo | null> {
    return this.s3Service.headObject(bucket, key);
  }

  async listObjects(bucket: string, prefix: string): Promise<ObjectInfo[]> {
    return this.s3Service.listObjects(bucket, prefix);
  }

  async objectExists(bucket: string, key: string): Promise<boolean> {
    const info = await this.s3Service.headObject(bucket, key);
    return info !== null;
  }

  async deleteObject(bucket: string, key: string): Promise<void> {
    this.logger.debug(`Deleting object from S3: ${bucket}/${key}`);
    await this.s3Service.deleteObject(bucket, key);
  }

  async deleteObjects(bucket: string, keys: string[]): Promise<void> {
    this.logger.debug(`Deleting ${keys.length} objects from S3 bucket ${bucket}`);
    await this.s3Service.deleteObjects(bucket, keys);
  }
}
