import { describe, it, expect, beforeEach, vi } from 'vitest';
import { HeadObjectCommand, NotFound, PutObjectCommand, S3Client } from '@aws-sdk/client-s3';
import { S3ObjectStorageAdapter } from '../../../src/infrastructure/adapters/storage/s3-object-storage.adapter';
import { S3Service } from '../../../src/shared/aws/s3/s3.service';
import { TEST_BUCKET, createTestLogger } from '../helpers/test-factories';

describe('S3ObjectStorageAdapter', () => {
  let client: S3Client;
  let adapter: S3ObjectStorageAdapter;

  beforeEach(() => {
    client = new S3Client({
      region: 'us-east-1',
      credentials: { accessKeyId: 'test', secretAccessKey: 'test-secret' },
    });
    adapter = new S3ObjectStorageAdapter(new S3Service(client, createTestLogger()));
  });

  it('should return the location of a written object', async () => {
    const send = vi.spyOn(client, 'send').mockImplementation(async (command: unknown) => {
      if (command instanceof PutObjectCommand) {
        return { ETag: '"etag-7"' };
      }
      throw new Error('unexpected command');
    });

    const result = await adapter.putObject(TEST_BUCKET, 'text/report.txt', 'hello', {
      contentType: 'text/plain; charset=utf-8',
    });

    expect(result).toEqual({
      bucket: TEST_BUCKET,
      key: 'text/report.txt',
      etag: '"etag-7"',
      location: 's3://test-bucket/text/report.txt',
    });
    expect(send.mock.calls[0][0].input).toEqual({
      Bucket: TEST_BUCKET,
      Key: 'text/report.txt',
      Body: 'hello',
      ContentType: 'text/plain; charset=utf-8',
      Metadata: undefined,
    });
  });

  it('should report an existing object', async () => {
    vi.spyOn(client, 'send').mockImplementation(async (command: unknown) => {
      if (command instanceof HeadObjectCommand) {
        return { ContentLength: 12 };
      }
      throw new Error('unexpected command');
    });

    await expect(adapter.objectExists(TEST_BUCKET, 'input/a.pdf')).resolves.toBe(true);
  });

  it('should report a missing object', async () => {
    vi.spyOn(client, 'send').mockImplementation(async () => {
      throw new NotFound({ message: 'Not Found', $metadata: { httpStatusCode: 404 } });
    });

    await expect(adapter.objectExists(TEST_BUCKET, 'input/missing.pdf')).resolves.toBe(false);
    await expect(adapter.headObject(TEST_BUCKET, 'input/missing.pdf')).resolves.toBeNull();
  });
});
