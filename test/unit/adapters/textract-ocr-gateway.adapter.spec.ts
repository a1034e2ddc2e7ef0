import { describe, it, expect, beforeEach, vi } from 'vitest';
import {
  TextractClient,
  DetectDocumentTextCommand,
  StartDocumentTextDetectionCommand,
  GetDocumentTextDetectionCommand,
  InvalidS3ObjectException,
  UnsupportedDocumentException,
  ProvisionedThroughputExceededException,
} from '@aws-sdk/client-textract';
import { TextractOcrGatewayAdapter } from '../../../src/infrastructure/adapters/ocr/textract-ocr-gateway.adapter';
import { TextractService } from '../../../src/shared/aws/textract/textract.service';
import { OcrBlockType, OcrJobStatus } from '../../../src/domain/value-objects/ocr-block.vo';
import {
  DocumentValidationError,
  OcrServiceError,
  UnsupportedDocumentError,
} from '../../../src/domain/errors/extraction.errors';
import { TEST_BUCKET, createTestLogger } from '../helpers/test-factories';

describe('TextractOcrGatewayAdapter', () => {
  let client: TextractClient;
  let adapter: TextractOcrGatewayAdapter;

  beforeEach(() => {
    client = new TextractClient({
      region: 'us-east-1',
      credentials: { accessKeyId: 'test', secretAccessKey: 'test-secret' },
    });
    adapter = new TextractOcrGatewayAdapter(new TextractService(client, createTestLogger()));
  });

  describe('detectText', () => {
    it('should send the bytes inline and map the blocks', async () => {
      const document = new Uint8Array([1, 2, 3]);
      const send = vi.spyOn(client, 'send').mockImplementation(async (command: unknown) => {
        if (!(command instanceof DetectDocumentTextCommand)) {
          throw new Error('unexpected command');
        }
        return {
          DocumentMetadata: { Pages: 1 },
          Blocks: [
            { BlockType: 'PAGE', Geometry: { BoundingBox: { Top: 0, Left: 0 } } },
            {
              BlockType: 'LINE',
              Text: 'Hello',
              Confidence: 99.1,
              Geometry: { BoundingBox: { Top: 0.2, Left: 0.1 } },
            },
            { BlockType: 'KEY_VALUE_SET' },
          ],
        };
      });

      const output = await adapter.detectText(document);

      expect(send.mock.calls[0][0].input).toEqual({ Document: { Bytes: document } });
      expect(output.pageCount).toBe(1);
      expect(output.blocks).toEqual([
        {
          blockType: OcrBlockType.PAGE,
          text: undefined,
          confidence: undefined,
          page: 1,
          top: 0,
          left: 0,
        },
        {
          blockType: OcrBlockType.LINE,
          text: 'Hello',
          confidence: 99.1,
          page: 1,
          top: 0.2,
          left: 0.1,
        },
        {
          blockType: OcrBlockType.OTHER,
          text: undefined,
          confidence: undefined,
          page: 1,
          top: 0,
          left: 0,
        },
      ]);
    });
  });

  describe('startTextDetection', () => {
    it('should start a job on the stored document', async () => {
      const send = vi.spyOn(client, 'send').mockImplementation(async (command: unknown) => {
        if (command instanceof StartDocumentTextDetectionCommand) {
          return { JobId: 'job-42' };
        }
        throw new Error('unexpected command');
      });

      const jobId = await adapter.startTextDetection({ bucket: TEST_BUCKET, key: 'input/a.pdf' });

      expect(jobId).toBe('job-42');
      expect(send.mock.calls[0][0].input).toEqual({
        DocumentLocation: { S3Object: { Bucket: TEST_BUCKET, Name: 'input/a.pdf' } },
      });
    });

    it('should treat a missing job id as a service error', async () => {
      vi.spyOn(client, 'send').mockImplementation(async () => ({}));

      const start = adapter.startTextDetection({ bucket: TEST_BUCKET, key: 'input/a.pdf' });

      await expect(start).rejects.toBeInstanceOf(OcrServiceError);
      await expect(start).rejects.toThrow(
        'StartDocumentTextDetection failed: Error: StartDocumentTextDetection returned no job id ' +
          'for s3://test-bucket/input/a.pdf',
      );
    });
  });

  describe('getTextDetection', () => {
    it('should map status, warnings and the next page token', async () => {
      const send = vi.spyOn(client, 'send').mockImplementation(async (command: unknown) => {
        if (!(command instanceof GetDocumentTextDetectionCommand)) {
          throw new Error('unexpected command');
        }
        return {
          JobStatus: 'PARTIAL_SUCCESS',
          StatusMessage: 'Some pages could not be read',
          DocumentMetadata: { Pages: 3 },
          Warnings: [{ ErrorCode: 'MALFORMED_PAGE', Pages: [2, 3] }],
          Blocks: [{ BlockType: 'WORD', Text: 'Hi', Confidence: 88, Page: 2 }],
          NextToken: 'next-1',
        };
      });

      const page = await adapter.getTextDetection('job-42', 'token-0');

      expect(send.mock.calls[0][0].input).toEqual({
        JobId: 'job-42',
        MaxResults: 1000,
        NextToken: 'token-0',
      });
      expect(page).toEqual({
        jobId: 'job-42',
        status: OcrJobStatus.PARTIAL_SUCCESS,
        statusMessage: 'Some pages could not be read',
        warnings: ['MALFORMED_PAGE on page(s) 2, 3'],
        pageCount: 3,
        blocks: [
          {
            blockType: OcrBlockType.WORD,
            text: 'Hi',
            confidence: 88,
            page: 2,
            top: 0,
            left: 0,
          },
        ],
        nextToken: 'next-1',
      });
    });

    it('should report an unknown status as still in progress', async () => {
      vi.spyOn(client, 'send').mockImplementation(async () => ({ JobStatus: undefined }));

      const page = await adapter.getTextDetection('job-42');

      expect(page.status).toBe(OcrJobStatus.IN_PROGRESS);
      expect(page.blocks).toEqual([]);
    });
  });

  describe('error translation', () => {
    it('should map an unreadable S3 object to a validation error', async () => {
      vi.spyOn(client, 'send').mockImplementation(async () => {
        throw new InvalidS3ObjectException({ message: 'Unable to get object', $metadata: {} });
      });

      await expect(
        adapter.startTextDetection({ bucket: TEST_BUCKET, key: 'input/a.pdf' }),
      ).rejects.toBeInstanceOf(DocumentValidationError);
    });

    it('should map an unsupported document to a non-retryable error', async () => {
      vi.spyOn(client, 'send').mockImplementation(async () => {
        throw new UnsupportedDocumentException({ message: 'Unsupported format', $metadata: {} });
      });

      const detect = adapter.detectText(new Uint8Array([1]));

      await expect(detect).rejects.toBeInstanceOf(UnsupportedDocumentError);
      await expect(detect).rejects.toMatchObject({ retryable: false });
    });

    it('should map throttling to a retryable service error', async () => {
      vi.spyOn(client, 'send').mockImplementation(async () => {
        throw new ProvisionedThroughputExceededException({
          message: 'Rate exceeded',
          $metadata: { httpStatusCode: 400, requestId: 'req-1' },
        });
      });

      const poll = adapter.getTextDetection('job-42');

      await expect(poll).rejects.toBeInstanceOf(OcrServiceError);
      await expect(poll).rejects.toMatchObject({
        retryable: true,
        message: 'GetDocumentTextDetection failed: ProvisionedThroughputExceededException: Rate exceeded',
        details: {
          operation: 'GetDocumentTextDetection',
          sdkError: 'ProvisionedThroughputExceededException',
          httpStatusCode: 400,
          requestId: 'req-1',
        },
      });
    });
  });
});
