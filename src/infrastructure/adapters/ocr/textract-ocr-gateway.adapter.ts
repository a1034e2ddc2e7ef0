import { Injectable, Logger } from '@nestjs/common';
import { Block, TextractServiceException, Warning } from '@aws-sdk/client-textract';
import type {
  DocumentReference,
  OcrGatewayPort,
  TextDetectionJobPage,
  TextDetectionOutput,
} from '../../../application/ports/output/ocr-gateway.port';
import { TextractService } from '../../../shared/aws/textract/textract.service';
import {
  OcrBlock,
  OcrBlockType,
  parseOcrJobStatus,
} from '../../../domain/value-objects/ocr-block.vo';
import {
  DocumentValidationError,
  ExtractionError,
  OcrServiceError,
  UnsupportedDocumentError,
} from '../../../domain/errors/extraction.errors';

const VALIDATION_ERRORS = new Set(['InvalidS3ObjectException']);
const UNSUPPORTED_ERRORS = new Set([
  'UnsupportedDocumentException',
  'BadDocumentException',
  'DocumentTooLargeException',
]);

/**
 * Textract OCR Gateway Adapter
 * Implements OcrGatewayPort using Amazon Textract text detection
 */
@Injectable()
export class TextractOcrGatewayAdapter implements OcrGatewayPort {
  private readonly logger = new Logger(TextractOcrGatewayAdapter.name);

  constructor(private readonly textractService: TextractService) {}

  async detectText(document: Uint8Array): Promise<TextDetectionOutput> {
    this.logger.debug(`Detecting text synchronously (${document.length} bytes)`);

    try {
      const response = await this.textractService.detectDocumentText(document);
      return {
        blocks: (response.Blocks ?? []).map(toOcrBlock),
        pageCount: response.DocumentMetadata?.Pages,
      };
    } catch (error) {
      throw translateTextractError(error, 'DetectDocumentText');
    }
  }

  async startTextDetection(document: DocumentReference): Promise<string> {
    try {
      return await this.textractService.startDocumentTextDetection(document.bucket, document.key);
    } catch (error) {
      throw translateTextractError(error, 'StartDocumentTextDetection');
    }
  }

  async getTextDetection(jobId: string, nextToken?: string): Promise<TextDetectionJobPage> {
    try {
      const response = await this.textractService.getDocumentTextDetection(jobId, nextToken);
      return {
        jobId,
        status: parseOcrJobStatus(response.JobStatus),
        statusMessage: response.StatusMessage,
        warnings: (response.Warnings ?? []).map(describeWarning),
        pageCount: response.DocumentMetadata?.Pages,
        blocks: (response.Blocks ?? []).map(toOcrBlock),
        nextToken: response.NextToken,
      };
    } catch (error) {
      throw translateTextractError(error, 'GetDocumentTextDetection');
    }
  }
}

export function toOcrBlock(block: Block): OcrBlock {
  const box = block.Geometry?.BoundingBox;
  return {
    blockType: toBlockType(block.BlockType),
    text: block.Text,
    confidence: block.Confidence,
    page: block.Page ?? 1,
    top: box?.Top ?? 0,
    left: box?.Left ?? 0,
  };
}

function toBlockType(type: string | undefined): OcrBlockType {
  switch (type) {
    case 'PAGE':
      return OcrBlockType.PAGE;
    case 'LINE':
      return OcrBlockType.LINE;
    case 'WORD':
      return OcrBlockType.WORD;
    default:
      return OcrBlockType.OTHER;
  }
}

function describeWarning(warning: Warning): string {
  const pages = warning.Pages?.length ? ` on page(s) ${warning.Pages.join(', ')}` : '';
  return `${warning.ErrorCode ?? 'Warning'}${pages}`;
}

/**
 * Maps a Textract failure onto the extraction error hierarchy. Anything not
 * recognised as a document problem is a (retryable) service error.
 */
export function translateTextractError(error: unknown, operation: string): ExtractionError {
  if (error instanceof ExtractionError) {
    return error;
  }

  const name = error instanceof Error ? error.name : 'UnknownError';
  const message = error instanceof Error ? error.message : String(error);
  const details: Record<string, unknown> = { operation, sdkError: name };
  if (error instanceof TextractServiceException) {
    details.httpStatusCode = error.$metadata.httpStatusCode;
    details.requestId = error.$metadata.requestId;
  }

  if (VALIDATION_ERRORS.has(name)) {
    return new DocumentValidationError(`${operation} rejected the document: ${message}`, {
      cause: error,
      details,
    });
  }
  if (UNSUPPORTED_ERRORS.has(name)) {
    return new UnsupportedDocumentError(`${operation} cannot read the document: ${message}`, {
      cause: error,
      details,
    });
  }
  return new OcrServiceError(`${operation} failed: ${name}: ${message}`, { cause: error, details });
}
