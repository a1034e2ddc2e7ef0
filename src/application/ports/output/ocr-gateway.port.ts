import type { OcrBlock, OcrJobStatus } from '../../../domain/value-objects/ocr-block.vo';

export const OCR_GATEWAY_PORT = 'OcrGatewayPort';

export interface DocumentReference {
  bucket: string;
  key: string;
}

/**
 * Output of a synchronous detection call
 */
export interface TextDetectionOutput {
  blocks: OcrBlock[];
  pageCount?: number;
}

/**
 * One page of an asynchronous job's status and results
 */
export interface TextDetectionJobPage {
  jobId: string;
  status: OcrJobStatus;
  statusMessage?: string;
  warnings: string[];
  pageCount?: number;
  blocks: OcrBlock[];
  nextToken?: string;
}

/**
 * OCR Gateway Port (Driven Port)
 * Interface for the managed OCR service (Amazon Textract)
 */
export interface OcrGatewayPort {
  /**
   * Synchronous detection on inline document bytes (small documents only)
   */
  detectText(document: Uint8Array): Promise<TextDetectionOutput>;

  /**
   * Submit an asynchronous detection job for a stored document
   * @returns the job id
   */
  startTextDetection(document: DocumentReference): Promise<string>;

  /**
   * Fetch the job status and, once finished, one page of its blocks
   */
  getTextDetection(jobId: string, nextToken?: string): Promise<TextDetectionJobPage>;
}
