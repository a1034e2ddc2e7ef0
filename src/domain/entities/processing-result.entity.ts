import { ExtractionResult } from './extraction-result.entity';
import {
  FailureStatus,
  ProcessingStatus,
} from '../value-objects/processing-status.vo';

/**
 * Processing Result Entity
 * Terminal record of one document's processing: either both output keys of a
 * completed extraction or the error that stopped it, never both.
 */
interface ProcessingResultBase {
  readonly bucket: string;
  readonly originalKey: string;
  readonly attempts: number;
  readonly processedAt: Date;
}

export interface CompletedProcessingResult extends ProcessingResultBase {
  readonly status: ProcessingStatus.COMPLETED;
  readonly textKey: string;
  readonly metadataKey: string;
  readonly extraction: ExtractionResult;
}

export interface FailedProcessingResult extends ProcessingResultBase {
  readonly status: FailureStatus;
  readonly errorCode: string;
  readonly errorMessage: string;
  /** Set once the error document has been written */
  readonly errorKey?: string;
}

export type ProcessingResult = CompletedProcessingResult | FailedProcessingResult;

// eslint-disable-next-line @typescript-eslint/no-namespace
export namespace ProcessingResult {
  export interface CompletedProps {
    bucket: string;
    originalKey: string;
    textKey: string;
    metadataKey: string;
    extraction: ExtractionResult;
    attempts: number;
    processedAt?: Date;
  }

  export interface FailedProps {
    bucket: string;
    originalKey: string;
    status?: FailureStatus;
    errorCode: string;
    errorMessage: string;
    errorKey?: string;
    attempts: number;
    processedAt?: Date;
  }

  export function completed(props: CompletedProps): CompletedProcessingResult {
    if (!props.textKey || !props.metadataKey) {
      throw new Error('A completed result requires both the text and metadata keys');
    }
    const result: CompletedProcessingResult = {
      status: ProcessingStatus.COMPLETED,
      bucket: props.bucket,
      originalKey: props.originalKey,
      textKey: props.textKey,
      metadataKey: props.metadataKey,
      extraction: props.extraction,
      attempts: props.attempts,
      processedAt: props.processedAt ?? new Date(),
    };
    return Object.freeze(result);
  }

  export function failed(props: FailedProps): FailedProcessingResult {
    if (!props.errorMessage) {
      throw new Error('A failed result requires an error message');
    }
    const result: FailedProcessingResult = {
      status: props.status ?? ProcessingStatus.FAILED,
      bucket: props.bucket,
      originalKey: props.originalKey,
      errorCode: props.errorCode,
      errorMessage: props.errorMessage,
      ...(props.errorKey !== undefined && { errorKey: props.errorKey }),
      attempts: props.attempts,
      processedAt: props.processedAt ?? new Date(),
    };
    return Object.freeze(result);
  }

  export function isCompleted(result: ProcessingResult): result is CompletedProcessingResult {
    return result.status === ProcessingStatus.COMPLETED;
  }

  /**
   * Compact per-document view used in entry point responses.
   */
  export function toSummary(result: ProcessingResult) {
    const base = {
      status: result.status,
      bucket: result.bucket,
      originalFile: result.originalKey,
      attempts: result.attempts,
      processedAt: result.processedAt.toISOString(),
    };

    if (isCompleted(result)) {
      return {
        ...base,
        textFileKey: result.textKey,
        metadataFileKey: result.metadataKey,
        extractionSummary: {
          method: result.extraction.method,
          pageCount: result.extraction.pageCount,
          characterCount: result.extraction.characterCount,
          wordCount: result.extraction.wordCount,
          processingTimeMs: result.extraction.processingTimeMs,
          averageConfidence: result.extraction.confidence.toJSON().averageConfidence,
          isHighQuality: result.extraction.isHighQuality,
        },
      };
    }

    return {
      ...base,
      errorCode: result.errorCode,
      errorMessage: result.errorMessage,
      ...(result.errorKey !== undefined && { errorFileKey: result.errorKey }),
    };
  }
}
