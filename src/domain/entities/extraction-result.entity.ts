import { freeze } from 'immer';
import { ConfidenceStatsVO } from '../value-objects/confidence-stats.vo';
import { ExtractionMethod } from '../value-objects/extraction-method.vo';

/**
 * Extraction Result Entity
 * Text and quality figures produced by one successful extraction.
 *
 * Character and word counts are always derived from the text, and the
 * returned object is deep-frozen: a result never changes once produced.
 */
export interface ExtractionResult {
  readonly text: string;
  readonly confidence: ConfidenceStatsVO;
  readonly method: ExtractionMethod;
  readonly pageCount: number;
  readonly characterCount: number;
  readonly wordCount: number;
  readonly processingTimeMs: number;
  readonly extractedAt: Date;
  readonly isHighQuality: boolean;
  readonly jobId?: string;
  readonly warnings: ReadonlyArray<string>;
}

/**
 * Factory and helpers for ExtractionResult
 *
 * ESLint disable: Namespaces are acceptable for this functional pattern
 */
// eslint-disable-next-line @typescript-eslint/no-namespace
export namespace ExtractionResult {
  export interface QualityThresholds {
    minAverageConfidence: number;
    maxLowConfidenceRatio: number;
  }

  export const DEFAULT_QUALITY_THRESHOLDS: QualityThresholds = {
    minAverageConfidence: 85,
    maxLowConfidenceRatio: 0.1,
  };

  export interface CreateProps {
    text: string;
    confidence: ConfidenceStatsVO;
    method: ExtractionMethod;
    pageCount: number;
    processingTimeMs: number;
    extractedAt?: Date;
    jobId?: string;
    warnings?: string[];
    qualityThresholds?: QualityThresholds;
  }

  export function create(props: CreateProps): ExtractionResult {
    validate(props);

    const thresholds = props.qualityThresholds ?? DEFAULT_QUALITY_THRESHOLDS;
    const result: ExtractionResult = {
      text: props.text,
      confidence: props.confidence,
      method: props.method,
      pageCount: props.pageCount,
      characterCount: props.text.length,
      wordCount: countWords(props.text),
      processingTimeMs: props.processingTimeMs,
      extractedAt: props.extractedAt ?? new Date(),
      isHighQuality: props.confidence.isHighQuality(
        thresholds.minAverageConfidence,
        thresholds.maxLowConfidenceRatio,
      ),
      ...(props.jobId !== undefined && { jobId: props.jobId }),
      warnings: [...(props.warnings ?? [])],
    };

    return freeze(result, true);
  }

  function validate(props: CreateProps): void {
    if (!Number.isInteger(props.pageCount) || props.pageCount < 0) {
      throw new Error(`Page count must be a non-negative integer, got ${props.pageCount}`);
    }
    if (props.processingTimeMs < 0) {
      throw new Error('Processing time cannot be negative');
    }
  }

  export function countWords(text: string): number {
    const trimmed = text.trim();
    return trimmed.length === 0 ? 0 : trimmed.split(/\s+/).length;
  }

  export function toJSON(result: ExtractionResult) {
    return {
      method: result.method,
      pageCount: result.pageCount,
      characterCount: result.characterCount,
      wordCount: result.wordCount,
      processingTimeMs: result.processingTimeMs,
      extractedAt: result.extractedAt.toISOString(),
      isHighQuality: result.isHighQuality,
      confidence: result.confidence.toJSON(),
      ...(result.jobId !== undefined && { jobId: result.jobId }),
      warnings: [...result.warnings],
    };
  }
}
