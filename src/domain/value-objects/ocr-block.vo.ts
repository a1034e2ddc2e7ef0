/**
 * OCR Block Value Objects
 * Provider-neutral view of the blocks and job states returned by the OCR service
 */
export enum OcrBlockType {
  PAGE = 'PAGE',
  LINE = 'LINE',
  WORD = 'WORD',
  OTHER = 'OTHER',
}

export interface OcrBlock {
  readonly blockType: OcrBlockType;
  readonly text?: string;
  readonly confidence?: number;
  /** 1-based page number; single-page synchronous results report page 1 */
  readonly page: number;
  /** Bounding box position as a ratio of the page height/width */
  readonly top: number;
  readonly left: number;
}

export enum OcrJobStatus {
  IN_PROGRESS = 'IN_PROGRESS',
  SUCCEEDED = 'SUCCEEDED',
  FAILED = 'FAILED',
  PARTIAL_SUCCESS = 'PARTIAL_SUCCESS',
}

/**
 * Parses a provider job status. Unknown values are treated as still running
 * so the caller's wait budget decides the outcome.
 */
export function parseOcrJobStatus(value: string | undefined): OcrJobStatus {
  switch (value) {
    case OcrJobStatus.SUCCEEDED:
      return OcrJobStatus.SUCCEEDED;
    case OcrJobStatus.FAILED:
      return OcrJobStatus.FAILED;
    case OcrJobStatus.PARTIAL_SUCCESS:
      return OcrJobStatus.PARTIAL_SUCCESS;
    default:
      return OcrJobStatus.IN_PROGRESS;
  }
}

/**
 * Reading order: page, then vertical, then horizontal position.
 */
export function compareReadingOrder(a: OcrBlock, b: OcrBlock): number {
  return a.page - b.page || a.top - b.top || a.left - b.left;
}
