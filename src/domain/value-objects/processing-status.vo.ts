/**
 * Processing Status Value Object
 * Terminal outcome of one document's processing
 */
export enum ProcessingStatus {
  COMPLETED = 'completed',
  FAILED = 'failed',
  TIMEOUT = 'timeout',
}

export type FailureStatus = ProcessingStatus.FAILED | ProcessingStatus.TIMEOUT;
