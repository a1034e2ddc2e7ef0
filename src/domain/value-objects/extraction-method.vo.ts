/**
 * Extraction Method Value Object
 * Which Textract API produced a result
 */
export enum ExtractionMethod {
  SYNC = 'sync',
  ASYNC = 'async',
}

/**
 * Documents at or above the threshold cannot be sent inline to
 * DetectDocumentText and go through an asynchronous job instead.
 */
export function selectExtractionMethod(fileSize: number, syncSizeLimitBytes: number): ExtractionMethod {
  return fileSize >= syncSizeLimitBytes ? ExtractionMethod.ASYNC : ExtractionMethod.SYNC;
}
