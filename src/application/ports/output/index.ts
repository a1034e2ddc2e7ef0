/**
 * Output Ports (Driven Ports) Barrel Export
 * These are interfaces that the infrastructure layer must implement
 */
export {
  OBJECT_STORAGE_PORT,
  type ObjectStoragePort,
  type ObjectInfo,
  type PutObjectOptions,
  type PutObjectResult,
} from './object-storage.port';
export {
  OCR_GATEWAY_PORT,
  type OcrGatewayPort,
  type DocumentReference,
  type TextDetectionJobPage,
  type TextDetectionOutput,
} from './ocr-gateway.port';
export { EVENT_PUBLISHER_PORT, type EventPublisherPort } from './event-publisher.port';
