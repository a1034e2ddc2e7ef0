// Export all in-memory adapters for easy import
export { InMemoryObjectStorageAdapter } from './in-memory-object-storage.adapter';
export { InMemoryOcrGatewayAdapter } from './in-memory-ocr-gateway.adapter';
export { InMemoryEventPublisherAdapter } from './in-memory-event-publisher.adapter';
