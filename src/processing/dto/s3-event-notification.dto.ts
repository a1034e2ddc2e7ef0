import { z } from 'zod';
import type { DocumentEventRecord } from '../../application/ports/input/handle-document-events.port';

export const S3EventRecordSchema = z.object({
  eventSource: z.string().optional(),
  eventName: z.string().optional(),
  s3: z.object({
    bucket: z.object({ name: z.string().min(1) }),
    object: z.object({
      key: z.string().min(1),
      size: z.number().nonnegative().optional(),
    }),
  }),
});

export const S3EventNotificationSchema = z.object({
  Records: z.array(S3EventRecordSchema),
});

// Sent once by S3 when a notification configuration is saved
export const S3TestEventSchema = z.object({
  Service: z.literal('Amazon S3'),
  Event: z.literal('s3:TestEvent'),
});

export type S3EventRecordDto = z.infer<typeof S3EventRecordSchema>;
export type S3EventNotificationDto = z.infer<typeof S3EventNotificationSchema>;

export function validateS3EventNotification(data: unknown): S3EventNotificationDto {
  return S3EventNotificationSchema.parse(data);
}

export function isS3TestEvent(data: unknown): boolean {
  return S3TestEventSchema.safeParse(data).success;
}

/**
 * Object keys arrive URL-encoded with spaces as "+".
 */
export function decodeS3Key(key: string): string {
  const spaced = key.replace(/\+/g, ' ');
  try {
    return decodeURIComponent(spaced);
  } catch (error) {
    if (error instanceof URIError) {
      // Not valid percent-encoding: the key is used as delivered
      return spaced;
    }
    throw error;
  }
}

export function toDocumentEventRecords(notification: S3EventNotificationDto): DocumentEventRecord[] {
  return notification.Records.map((record) => ({
    bucket: record.s3.bucket.name,
    key: decodeS3Key(record.s3.object.key),
    eventName: record.eventName,
    size: record.s3.object.size,
  }));
}
