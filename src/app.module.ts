import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { SqsModule } from '@ssut/nestjs-sqs';
import { SQSClient } from '@aws-sdk/client-sqs';
import { ConfigModule } from './config/config.module';
import { AppConfig } from './config/configuration';
import { SharedModule } from './shared/shared.module';
import { awsClientConfig } from './shared/aws/aws-client.config';
import { ProcessingModule } from './processing/processing.module';
import { DOCUMENT_EVENTS_QUEUE } from './processing/consumers/document-events.consumer';

/**
 * Application Module
 * Long-running SQS consumer of the bucket's S3 notifications
 * Uses @ssut/nestjs-sqs for consuming messages
 */
@Module({
  imports: [
    ConfigModule,
    SharedModule,

    SqsModule.registerAsync({
      imports: [ConfigModule],
      inject: [ConfigService],
      useFactory: (configService: ConfigService<AppConfig>) => {
        const awsConfig = configService.getOrThrow('aws', { infer: true });
        const sqsConfig = configService.getOrThrow('sqs', { infer: true });

        if (!sqsConfig.documentEventsUrl) {
          throw new Error('SQS_DOCUMENT_EVENTS_URL is required to run the queue consumer');
        }

        return {
          consumers: [
            {
              name: DOCUMENT_EVENTS_QUEUE,
              queueUrl: sqsConfig.documentEventsUrl,
              region: awsConfig.region,
              sqs: new SQSClient(awsClientConfig(awsConfig)),
              waitTimeSeconds: sqsConfig.waitTimeSeconds,
              // Long enough to cover retries of a slow asynchronous extraction
              visibilityTimeout: sqsConfig.visibilityTimeout,
            },
          ],
          producers: [],
        };
      },
    }),

    ProcessingModule,
  ],
})
export class AppModule {}
