import { Module } from '@nestjs/common';
import { ConfigModule } from './config/config.module';
import { SharedModule } from './shared/shared.module';
import { ApplicationModule } from './application/application.module';
import { DocumentEventsLambdaHandler } from './processing/handlers/document-events.lambda-handler';

/**
 * Lambda Module
 * Same application core as AppModule, driven by S3 notifications delivered
 * directly to the function instead of through SQS
 */
@Module({
  imports: [ConfigModule, SharedModule, ApplicationModule],
  providers: [DocumentEventsLambdaHandler],
})
export class LambdaModule {}
