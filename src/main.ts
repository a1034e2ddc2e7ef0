import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { ConfigService } from '@nestjs/config';
import { AppModule } from './app.module';
import { AppConfig } from './config/configuration';
import { PinoLoggerService } from './shared/logging/pino-logger.service';

/**
 * Bootstrap the queue consumer
 * No HTTP server: the service only consumes S3 notifications from SQS
 */
async function bootstrap() {
  const app = await NestFactory.createApplicationContext(AppModule, {
    bufferLogs: true,
  });

  const configService = app.get(ConfigService<AppConfig>);
  const logger = app.get(PinoLoggerService).forContext('Bootstrap');

  app.useLogger(app.get(PinoLoggerService));

  const nodeEnv = configService.get('nodeEnv', { infer: true });
  const sqsConfig = configService.getOrThrow('sqs', { infer: true });
  const s3Config = configService.getOrThrow('s3', { infer: true });

  app.enableShutdownHooks();

  const shutdownHandler = async (signal: string) => {
    logger.info({ signal }, 'Received shutdown signal, stopping consumer...');
    await app.close();
    logger.info('Consumer stopped, application shut down gracefully');
    logger.flush();
    process.exit(0);
  };

  const onSignal = (signal: string) => {
    shutdownHandler(signal).catch((error: unknown) => {
      logger.error({ error: String(error) }, 'Graceful shutdown failed');
      process.exit(1);
    });
  };

  process.on('SIGTERM', () => onSignal('SIGTERM'));
  process.on('SIGINT', () => onSignal('SIGINT'));

  process.on('uncaughtException', (error) => {
    logger.error({ error: error.message, stack: error.stack }, 'Uncaught exception');
    process.exit(1);
  });

  process.on('unhandledRejection', (reason) => {
    logger.error({ reason: String(reason) }, 'Unhandled rejection');
    process.exit(1);
  });

  logger.info(
    {
      nodeEnv,
      pid: process.pid,
      queue: sqsConfig.documentEventsUrl,
      bucket: s3Config.bucketName ?? '(any)',
      inputPrefix: s3Config.inputPrefix,
    },
    'PDF text ingest consumer started - listening to SQS queue',
  );

  // The SQS consumer starts through its OnModuleInit lifecycle hook
}

bootstrap().catch((error) => {
  console.error('Failed to start consumer:', error);
  process.exit(1);
});
