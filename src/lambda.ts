import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { INestApplicationContext } from '@nestjs/common';
import type { Context, S3Event } from 'aws-lambda';
import { LambdaModule } from './lambda.module';
import { PinoLoggerService } from './shared/logging/pino-logger.service';
import { DocumentEventsLambdaHandler } from './processing/handlers/document-events.lambda-handler';
import { LambdaResponse, errorResponse } from './processing/handlers/lambda-response';

// Reused across warm invocations of the same container
let appContext: Promise<INestApplicationContext> | undefined;

async function createAppContext(): Promise<INestApplicationContext> {
  const app = await NestFactory.createApplicationContext(LambdaModule, { bufferLogs: true });
  app.useLogger(app.get(PinoLoggerService));
  return app;
}

function getAppContext(): Promise<INestApplicationContext> {
  if (!appContext) {
    appContext = createAppContext().catch((error: unknown) => {
      // Let the next invocation try again
      appContext = undefined;
      throw error;
    });
  }
  return appContext;
}

/**
 * Lambda entry point for S3 "object created" notifications
 */
export async function handler(event: S3Event, context: Context): Promise<LambdaResponse> {
  let app: INestApplicationContext;
  try {
    app = await getAppContext();
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    console.error(`[${context.awsRequestId}] Failed to initialise application: ${message}`);
    return errorResponse(500, 'Initialisation failed', message);
  }

  const logger = app.get(PinoLoggerService);
  try {
    return await app.get(DocumentEventsLambdaHandler).handle(event, context.awsRequestId);
  } finally {
    logger.flush();
  }
}
