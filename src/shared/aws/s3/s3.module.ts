import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { S3Client } from '@aws-sdk/client-s3';
import { ConfigModule } from '../../../config/config.module';
import { AppConfig } from '../../../config/configuration';
import { awsClientConfig } from '../aws-client.config';
import { S3_CLIENT, S3Service } from './s3.service';

@Module({
  imports: [ConfigModule],
  providers: [
    {
      provide: S3_CLIENT,
      inject: [ConfigService],
      useFactory: (configService: ConfigService<AppConfig>) => {
        const aws = configService.getOrThrow('aws', { infer: true });
        // Path-style addressing for LocalStack endpoints
        return new S3Client({
          ...awsClientConfig(aws),
          ...(aws.endpoint && { forcePathStyle: true }),
        });
      },
    },
    S3Service,
  ],
  exports: [S3Service],
})
export class S3Module {}
