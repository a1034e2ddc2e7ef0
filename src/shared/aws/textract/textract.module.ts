import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { TextractClient } from '@aws-sdk/client-textract';
import { ConfigModule } from '../../../config/config.module';
import { AppConfig } from '../../../config/configuration';
import { awsClientConfig } from '../aws-client.config';
import { TEXTRACT_CLIENT, TextractService } from './textract.service';

@Module({
  imports: [ConfigModule],
  providers: [
    {
      provide: TEXTRACT_CLIENT,
      inject: [ConfigService],
      useFactory: (configService: ConfigService<AppConfig>) =>
        new TextractClient(awsClientConfig(configService.getOrThrow('aws', { infer: true }))),
    },
    TextractService,
  ],
  exports: [TextractService],
})
export class TextractModule {}
