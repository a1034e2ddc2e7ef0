import { Global, Module } from '@nestjs/common';
import { ConfigModule as NestConfigModule } from '@nestjs/config';
import configuration from './configuration';

@Global()
@Module({
  imports: [
    NestConfigModule.forRoot({
      isGlobal: true,
      load: [configuration],
      cache: true,
      // Lambda has no .env file; the runtime environment is authoritative there
      ignoreEnvFile: !!process.env.AWS_LAMBDA_FUNCTION_NAME,
    }),
  ],
})
export class ConfigModule {}
