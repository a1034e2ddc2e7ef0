import { Module } from '@nestjs/common';
import { ApplicationModule } from '../application/application.module';
import { DocumentEventsConsumer } from './consumers/document-events.consumer';

@Module({
  imports: [ApplicationModule],
  providers: [DocumentEventsConsumer],
})
export class ProcessingModule {}
