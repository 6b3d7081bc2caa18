import { Module } from '@nestjs/common';
import { DatabaseModule } from '@folio/database';
import { IngestionService } from './ingestion/ingestion.service';

@Module({
  imports: [DatabaseModule],
  providers: [IngestionService],
})
export class AppModule {}
