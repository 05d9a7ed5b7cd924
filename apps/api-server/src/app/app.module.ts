import { Module } from '@nestjs/common';
import { AppController } from './app.controller';
import { AppService } from './app.service';
import { ConfigModule } from './config';
import { EntitiesModule } from './entities';
import { HealthModule } from './health';
import { IngestionModule } from './ingestion';
import { JobsModule } from './jobs';
import { PersistenceModule } from './persistence';
import { PipelineModule } from './pipeline';
import { ScoringModule } from './scoring';

@Module({
  imports: [
    ConfigModule,
    PersistenceModule,
    ScoringModule,
    IngestionModule,
    PipelineModule,
    JobsModule,
    HealthModule,
    EntitiesModule,
  ],
  controllers: [AppController],
  providers: [AppService],
})
export class AppModule {}
