import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { DatabaseModule } from './database/database.module';
import { EngineModule } from './engine/engine.module';
import { LocksModule } from './locks/locks.module';
import { PipelinesModule } from './api/pipelines/pipelines.module';
import { RunsModule } from './api/runs/runs.module';
import { WebhooksModule } from './api/webhooks/webhooks.module';
import { QueueModule } from './queue/queue.module';
import { StreamingModule } from './streaming/streaming.module';
import { WorkerModule } from './worker/worker.module';

@Module({
  imports: [
    ConfigModule.forRoot({ isGlobal: true }),
    DatabaseModule,
    EngineModule,
    LocksModule,
    QueueModule,
    PipelinesModule,
    RunsModule,
    WebhooksModule,
    StreamingModule,
    WorkerModule,
  ],
})
export class AppModule {}
