import { Module } from '@nestjs/common';
import { EngineModule } from '../engine/engine.module';
import { LocksModule } from '../locks/locks.module';
import { QueueModule } from '../queue/queue.module';
import { StreamingModule } from '../streaming/streaming.module';
import { HeartbeatService } from './heartbeat.service';
import { RunExecutorService } from './run-executor.service';
import { WorkerService } from './worker.service';

@Module({
  imports: [EngineModule, LocksModule, QueueModule, StreamingModule],
  providers: [HeartbeatService, RunExecutorService, WorkerService],
  exports: [HeartbeatService, RunExecutorService],
})
export class WorkerModule {}
