import { Module } from '@nestjs/common';
import { LogStreamService } from './log-stream.service';
import { SSEController } from './sse.controller';

/** Stage output: stored in stage_logs, relayed over LISTEN/NOTIFY to SSE clients. */
@Module({
  controllers: [SSEController],
  providers: [LogStreamService],
  exports: [LogStreamService],
})
export class StreamingModule {}
