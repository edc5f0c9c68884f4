import { Controller, Param, Sse } from '@nestjs/common';
import { ApiOperation, ApiTags } from '@nestjs/swagger';
import { Observable } from 'rxjs';
import { map } from 'rxjs/operators';
import { LogStreamService, LogStreamEvent } from './log-stream.service';

@Controller('stream')
@ApiTags('stream')
export class SSEController {
  constructor(private readonly logStream: LogStreamService) {}

  /**
   * GET /stream/runs/:runId - stage output of one run as it is produced.
   */
  @Sse('runs/:runId')
  @ApiOperation({ summary: 'SSE: real-time stage output for a run' })
  streamRunLogs(@Param('runId') runId: string): Observable<{ data: LogStreamEvent }> {
    return this.logStream.getLogStreamForRun(runId).pipe(map((ev) => ({ data: ev })));
  }

  @Sse('logs')
  @ApiOperation({ summary: 'SSE: real-time stage output for all runs' })
  streamAllLogs(): Observable<{ data: LogStreamEvent }> {
    return this.logStream.getLogStream().pipe(map((ev) => ({ data: ev })));
  }
}
