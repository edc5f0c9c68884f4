import { Injectable, Logger, OnModuleDestroy, OnModuleInit } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { DataSource } from 'typeorm';
import { Pool, PoolClient } from 'pg';
import { Observable, Subject } from 'rxjs';
import { filter } from 'rxjs/operators';
import { z } from 'zod';
import { StageLog } from '../database/entities/stage-log.entity';

const LOG_CHANNEL = 'stage_logs';
// NOTIFY payloads must be shorter than 8000 bytes in the server encoding (UTF-8).
export const MAX_NOTIFY_BYTES = 7999;
const ELLIPSIS = '…';

export type LogLevel = 'info' | 'error';

const logStreamEventSchema = z.object({
  id: z.string(),
  run_id: z.string(),
  stage_run_id: z.string(),
  stage: z.string(),
  log_line: z.string(),
  log_level: z.enum(['info', 'error']),
  timestamp: z.string(),
});

export type LogStreamEvent = z.infer<typeof logStreamEventSchema>;

/** Parses a NOTIFY payload; null for anything that is not a log event. */
export function parseLogStreamEvent(payload: string): LogStreamEvent | null {
  let json: unknown;
  try {
    json = JSON.parse(payload);
  } catch {
    return null;
  }
  const parsed = logStreamEventSchema.safeParse(json);
  return parsed.success ? parsed.data : null;
}

/** Bytes a string adds to a JSON document once escaped. */
function jsonByteLength(text: string): number {
  return Buffer.byteLength(JSON.stringify(text)) - 2;
}

/** Serializes the event, cutting `log_line` on a code point so the payload fits NOTIFY. */
export function notifyPayload(event: LogStreamEvent): string {
  const full = JSON.stringify(event);
  if (Buffer.byteLength(full) <= MAX_NOTIFY_BYTES) return full;

  const overhead = Buffer.byteLength(JSON.stringify({ ...event, log_line: '' }));
  let budget = MAX_NOTIFY_BYTES - overhead - jsonByteLength(ELLIPSIS);
  let line = '';
  for (const codePoint of event.log_line) {
    const size = jsonByteLength(codePoint);
    if (size > budget) break;
    budget -= size;
    line += codePoint;
  }
  return JSON.stringify({ ...event, log_line: `${line}${ELLIPSIS}` });
}

/**
 * Real-time stage output: the stage_logs table is the source of truth.
 * - appendLog() INSERTs the (already redacted) line, then NOTIFYs stage_logs.
 * - every process LISTENs on a dedicated connection and forwards to SSE subscribers,
 *   so the API streams lines produced by a worker in another process.
 */
@Injectable()
export class LogStreamService implements OnModuleInit, OnModuleDestroy {
  private readonly logger = new Logger(LogStreamService.name);
  private pool: Pool | null = null;
  private listenClient: PoolClient | null = null;
  private stopped = false;
  private readonly logSubject = new Subject<LogStreamEvent>();

  constructor(
    private readonly configService: ConfigService,
    private readonly dataSource: DataSource,
  ) {}

  private getPool(): Pool {
    if (!this.pool) {
      this.pool = new Pool({
        connectionString: this.configService.getOrThrow<string>('DATABASE_URL'),
      });
    }
    return this.pool;
  }

  async onModuleInit(): Promise<void> {
    await this.startListening();
  }

  async onModuleDestroy(): Promise<void> {
    this.stopped = true;
    if (this.listenClient) {
      this.listenClient.release();
      this.listenClient = null;
    }
    if (this.pool) {
      await this.pool.end();
      this.pool = null;
    }
    this.logSubject.complete();
  }

  /** Dedicated connection that LISTENs to stage_logs. Reconnects after a second on error. */
  private async startListening(): Promise<void> {
    if (this.stopped) return;
    const client = await this.getPool().connect();
    this.listenClient = client;

    client.on('notification', (msg) => {
      if (msg.channel !== LOG_CHANNEL || !msg.payload) return;
      const event = parseLogStreamEvent(msg.payload);
      if (event) this.logSubject.next(event);
      else this.logger.warn(`Dropped malformed ${LOG_CHANNEL} notification`);
    });

    const restart = (err?: Error) => {
      if (this.listenClient !== client) return;
      this.listenClient = null;
      client.release(err);
      if (this.stopped) return;
      this.logger.warn(`LISTEN connection lost${err ? `: ${err.message}` : ''}; reconnecting`);
      setTimeout(() => {
        this.startListening().catch((e: unknown) => {
          this.logger.error(`LISTEN reconnect failed: ${e instanceof Error ? e.message : String(e)}`);
        });
      }, 1000);
    };

    client.on('error', restart);
    client.on('end', () => restart());

    await client.query(`LISTEN "${LOG_CHANNEL}"`);
  }

  getLogStream(): Observable<LogStreamEvent> {
    return this.logSubject.asObservable();
  }

  getLogStreamForRun(runId: string): Observable<LogStreamEvent> {
    return this.logSubject.pipe(filter((ev) => ev.run_id === runId));
  }

  async appendLog(
    runId: string,
    stageRunId: string,
    stage: string,
    logLine: string,
    logLevel: LogLevel = 'info',
  ): Promise<LogStreamEvent> {
    const repo = this.dataSource.getRepository(StageLog);
    const saved = await repo.save(
      repo.create({ stage_run_id: stageRunId, log_line: logLine, log_level: logLevel }),
    );
    const event: LogStreamEvent = {
      id: String(saved.id),
      run_id: runId,
      stage_run_id: stageRunId,
      stage,
      log_line: logLine,
      log_level: logLevel,
      timestamp: (saved.timestamp ?? new Date()).toISOString(),
    };
    await this.dataSource.query(`SELECT pg_notify($1, $2)`, [LOG_CHANNEL, notifyPayload(event)]);
    return event;
  }
}
