import { Injectable, Logger, OnModuleDestroy, OnModuleInit } from '@nestjs/common';
import { RunQueueService } from '../queue/run-queue.service';

const DEFAULT_TIMEOUT_SECONDS = 60;
const DEFAULT_REAP_INTERVAL_MS = 15_000;

/**
 * Heartbeat: the worker calls tick(runId) while a run executes; the reap loop fails
 * runs whose heartbeat went stale (their worker died mid-run).
 */
@Injectable()
export class HeartbeatService implements OnModuleInit, OnModuleDestroy {
  private readonly logger = new Logger(HeartbeatService.name);
  private reapTimer: ReturnType<typeof setInterval> | null = null;

  constructor(private readonly runQueue: RunQueueService) {}

  onModuleInit(): void {
    this.startReapLoop(DEFAULT_REAP_INTERVAL_MS, DEFAULT_TIMEOUT_SECONDS);
  }

  onModuleDestroy(): void {
    this.stopReapLoop();
  }

  async tick(runId: string): Promise<void> {
    await this.runQueue.updateHeartbeat(runId);
  }

  async reapOnce(timeoutSeconds = DEFAULT_TIMEOUT_SECONDS): Promise<number> {
    return this.runQueue.failStaleRuns(timeoutSeconds);
  }

  startReapLoop(
    intervalMs = DEFAULT_REAP_INTERVAL_MS,
    timeoutSeconds = DEFAULT_TIMEOUT_SECONDS,
  ): void {
    this.stopReapLoop();
    this.reapTimer = setInterval(() => {
      this.reapOnce(timeoutSeconds).catch((err: unknown) => {
        // next interval retries
        this.logger.warn(`Stale run reap failed: ${err instanceof Error ? err.message : String(err)}`);
      });
    }, intervalMs);
  }

  stopReapLoop(): void {
    if (this.reapTimer) {
      clearInterval(this.reapTimer);
      this.reapTimer = null;
    }
  }
}
