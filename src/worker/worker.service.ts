import { Injectable, Logger, OnModuleDestroy, OnModuleInit } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { randomUUID } from 'node:crypto';
import { RunQueueService } from '../queue/run-queue.service';
import { RunExecutorService } from './run-executor.service';

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Worker main loop (RUN_WORKER_LOOP=true only):
 * - claim the oldest pending run
 * - execute it (deploy lock, heartbeats, cancel polling, persisted stage results)
 * - sleep when the queue is empty or the deploy target was busy
 */
@Injectable()
export class WorkerService implements OnModuleInit, OnModuleDestroy {
  private readonly logger = new Logger(WorkerService.name);
  private abort = new AbortController();
  private loopPromise: Promise<void> | null = null;
  private readonly workerId: string;
  private readonly pollMs = 1000;

  constructor(
    private readonly runQueue: RunQueueService,
    private readonly executor: RunExecutorService,
    private readonly config: ConfigService,
  ) {
    this.workerId =
      this.config.get<string>('WORKER_ID') ||
      this.config.get<string>('HOSTNAME') ||
      `worker-${randomUUID().slice(0, 8)}`;
  }

  onModuleInit(): void {
    if (this.config.get<string>('RUN_WORKER_LOOP') !== 'true') return;
    this.logger.log(`Worker ${this.workerId} polling for runs`);
    this.loopPromise = this.runLoop();
  }

  async onModuleDestroy(): Promise<void> {
    this.abort.abort();
    if (this.loopPromise) {
      await Promise.race([this.loopPromise, sleep(2000)]);
    }
  }

  /** Claims and executes at most one run. Returns true when a run was claimed. */
  async processNext(): Promise<boolean> {
    const run = await this.runQueue.claimNextRun(this.workerId);
    if (!run) return false;

    try {
      const execution = await this.executor.execute(run);
      // Give other runs (and other workers) a turn before retrying a busy target.
      if (execution.outcome === 'requeued') await sleep(this.pollMs);
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      this.logger.error(`Run ${run.id} crashed: ${message}`);
      await this.runQueue.failRun(run.id, 'execution', message);
    }
    return true;
  }

  private async runLoop(): Promise<void> {
    while (!this.abort.signal.aborted) {
      try {
        const claimed = await this.processNext();
        if (!claimed) await sleep(this.pollMs);
      } catch (err) {
        if (this.abort.signal.aborted) return;
        this.logger.error(`Worker loop error: ${err instanceof Error ? err.message : String(err)}`);
        await sleep(this.pollMs);
      }
    }
  }
}
