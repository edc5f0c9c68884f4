import { Inject, Injectable, Logger } from '@nestjs/common';
import { SECRET_STORE } from '../config/engine.config';
import { PipelineRun } from '../database/entities/pipeline-run.entity';
import { deploymentTargetsOf, parsePipelineDefinition, resolveStageOrder } from '../engine/definition';
import { isPipelineError } from '../engine/errors';
import { PipelineController } from '../engine/pipeline-controller.service';
import { SecretStore } from '../engine/secret-store';
import type { PipelineDefinition, RunResult } from '../engine/types';
import { DeploymentLockService } from '../locks/deployment-lock.service';
import { RunQueueService } from '../queue/run-queue.service';
import { LogStreamService } from '../streaming/log-stream.service';
import { HeartbeatService } from './heartbeat.service';

const HEARTBEAT_INTERVAL_MS = 10_000;
const CANCEL_POLL_INTERVAL_MS = 2_000;

export type RunExecution =
  | { outcome: 'completed'; result: RunResult }
  | { outcome: 'requeued'; target: string }
  | { outcome: 'rejected'; message: string };

function messageOf(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Executes one claimed run through the PipelineController and persists what happens.
 * Runs that deploy the same workload are serialized with PostgreSQL advisory locks,
 * see @DeploymentLockService.
 */
@Injectable()
export class RunExecutorService {
  private readonly logger = new Logger(RunExecutorService.name);

  constructor(
    private readonly controller: PipelineController,
    private readonly runQueue: RunQueueService,
    private readonly heartbeat: HeartbeatService,
    private readonly locks: DeploymentLockService,
    private readonly logStream: LogStreamService,
    @Inject(SECRET_STORE) private readonly secrets: SecretStore,
  ) {}

  async execute(run: PipelineRun): Promise<RunExecution> {
    if (!run.pipeline) {
      const message = `Pipeline ${run.pipeline_id} no longer exists`;
      await this.runQueue.failRun(run.id, 'configuration', message);
      return { outcome: 'rejected', message };
    }

    let definition: PipelineDefinition;
    try {
      definition = parsePipelineDefinition(run.pipeline.definition);
    } catch (err) {
      if (!isPipelineError(err)) throw err;
      this.logger.error(`Run ${run.id} rejected: ${err.message}`);
      await this.runQueue.failRun(run.id, err.kind, err.message);
      return { outcome: 'rejected', message: err.message };
    }

    // Targets come sorted, so two runs sharing workloads always lock them in the same order.
    const releases: Array<() => Promise<void>> = [];
    for (const target of deploymentTargetsOf(definition)) {
      const lock = await this.locks.tryAcquire(target, run.id);
      if (!lock.acquired) {
        this.logger.log(`Deploy target ${target} busy; run ${run.id} goes back to the queue`);
        await this.releaseAll(releases);
        await this.runQueue.requeueRun(run.id);
        return { outcome: 'requeued', target };
      }
      releases.push(lock.release);
    }

    const abort = new AbortController();
    const timers: Array<ReturnType<typeof setInterval>> = [];
    // Log lines arrive synchronously; chaining the inserts keeps them in order.
    let logs: Promise<void> = Promise.resolve();

    try {
      const stageRuns = await this.runQueue.createStageRuns(run.id, resolveStageOrder(definition));
      const stageRunIds = new Map(stageRuns.map((row) => [row.stage_name, row.id]));

      timers.push(
        setInterval(() => {
          this.heartbeat.tick(run.id).catch((err: unknown) => {
            this.logger.warn(`Heartbeat for run ${run.id} failed: ${messageOf(err)}`);
          });
        }, HEARTBEAT_INTERVAL_MS),
        setInterval(() => {
          this.runQueue
            .isCancelRequested(run.id)
            .then((requested) => {
              if (requested && !abort.signal.aborted) {
                this.logger.log(`Cancelling run ${run.id}`);
                abort.abort();
              }
            })
            .catch((err: unknown) => {
              this.logger.warn(`Cancel check for run ${run.id} failed: ${messageOf(err)}`);
            });
        }, CANCEL_POLL_INTERVAL_MS),
      );

      const result = await this.controller.run(definition, {
        runId: run.id,
        tag: run.commit,
        secrets: this.secrets,
        signal: abort.signal,
        onOutput: (stage, line, stream) => {
          const stageRunId = stageRunIds.get(stage);
          if (!stageRunId) return;
          logs = logs
            .then(() =>
              this.logStream.appendLog(
                run.id,
                stageRunId,
                stage,
                line,
                stream === 'stderr' ? 'error' : 'info',
              ),
            )
            .then(
              () => undefined,
              (err: unknown) => {
                this.logger.warn(`Could not store log line for run ${run.id}: ${messageOf(err)}`);
              },
            );
        },
        onStageStart: async (stage, startedAt) => {
          const stageRunId = stageRunIds.get(stage.name);
          if (stageRunId) await this.runQueue.markStageStarted(stageRunId, startedAt);
        },
        onStageComplete: async (result) => {
          await logs;
          const stageRunId = stageRunIds.get(result.stage);
          if (stageRunId) await this.runQueue.recordStageResult(stageRunId, result);
        },
      });

      await logs;
      await this.runQueue.completeRun(run.id, result);
      return { outcome: 'completed', result };
    } finally {
      for (const timer of timers) clearInterval(timer);
      await this.releaseAll(releases);
    }
  }

  private async releaseAll(releases: Array<() => Promise<void>>): Promise<void> {
    for (const release of [...releases].reverse()) await release();
  }
}
