import { Injectable, Logger } from '@nestjs/common';
import { DataSource } from 'typeorm';
import { PipelineRun } from '../database/entities/pipeline-run.entity';
import { StageRun } from '../database/entities/stage-run.entity';
import type { RunResult, Stage, StageResult } from '../engine/types';

/** How long a requeued run waits before it can be claimed again. */
export const REQUEUE_DELAY_SECONDS = 5;

/**
 * Runs are queued as rows in pipeline_runs. A worker claims one pending run at a time
 * with FOR UPDATE SKIP LOCKED, so concurrent workers never pick the same row.
 */
@Injectable()
export class RunQueueService {
  private readonly logger = new Logger(RunQueueService.name);

  constructor(private readonly dataSource: DataSource) {}

  async enqueueRun(
    pipelineId: string,
    commit: string,
    triggerType: string,
    triggerMetadata: Record<string, unknown> | null = null,
  ): Promise<PipelineRun> {
    const repo = this.dataSource.getRepository(PipelineRun);
    const run = await repo.save(
      repo.create({
        pipeline_id: pipelineId,
        commit,
        trigger_type: triggerType,
        trigger_metadata: triggerMetadata,
        status: 'pending',
      }),
    );
    this.logger.log(`Queued run ${run.id} for pipeline ${pipelineId} at ${commit}`);
    return run;
  }

  /** Claims the oldest pending run that is due, or null when there is none. */
  async claimNextRun(workerId: string): Promise<PipelineRun | null> {
    const rows: Array<{ id: string }> = await this.dataSource.query(
      `
      WITH claimed AS (
        UPDATE pipeline_runs
        SET status = 'running',
            claimed_by = $1,
            heartbeat_at = NOW(),
            started_at = NOW()
        WHERE id = (
          SELECT r.id
          FROM pipeline_runs r
          WHERE r.status = 'pending'
            AND r.available_at <= NOW()
          ORDER BY r.available_at ASC, r.created_at ASC
          FOR UPDATE SKIP LOCKED
          LIMIT 1
        )
        RETURNING id
      )
      SELECT id FROM claimed
      `,
      [workerId],
    );

    const id = rows[0]?.id;
    if (!id) return null;
    return this.dataSource.getRepository(PipelineRun).findOne({
      where: { id },
      relations: ['pipeline'],
    });
  }

  /**
   * Hands a claimed run back to the queue (deploy target busy). It becomes due again
   * after the delay, behind runs that are already due.
   */
  async requeueRun(runId: string, delaySeconds = REQUEUE_DELAY_SECONDS): Promise<void> {
    await this.dataSource.query(
      `UPDATE pipeline_runs
       SET status = 'pending', claimed_by = NULL, heartbeat_at = NULL, started_at = NULL,
           available_at = NOW() + ($2::text || ' seconds')::interval
       WHERE id = $1 AND status = 'running'`,
      [runId, delaySeconds],
    );
  }

  async updateHeartbeat(runId: string): Promise<void> {
    await this.dataSource.query(`UPDATE pipeline_runs SET heartbeat_at = NOW() WHERE id = $1`, [
      runId,
    ]);
  }

  /** One pending stage row per stage, in execution order. */
  async createStageRuns(runId: string, order: readonly Stage[]): Promise<StageRun[]> {
    const repo = this.dataSource.getRepository(StageRun);
    const rows = order.map((stage, index) =>
      repo.create({
        pipeline_run_id: runId,
        stage_name: stage.name,
        kind: stage.kind,
        stage_order: index,
        status: 'pending',
      }),
    );
    return repo.save(rows);
  }

  async markStageStarted(stageRunId: string, startedAt: Date): Promise<void> {
    await this.dataSource
      .getRepository(StageRun)
      .update({ id: stageRunId }, { status: 'running', started_at: startedAt });
  }

  async recordStageResult(stageRunId: string, result: StageResult): Promise<void> {
    await this.dataSource.getRepository(StageRun).update(
      { id: stageRunId },
      {
        status: result.status,
        exit_code: result.exitCode,
        error_kind: result.error?.kind ?? null,
        error_message: result.error?.message ?? null,
        output: result.output,
        rollout: result.rollout ?? null,
        started_at: result.startedAt,
        completed_at: result.completedAt,
      },
    );
  }

  async completeRun(runId: string, result: RunResult): Promise<void> {
    await this.dataSource.getRepository(PipelineRun).update(
      { id: runId },
      {
        status: result.status,
        image_ref: result.image?.reference ?? null,
        failed_stage: result.failedStage ?? null,
        error_kind: result.error?.kind ?? null,
        error_message: result.error?.message ?? null,
        completed_at: result.completedAt,
        claimed_by: null,
      },
    );
  }

  /** Used when a run cannot even start (unparseable stored definition). */
  async failRun(runId: string, errorKind: string, message: string): Promise<void> {
    await this.dataSource.getRepository(PipelineRun).update(
      { id: runId },
      {
        status: 'failed',
        error_kind: errorKind,
        error_message: message,
        completed_at: new Date(),
        claimed_by: null,
      },
    );
  }

  /**
   * Runs whose worker stopped heartbeating are failed, never re-run: a half-finished
   * deploy is not safe to repeat blindly. Returns how many were failed.
   */
  async failStaleRuns(timeoutSeconds: number): Promise<number> {
    const rows: Array<{ id: string }> = await this.dataSource.query(
      `
      WITH stale AS (
        UPDATE pipeline_runs
        SET status = 'failed',
            error_kind = 'execution',
            error_message = 'Worker stopped responding',
            completed_at = NOW(),
            claimed_by = NULL
        WHERE status = 'running'
          AND heartbeat_at < NOW() - ($1::text || ' seconds')::interval
        RETURNING id
      )
      SELECT id FROM stale
      `,
      [timeoutSeconds],
    );
    if (rows.length > 0) {
      this.logger.warn(`Failed ${rows.length} stale run(s): ${rows.map((r) => r.id).join(', ')}`);
    }
    return rows.length;
  }

  /**
   * Pending runs are cancelled on the spot. Running runs get a flag the worker polls.
   * Returns false when the run has already finished.
   */
  async requestCancel(runId: string): Promise<boolean> {
    const pending = await this.dataSource.getRepository(PipelineRun).update(
      { id: runId, status: 'pending' },
      {
        status: 'failed',
        cancel_requested: true,
        error_kind: 'cancellation',
        error_message: 'Run cancelled before it started',
        completed_at: new Date(),
      },
    );
    if (pending.affected) return true;

    const running = await this.dataSource
      .getRepository(PipelineRun)
      .update({ id: runId, status: 'running' }, { cancel_requested: true });
    return Boolean(running.affected);
  }

  async isCancelRequested(runId: string): Promise<boolean> {
    const run = await this.dataSource.getRepository(PipelineRun).findOne({
      where: { id: runId },
      select: { id: true, cancel_requested: true },
    });
    return run?.cancel_requested ?? false;
  }
}
