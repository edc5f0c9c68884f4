import { BadRequestException, Injectable, NotFoundException } from '@nestjs/common';
import { DataSource } from 'typeorm';
import { PipelineRun } from '../../database/entities/pipeline-run.entity';
import { StageRun } from '../../database/entities/stage-run.entity';
import { StageLog } from '../../database/entities/stage-log.entity';
import { PipelinesService } from '../pipelines/pipelines.service';
import { RunQueueService } from '../../queue/run-queue.service';
import { isContentAddressedTag } from '../../engine/image-reference';

/**
 * Trigger pipeline runs, read run and stage status, read stage logs, cancel runs.
 */
@Injectable()
export class RunsService {
  constructor(
    private readonly dataSource: DataSource,
    private readonly pipelinesService: PipelinesService,
    private readonly runQueue: RunQueueService,
  ) {}

  async findAll(pipelineId?: string): Promise<PipelineRun[]> {
    return this.dataSource.getRepository(PipelineRun).find({
      where: pipelineId ? { pipeline_id: pipelineId } : undefined,
      order: { created_at: 'DESC' },
      take: 100,
    });
  }

  async findOne(runId: string): Promise<PipelineRun | null> {
    return this.dataSource.getRepository(PipelineRun).findOne({ where: { id: runId } });
  }

  // Run with its stage rows, in execution order (status view)
  async findOneWithStages(runId: string): Promise<{ run: PipelineRun; stages: StageRun[] } | null> {
    const run = await this.findOne(runId);
    if (!run) return null;
    const stages = await this.dataSource.getRepository(StageRun).find({
      where: { pipeline_run_id: runId },
      order: { stage_order: 'ASC' },
    });
    return { run, stages };
  }

  async getStageLogs(runId: string, stageRunId: string): Promise<StageLog[]> {
    const stage = await this.dataSource
      .getRepository(StageRun)
      .findOne({ where: { id: stageRunId, pipeline_run_id: runId } });
    if (!stage) throw new NotFoundException('Stage not found');
    return this.dataSource.getRepository(StageLog).find({
      where: { stage_run_id: stageRunId },
      order: { timestamp: 'ASC', id: 'ASC' },
    });
  }

  /**
   * Queue a run of a stored pipeline for a commit. The tag is checked here so a typo
   * is a 400 instead of a failed run; the floating tag is accepted too.
   */
  async triggerRun(
    pipelineId: string,
    commit: string,
    triggerType = 'manual',
    triggerMetadata: Record<string, unknown> | null = null,
  ): Promise<PipelineRun> {
    const pipeline = await this.pipelinesService.findOne(pipelineId);
    if (!pipeline) throw new NotFoundException('Pipeline not found');

    const tag = typeof commit === 'string' ? commit.trim().toLowerCase() : '';
    if (!isContentAddressedTag(tag) && !isFloatingTag(pipeline.definition, tag)) {
      throw new BadRequestException(
        'commit must be a 7-40 character hex commit hash or the floating tag',
      );
    }

    return this.runQueue.enqueueRun(pipelineId, tag, triggerType, triggerMetadata);
  }

  async cancelRun(runId: string): Promise<PipelineRun> {
    const run = await this.findOne(runId);
    if (!run) throw new NotFoundException('Run not found');
    const accepted = await this.runQueue.requestCancel(runId);
    if (!accepted) throw new BadRequestException(`Run already ${run.status}`);
    const updated = await this.findOne(runId);
    return updated ?? run;
  }
}

function isFloatingTag(definition: Record<string, unknown>, tag: string): boolean {
  const image = definition.image;
  const floating =
    image && typeof image === 'object' && 'floatingTag' in image ? image.floatingTag : undefined;
  return tag === (typeof floating === 'string' ? floating : 'latest');
}
