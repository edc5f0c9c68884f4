import { Controller, Get, Post, Body, Param, Query, NotFoundException } from '@nestjs/common';
import { ApiOperation, ApiTags } from '@nestjs/swagger';
import { RunsService } from './runs.service';
import { TriggerRunDto } from '../../dto/trigger-run.dto';

@ApiTags('runs')
@Controller('runs')
export class RunsController {
  constructor(private readonly runsService: RunsService) {}

  @Get()
  @ApiOperation({ summary: 'List runs (optionally filtered by pipelineId)' })
  async findAll(@Query('pipelineId') pipelineId?: string) {
    return this.runsService.findAll(pipelineId);
  }

  // Logs for a stage (must be before :id routes)
  @Get(':runId/stages/:stageRunId/logs')
  @ApiOperation({ summary: 'Get the log lines of one stage' })
  async getStageLogs(@Param('runId') runId: string, @Param('stageRunId') stageRunId: string) {
    return this.runsService.getStageLogs(runId, stageRunId);
  }

  @Get(':id/stages')
  @ApiOperation({ summary: 'Get a run with its stage results' })
  async findOneWithStages(@Param('id') id: string) {
    const result = await this.runsService.findOneWithStages(id);
    if (!result) throw new NotFoundException('Run not found');
    return result;
  }

  @Get(':id')
  @ApiOperation({ summary: 'Get one run' })
  async findOne(@Param('id') id: string) {
    const run = await this.runsService.findOne(id);
    if (!run) throw new NotFoundException('Run not found');
    return run;
  }

  @Post()
  @ApiOperation({ summary: 'Trigger a pipeline run for a commit (manual)' })
  async trigger(@Body() body: TriggerRunDto) {
    return this.runsService.triggerRun(
      body.pipelineId,
      body.commit,
      body.triggerType ?? 'manual',
      body.trigger_metadata ?? null,
    );
  }

  @Post(':id/cancel')
  @ApiOperation({ summary: 'Cancel a pending or running run' })
  async cancel(@Param('id') id: string) {
    return this.runsService.cancelRun(id);
  }
}
