/**
 * Database entities: pipelines, pipeline_runs, stage_runs, stage_logs, deployment_locks.
 */
export { Pipeline } from './pipeline.entity';
export { PipelineRun } from './pipeline-run.entity';
export { StageRun } from './stage-run.entity';
export { StageLog } from './stage-log.entity';
export { DeploymentLock } from './deployment-lock.entity';
