import { Entity, PrimaryColumn, Column, ManyToOne, JoinColumn } from 'typeorm';
import { PipelineRun } from './pipeline-run.entity';

/** Visible record of which run holds the advisory lock for a deploy target (namespace/workload). */
@Entity('deployment_locks')
export class DeploymentLock {
  @PrimaryColumn({ length: 320 })
  target!: string;

  @Column({ type: 'uuid', nullable: true })
  locked_by!: string | null;

  @ManyToOne(() => PipelineRun, (run) => run.locks, { onDelete: 'SET NULL' })
  @JoinColumn({ name: 'locked_by' })
  locked_by_run!: PipelineRun | null;

  @Column({ type: 'timestamptz', default: () => 'CURRENT_TIMESTAMP' })
  locked_at!: Date;
}
