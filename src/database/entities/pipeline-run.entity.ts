import {
  Entity,
  PrimaryGeneratedColumn,
  Column,
  CreateDateColumn,
  ManyToOne,
  JoinColumn,
  OneToMany,
  Index,
} from 'typeorm';
import { Pipeline } from './pipeline.entity';
import { StageRun } from './stage-run.entity';
import { DeploymentLock } from './deployment-lock.entity';

export type PipelineRunStatus = 'pending' | 'running' | 'succeeded' | 'failed';

/**
 * One execution of a pipeline for one commit (git push or manual trigger).
 * The row doubles as the queue entry: workers claim pending rows with SKIP LOCKED.
 */
@Entity('pipeline_runs')
@Index(['status', 'available_at', 'created_at'])
@Index(['heartbeat_at'])
export class PipelineRun {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Column({ type: 'uuid' })
  pipeline_id!: string;

  @ManyToOne(() => Pipeline, (p) => p.runs, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'pipeline_id' })
  pipeline!: Pipeline;

  @Column({ length: 50 })
  trigger_type!: string;

  @Column('jsonb', { nullable: true })
  trigger_metadata!: Record<string, unknown> | null;

  /** Commit hash (immutable tag) or the floating tag. */
  @Column({ length: 64 })
  commit!: string;

  @Column({ length: 50, default: 'pending' })
  status!: PipelineRunStatus;

  @Column({ type: 'varchar', length: 500, nullable: true })
  image_ref!: string | null;

  @Column({ type: 'varchar', length: 100, nullable: true })
  failed_stage!: string | null;

  @Column({ type: 'varchar', length: 20, nullable: true })
  error_kind!: string | null;

  @Column({ type: 'text', nullable: true })
  error_message!: string | null;

  @Column({ default: false })
  cancel_requested!: boolean;

  @Column({ type: 'varchar', length: 100, nullable: true })
  claimed_by!: string | null;

  /** Not claimed before this time; pushed back when the run is requeued. */
  @Column({ type: 'timestamptz', default: () => 'CURRENT_TIMESTAMP' })
  available_at!: Date;

  @Column({ type: 'timestamptz', nullable: true })
  heartbeat_at!: Date | null;

  @Column({ type: 'timestamptz', nullable: true })
  started_at!: Date | null;

  @Column({ type: 'timestamptz', nullable: true })
  completed_at!: Date | null;

  @CreateDateColumn({ type: 'timestamptz' })
  created_at!: Date;

  @OneToMany(() => StageRun, (stage) => stage.pipeline_run)
  stages!: StageRun[];

  @OneToMany(() => DeploymentLock, (lock) => lock.locked_by_run)
  locks!: DeploymentLock[];
}
