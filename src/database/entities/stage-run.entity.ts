import {
  Entity,
  PrimaryGeneratedColumn,
  Column,
  ManyToOne,
  JoinColumn,
  OneToMany,
  Index,
} from 'typeorm';
import { PipelineRun } from './pipeline-run.entity';
import { StageLog } from './stage-log.entity';
import type { RolloutOutcome, StageKind, StageStatus } from '../../engine/types';

/**
 * Persisted StageResult: one row per stage of a run, in execution order.
 */
@Entity('stage_runs')
@Index(['pipeline_run_id', 'stage_order'])
export class StageRun {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Column({ type: 'uuid' })
  pipeline_run_id!: string;

  @ManyToOne(() => PipelineRun, (run) => run.stages, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'pipeline_run_id' })
  pipeline_run!: PipelineRun;

  @Column({ length: 100 })
  stage_name!: string;

  @Column({ length: 50 })
  kind!: StageKind;

  @Column({ type: 'int', default: 0 })
  stage_order!: number;

  @Column({ length: 50, default: 'pending' })
  status!: StageStatus;

  @Column({ type: 'int', nullable: true })
  exit_code!: number | null;

  @Column({ type: 'varchar', length: 20, nullable: true })
  error_kind!: string | null;

  @Column({ type: 'text', nullable: true })
  error_message!: string | null;

  /** Redacted diagnostic output. */
  @Column({ type: 'text', default: '' })
  output!: string;

  @Column('jsonb', { nullable: true })
  rollout!: RolloutOutcome | null;

  @Column({ type: 'timestamptz', nullable: true })
  started_at!: Date | null;

  @Column({ type: 'timestamptz', nullable: true })
  completed_at!: Date | null;

  @OneToMany(() => StageLog, (log) => log.stage_run)
  logs!: StageLog[];
}
