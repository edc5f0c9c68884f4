import {
  Entity,
  PrimaryGeneratedColumn,
  Column,
  CreateDateColumn,
  UpdateDateColumn,
  OneToMany,
} from 'typeorm';
import { PipelineRun } from './pipeline-run.entity';

/**
 * Stored pipeline definition: one build-push-deploy pipeline per repository.
 * `definition` holds the stages and image spec as jsonb; it is validated on every write.
 */
@Entity('pipelines')
export class Pipeline {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Column({ length: 255 })
  name!: string;

  @Column({ length: 500 })
  repository!: string;

  /** Pushes to this branch trigger a run. */
  @Column({ length: 255, default: 'main' })
  branch!: string;

  @Column('jsonb')
  definition!: Record<string, unknown>;

  @CreateDateColumn({ type: 'timestamptz' })
  created_at!: Date;

  @UpdateDateColumn({ type: 'timestamptz' })
  updated_at!: Date;

  @OneToMany(() => PipelineRun, (run) => run.pipeline)
  runs!: PipelineRun[];
}
