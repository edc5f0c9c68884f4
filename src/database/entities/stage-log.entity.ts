import {
  Entity,
  PrimaryGeneratedColumn,
  Column,
  ManyToOne,
  JoinColumn,
  Index,
} from 'typeorm';
import { StageRun } from './stage-run.entity';

@Entity('stage_logs')
@Index(['stage_run_id', 'timestamp'])
export class StageLog {
  @PrimaryGeneratedColumn({ type: 'bigint' })
  id!: string;

  @Column({ type: 'uuid' })
  stage_run_id!: string;

  @ManyToOne(() => StageRun, (stage) => stage.logs, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'stage_run_id' })
  stage_run!: StageRun;

  @Column('text')
  log_line!: string;

  @Column({ length: 20, default: 'info' })
  log_level!: string;

  @Column({ type: 'timestamptz', default: () => 'CURRENT_TIMESTAMP' })
  timestamp!: Date;
}
