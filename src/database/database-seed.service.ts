import { Injectable, Logger, OnModuleInit } from '@nestjs/common';
import { DataSource } from 'typeorm';
import { Pipeline } from './entities/pipeline.entity';
import { PIPELINE_SEED } from './seed/pipeline.seed';
import { parsePipelineDefinition } from '../engine/definition';

/**
 * Runs seed data on app startup. Inserts sample pipelines only if the pipelines table is empty.
 */
@Injectable()
export class DatabaseSeedService implements OnModuleInit {
  private readonly logger = new Logger(DatabaseSeedService.name);

  constructor(private readonly dataSource: DataSource) {}

  async onModuleInit(): Promise<void> {
    if (process.env.SEED_DATABASE === 'false') return;
    await this.seedPipelinesIfEmpty();
  }

  async seedPipelinesIfEmpty(): Promise<number> {
    const repo = this.dataSource.getRepository(Pipeline);
    const count = await repo.count();
    if (count > 0) return 0;

    for (const row of PIPELINE_SEED) {
      // Seeds go through the same validation as API writes.
      parsePipelineDefinition(row.definition);
      await repo.save(repo.create(row));
    }
    this.logger.log(`Seeded ${PIPELINE_SEED.length} pipeline(s)`);
    return PIPELINE_SEED.length;
  }
}
