import { BadRequestException, Injectable, NotFoundException } from '@nestjs/common';
import { DataSource } from 'typeorm';
import { z } from 'zod';
import { Pipeline } from '../../database/entities/pipeline.entity';
import { parsePipelineDefinition } from '../../engine/definition';
import { ConfigurationError } from '../../engine/errors';

const pipelineFields = z.object({
  name: z.string().trim().min(1).max(255),
  repository: z.string().trim().min(1).max(500),
  branch: z.string().trim().min(1).max(255).default('main'),
  definition: z.record(z.unknown()),
});

export type PipelineInput = z.input<typeof pipelineFields>;

/** Stored pipeline definitions. Every write is validated before it reaches the table. */
@Injectable()
export class PipelinesService {
  constructor(private readonly dataSource: DataSource) {}

  private get repo() {
    return this.dataSource.getRepository(Pipeline);
  }

  async findAll(): Promise<Pipeline[]> {
    return this.repo.find({ order: { created_at: 'DESC' } });
  }

  async findOne(id: string): Promise<Pipeline | null> {
    return this.repo.findOne({ where: { id } });
  }

  /** Matches the webhook's repository identifier (e.g. "owner/repo" or a clone URL). */
  async findByRepository(repository: string): Promise<Pipeline[]> {
    return this.repo.find({ where: { repository }, order: { created_at: 'ASC' } });
  }

  async create(input: PipelineInput): Promise<Pipeline> {
    const fields = validate(pipelineFields, input);
    checkDefinition(fields.definition);
    return this.repo.save(this.repo.create(fields));
  }

  async update(id: string, input: Partial<PipelineInput>): Promise<Pipeline> {
    const pipeline = await this.findOne(id);
    if (!pipeline) throw new NotFoundException('Pipeline not found');

    const fields = validate(pipelineFields.partial(), input);
    if (fields.definition) checkDefinition(fields.definition);
    Object.assign(pipeline, fields);
    return this.repo.save(pipeline);
  }

  async remove(id: string): Promise<void> {
    const result = await this.repo.delete(id);
    if (!result.affected) throw new NotFoundException('Pipeline not found');
  }
}

function validate<T extends z.ZodTypeAny>(schema: T, input: unknown): z.output<T> {
  const parsed = schema.safeParse(input);
  if (!parsed.success) {
    throw new BadRequestException(
      parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
    );
  }
  return parsed.data;
}

function checkDefinition(definition: Record<string, unknown>): void {
  try {
    parsePipelineDefinition(definition);
  } catch (err) {
    if (err instanceof ConfigurationError) throw new BadRequestException(err.message);
    throw err;
  }
}
