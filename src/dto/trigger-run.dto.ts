import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';

export class TriggerRunDto {
  @ApiProperty({ description: 'Pipeline id to run' })
  pipelineId!: string;

  @ApiProperty({
    description: 'Commit hash used as the immutable image tag (or the floating tag itself)',
    example: '3f9c2e1a7b',
  })
  commit!: string;

  @ApiPropertyOptional({ description: "Trigger type (default: 'manual')", example: 'manual' })
  triggerType?: string;

  @ApiPropertyOptional({
    description: 'Arbitrary metadata stored as pipeline_runs.trigger_metadata (jsonb)',
    example: { requestedBy: 'ops' },
  })
  trigger_metadata?: Record<string, unknown>;
}
