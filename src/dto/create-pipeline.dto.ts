import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';

export class CreatePipelineDto {
  @ApiProperty({ example: 'hello-web' })
  name!: string;

  @ApiProperty({
    example: 'example/hello-web',
    description: 'Must match what your git webhook sends',
  })
  repository!: string;

  @ApiPropertyOptional({ example: 'main', description: 'Pushes to this branch trigger a run' })
  branch?: string;

  @ApiProperty({
    description: 'Pipeline definition (image + stages). Validated, then stored in pipelines.definition (jsonb).',
    example: {
      name: 'hello-web',
      image: { registryUser: 'example', name: 'hello-web', floatingTag: 'latest' },
      stages: [
        { name: 'build', kind: 'build', context: '.' },
        { name: 'push', kind: 'push', dependsOn: ['build'] },
      ],
    },
  })
  definition!: Record<string, unknown>;
}
