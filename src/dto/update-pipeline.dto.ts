import { ApiPropertyOptional } from '@nestjs/swagger';

export class UpdatePipelineDto {
  @ApiPropertyOptional({ example: 'hello-web' })
  name?: string;

  @ApiPropertyOptional({ example: 'example/hello-web' })
  repository?: string;

  @ApiPropertyOptional({ example: 'main' })
  branch?: string;

  @ApiPropertyOptional({
    description: 'Replacement pipeline definition; validated like on create.',
  })
  definition?: Record<string, unknown>;
}
