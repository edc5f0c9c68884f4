import { Module } from '@nestjs/common';
import { GitWebhookController } from './git-webhook.controller';
import { PipelinesModule } from '../pipelines/pipelines.module';
import { RunsModule } from '../runs/runs.module';

@Module({
  imports: [PipelinesModule, RunsModule],
  controllers: [GitWebhookController],
})
export class WebhooksModule {}
