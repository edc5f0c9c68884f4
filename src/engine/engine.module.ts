import { Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { loadEngineSettings, loadSecretStore, SECRET_STORE } from '../config/engine.config';
import { CLOCK, systemClock } from './clock';
import { CLUSTER_CLIENT, KubectlClusterClient } from './cluster-client';
import { COMMAND_RUNNER, ProcessCommandRunner } from './command-runner';
import { CredentialResolver } from './credential-resolver.service';
import { PipelineController } from './pipeline-controller.service';
import { RolloutWatcher } from './rollout-watcher.service';
import { ENGINE_SETTINGS } from './settings';
import { StageExecutor } from './stage-executor.service';

@Module({
  imports: [ConfigModule],
  providers: [
    { provide: ENGINE_SETTINGS, useFactory: loadEngineSettings, inject: [ConfigService] },
    { provide: SECRET_STORE, useFactory: loadSecretStore, inject: [ConfigService] },
    { provide: COMMAND_RUNNER, useClass: ProcessCommandRunner },
    { provide: CLUSTER_CLIENT, useClass: KubectlClusterClient },
    { provide: CLOCK, useValue: systemClock },
    CredentialResolver,
    StageExecutor,
    RolloutWatcher,
    PipelineController,
  ],
  exports: [PipelineController, SECRET_STORE],
})
export class EngineModule {}
