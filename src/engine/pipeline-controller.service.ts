import { Inject, Injectable, Logger } from '@nestjs/common';
import { randomUUID } from 'node:crypto';
import { CredentialResolver } from './credential-resolver.service';
import { credentialScopeFor, requiredCredentialScopes, resolveStageOrder } from './definition';
import {
  CancellationError,
  ConfigurationError,
  ExecutionError,
  PipelineError,
  TimeoutError,
} from './errors';
import { resolveImage } from './image-reference';
import { workloadImage } from './manifests';
import { createRedactor } from './redaction';
import { RolloutWatcher } from './rollout-watcher.service';
import { SecretStore } from './secret-store';
import { ENGINE_SETTINGS, EngineSettings } from './settings';
import { StageExecutor } from './stage-executor.service';
import type {
  DeployStage,
  OutputListener,
  PipelineDefinition,
  ResolvedImage,
  RunContext,
  RunResult,
  Stage,
  StageResult,
} from './types';

export interface RunOptions {
  runId?: string;
  /** Commit hash for the immutable tag, or the floating tag itself. */
  tag: string;
  secrets: SecretStore;
  /** Checked between stages; the rollout watcher honors it immediately. */
  signal?: AbortSignal;
  onOutput?: OutputListener;
  onStageStart?: (stage: Stage, startedAt: Date) => void | Promise<void>;
  onStageComplete?: (result: StageResult) => void | Promise<void>;
}

function skippedResult(stage: Stage): StageResult {
  return Object.freeze({
    stage: stage.name,
    kind: stage.kind,
    status: 'skipped' as const,
    startedAt: null,
    completedAt: null,
    output: '',
    exitCode: null,
  });
}

function failedResult(
  stage: Stage,
  startedAt: Date | null,
  error: PipelineError,
  output = '',
  exitCode: number | null = null,
): StageResult {
  return Object.freeze({
    stage: stage.name,
    kind: stage.kind,
    status: 'failed' as const,
    startedAt,
    completedAt: new Date(),
    output,
    exitCode,
    error,
  });
}

/**
 * Runs a pipeline definition to completion: validate, order, execute one stage at
 * a time, stop at the first failure. Stages never run concurrently: build, push and
 * deploy all mutate the same tag and workload.
 */
@Injectable()
export class PipelineController {
  private readonly logger = new Logger(PipelineController.name);

  constructor(
    private readonly credentials: CredentialResolver,
    private readonly executor: StageExecutor,
    private readonly watcher: RolloutWatcher,
    @Inject(ENGINE_SETTINGS) private readonly settings: EngineSettings,
  ) {}

  async run(definition: PipelineDefinition, options: RunOptions): Promise<RunResult> {
    const runId = options.runId ?? randomUUID();
    const startedAt = new Date();

    let prepared: { order: Stage[]; image: ResolvedImage };
    try {
      prepared = this.prepare(definition, options);
    } catch (err) {
      if (!(err instanceof ConfigurationError)) throw err;
      this.logger.error(`Run ${runId} (${definition.name}) rejected: ${err.message}`);
      const stages = definition.stages.map(skippedResult);
      for (const result of stages) await options.onStageComplete?.(result);
      return {
        runId,
        pipeline: definition.name,
        status: 'failed',
        image: null,
        stages,
        error: err,
        startedAt,
        completedAt: new Date(),
      };
    }

    const { order, image } = prepared;
    const context: RunContext = {
      runId,
      image,
      secrets: options.secrets,
      signal: options.signal,
      credential: null,
      results: new Map(),
      onOutput: options.onOutput,
    };

    this.logger.log(`Run ${runId} (${definition.name}) started for ${image.reference}`);
    let failedStage: string | undefined;
    let runError: PipelineError | undefined;

    for (const stage of order) {
      if (runError) {
        await this.settle(context, skippedResult(stage), options);
        continue;
      }

      if (options.signal?.aborted) {
        runError = new CancellationError(`Run cancelled before stage "${stage.name}" started`);
        await this.settle(context, skippedResult(stage), options);
        continue;
      }

      const unmet = stage.dependsOn.filter(
        (dep) => context.results.get(dep)?.status !== 'succeeded',
      );
      if (unmet.length > 0) {
        runError = new ConfigurationError(
          `Stage "${stage.name}" has unfinished dependencies: ${unmet.join(', ')}`,
        );
        failedStage = stage.name;
        await this.settle(context, failedResult(stage, null, runError), options);
        continue;
      }

      await options.onStageStart?.(stage, new Date());
      let result = await this.runStage(stage, context);

      if (options.signal?.aborted && result.status === 'succeeded') {
        result = failedResult(
          stage,
          result.startedAt,
          new CancellationError(`Run cancelled during stage "${stage.name}"`),
          result.output,
          result.exitCode,
        );
      }

      await this.settle(context, result, options);
      if (result.status === 'failed') {
        failedStage = stage.name;
        runError = result.error;
      }
    }

    const stages = order.map((stage) => context.results.get(stage.name) ?? skippedResult(stage));
    const status = stages.every((s) => s.status === 'succeeded') ? 'succeeded' : 'failed';
    this.destroyContext(context);

    if (status === 'succeeded') {
      this.logger.log(`Run ${runId} (${definition.name}) succeeded`);
    } else {
      this.logger.warn(
        `Run ${runId} (${definition.name}) failed at ${failedStage ?? 'start'}: ${runError?.message ?? 'unknown'}`,
      );
    }

    return {
      runId,
      pipeline: definition.name,
      status,
      image,
      stages,
      failedStage,
      error: runError,
      startedAt,
      completedAt: new Date(),
    };
  }

  /** Everything that can be checked before a side effect happens. */
  private prepare(
    definition: PipelineDefinition,
    options: RunOptions,
  ): { order: Stage[]; image: ResolvedImage } {
    const order = resolveStageOrder(definition);
    const image = resolveImage(definition.image, options.tag);
    for (const stage of order) {
      if (stage.kind === 'deploy') workloadImage(stage.workload, image);
    }
    this.credentials.assertAvailable(requiredCredentialScopes(definition), options.secrets);
    return { order, image };
  }

  private async settle(context: RunContext, result: StageResult, options: RunOptions) {
    context.results.set(result.stage, result);
    await options.onStageComplete?.(result);
  }

  private async runStage(stage: Stage, context: RunContext): Promise<StageResult> {
    const startedAt = new Date();
    try {
      return await this.credentials.withCredential(
        credentialScopeFor(stage),
        context.secrets,
        async (credential) => {
          context.credential = credential;
          try {
            const executed = await this.executor.execute(stage, context);
            if (stage.kind !== 'deploy' || executed.status !== 'succeeded') return executed;
            return await this.awaitRollout(stage, executed, context);
          } finally {
            context.credential = null;
          }
        },
      );
    } catch (err) {
      if (err instanceof PipelineError) return failedResult(stage, startedAt, err);
      const message = err instanceof Error ? err.message : String(err);
      this.logger.error(`Stage ${stage.name} crashed: ${message}`);
      return failedResult(stage, startedAt, new ExecutionError(message, 1), '', 1);
    }
  }

  /** A deploy only passes once the rollout converges. */
  private async awaitRollout(
    stage: DeployStage,
    executed: StageResult,
    context: RunContext,
  ): Promise<StageResult> {
    const redact = createRedactor(context.secrets.knownValues());
    const lines = executed.output ? [executed.output] : [];
    const note = (line: string) => {
      const safe = redact(line);
      lines.push(safe);
      context.onOutput?.(stage.name, safe, 'stdout');
    };

    const { namespace, name, replicas } = stage.workload;
    const timeoutMs = stage.rolloutTimeoutMs ?? this.settings.rolloutTimeoutMs;
    note(`Waiting for ${namespace}/${name} to reach ${replicas} ready replica(s)`);

    const outcome = await this.watcher.watch({ namespace, name }, replicas, timeoutMs, {
      signal: context.signal,
      env: { ...process.env, ...(context.credential?.env ?? {}) },
      onObservation: (state) =>
        note(`rollout: ${state.readyReplicas ?? 0}/${state.desiredReplicas} ready`),
      onObservationError: (message) => note(`rollout observation error: ${message}`),
    });

    const ready = outcome.state.readyReplicas ?? 0;
    const base = {
      stage: stage.name,
      kind: stage.kind,
      startedAt: executed.startedAt,
      completedAt: new Date(),
      exitCode: executed.exitCode,
      rollout: outcome,
    };

    if (outcome.status === 'succeeded') {
      note(`Rollout of ${namespace}/${name} complete after ${outcome.elapsedMs}ms`);
      return Object.freeze({ ...base, status: 'succeeded' as const, output: lines.join('\n') });
    }

    const error =
      outcome.status === 'timed-out'
        ? new TimeoutError(
            `Rollout of ${namespace}/${name} did not converge within ${timeoutMs}ms (${ready}/${replicas} ready)`,
            outcome.state,
          )
        : new CancellationError(`Rollout watch of ${namespace}/${name} cancelled`);
    note(error.message);
    return Object.freeze({ ...base, status: 'failed' as const, output: lines.join('\n'), error });
  }

  private destroyContext(context: RunContext): void {
    context.credential = null;
    context.results.clear();
  }
}
