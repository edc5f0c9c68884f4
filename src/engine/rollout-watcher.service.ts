import { Inject, Injectable, Logger } from '@nestjs/common';
import { CLOCK, Clock } from './clock';
import { CLUSTER_CLIENT, ClusterClient } from './cluster-client';
import { CancellationError } from './errors';
import { ENGINE_SETTINGS, EngineSettings } from './settings';
import type { RolloutOutcome, RolloutState, WorkloadRef } from './types';

export interface WatchOptions {
  signal?: AbortSignal;
  /** Environment for the cluster client (KUBECONFIG of the deploy stage). */
  env?: NodeJS.ProcessEnv;
  intervalMs?: number;
  onObservation?: (state: RolloutState) => void;
  onObservationError?: (message: string) => void;
}

function isValidReplicaCount(value: number): boolean {
  return Number.isInteger(value) && value >= 0;
}

/**
 * Polls a workload after a deploy until it is ready, the timeout elapses,
 * or the run is cancelled.
 *
 * Polling → Succeeded when ready ≥ desired on `rolloutConfirmations` consecutive
 * valid observations; → TimedOut once elapsed ≥ timeout; → Aborted on cancel.
 * Invalid observations (negative, non-integer, unreadable) leave the state as it
 * was and reset the consecutive count.
 */
@Injectable()
export class RolloutWatcher {
  private readonly logger = new Logger(RolloutWatcher.name);

  constructor(
    @Inject(CLUSTER_CLIENT) private readonly cluster: ClusterClient,
    @Inject(CLOCK) private readonly clock: Clock,
    @Inject(ENGINE_SETTINGS) private readonly settings: EngineSettings,
  ) {}

  async watch(
    workload: WorkloadRef,
    desiredReplicas: number,
    timeoutMs: number,
    options: WatchOptions = {},
  ): Promise<RolloutOutcome> {
    const startedAt = this.clock.now();
    const intervalMs = options.intervalMs ?? this.settings.rolloutIntervalMs;
    const required = Math.max(1, this.settings.rolloutConfirmations);
    let state: RolloutState = { desiredReplicas, readyReplicas: null, observedAt: null };
    let observations = 0;
    let streak = 0;

    const finish = (status: RolloutOutcome['status']): RolloutOutcome => ({
      status,
      elapsedMs: this.clock.now() - startedAt,
      observations,
      state,
    });

    if (desiredReplicas === 0) {
      state = { desiredReplicas, readyReplicas: 0, observedAt: new Date(this.clock.now()) };
      return finish('succeeded');
    }

    while (true) {
      if (options.signal?.aborted) return finish('aborted');

      let ready: number | null = null;
      try {
        ready = await this.cluster.readyReplicas(workload, options.env ?? process.env);
      } catch (err) {
        const message = err instanceof Error ? err.message : String(err);
        this.logger.warn(`Rollout observation failed for ${workload.namespace}/${workload.name}: ${message}`);
        options.onObservationError?.(message);
      }
      observations += 1;

      if (ready !== null && isValidReplicaCount(ready)) {
        const observedAt = Math.max(this.clock.now(), state.observedAt?.getTime() ?? 0);
        state = { desiredReplicas, readyReplicas: ready, observedAt: new Date(observedAt) };
        options.onObservation?.(state);
        streak = ready >= desiredReplicas ? streak + 1 : 0;
      } else {
        if (ready !== null) options.onObservationError?.(`Invalid ready replica count: ${ready}`);
        streak = 0;
      }

      if (streak >= required) return finish('succeeded');
      if (this.clock.now() - startedAt >= timeoutMs) return finish('timed-out');

      try {
        await this.clock.sleep(intervalMs, options.signal);
      } catch (err) {
        if (err instanceof CancellationError) return finish('aborted');
        throw err;
      }
    }
  }
}
