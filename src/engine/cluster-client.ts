import { Inject, Injectable } from '@nestjs/common';
import { COMMAND_RUNNER, CommandRunner } from './command-runner';
import { ENGINE_SETTINGS, EngineSettings } from './settings';
import type { WorkloadRef } from './types';

export const CLUSTER_CLIENT = Symbol('CLUSTER_CLIENT');

/** Reads workload state from the cluster API. */
export interface ClusterClient {
  /**
   * Ready replicas running the current revision of the workload. Throws when it cannot
   * be read; NaN when the cluster answers with something that is not a count.
   */
  readyReplicas(workload: WorkloadRef, env: NodeJS.ProcessEnv): Promise<number>;
}

/** Deployment fields read per observation, comma separated. Absent fields print as ''. */
const ROLLOUT_JSONPATH = [
  '{.metadata.generation}',
  '{.status.observedGeneration}',
  '{.status.replicas}',
  '{.status.updatedReplicas}',
  '{.status.readyReplicas}',
].join(',');

export interface DeploymentRolloutStatus {
  generation: number;
  observedGeneration: number;
  /** Pods of every revision. */
  replicas: number;
  /** Pods of the current revision. */
  updatedReplicas: number;
  /** Ready pods of every revision. */
  readyReplicas: number;
}

/** Parses the jsonpath output; null when it does not have the expected shape. */
export function parseRolloutStatus(raw: string): DeploymentRolloutStatus | null {
  const fields = raw.trim().split(',');
  if (fields.length !== 5) return null;
  // Counts are omitted from status while they are zero.
  const values = fields.map((field) => (field.trim() === '' ? 0 : Number(field.trim())));
  if (values.some((value) => !Number.isInteger(value) || value < 0)) return null;
  const [generation, observedGeneration, replicas, updatedReplicas, readyReplicas] = values;
  return { generation, observedGeneration, replicas, updatedReplicas, readyReplicas };
}

/**
 * Lower bound on the ready pods of the current revision. Until the controller has seen
 * the latest spec nothing counts; while old pods remain they are assumed to be the
 * ready ones, so a rolling update only passes once the new pods carry it alone.
 */
export function currentRevisionReady(status: DeploymentRolloutStatus): number {
  if (status.observedGeneration < status.generation) return 0;
  const oldPods = Math.max(0, status.replicas - status.updatedReplicas);
  return Math.max(0, Math.min(status.updatedReplicas, status.readyReplicas - oldPods));
}

/**
 * kubectl-backed client. `env` carries KUBECONFIG for the stage's scoped credential.
 */
@Injectable()
export class KubectlClusterClient implements ClusterClient {
  constructor(
    @Inject(COMMAND_RUNNER) private readonly runner: CommandRunner,
    @Inject(ENGINE_SETTINGS) private readonly settings: EngineSettings,
  ) {}

  async readyReplicas(workload: WorkloadRef, env: NodeJS.ProcessEnv): Promise<number> {
    const stdout: string[] = [];
    const stderr: string[] = [];
    const args = [
      'get',
      'deployment',
      workload.name,
      '--namespace',
      workload.namespace,
      '-o',
      `jsonpath=${ROLLOUT_JSONPATH}`,
    ];
    const outcome = await this.runner.run(
      { label: `kubectl ${args.join(' ')}`, program: this.settings.kubectlBin, args },
      { env, onLine: (line, stream) => (stream === 'stdout' ? stdout : stderr).push(line) },
    );
    if (outcome.exitCode !== 0) {
      throw new Error(
        `kubectl get deployment ${workload.namespace}/${workload.name} exited with code ${outcome.exitCode}: ${stderr.join(' ').trim()}`,
      );
    }

    const status = parseRolloutStatus(stdout.join(''));
    return status ? currentRevisionReady(status) : Number.NaN;
  }
}
