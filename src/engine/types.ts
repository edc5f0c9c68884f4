import type { PipelineError } from './errors';
import type { SecretStore } from './secret-store';

/**
 * Pipeline definition and run model.
 * Stage kinds: build → push → configure-credentials → deploy → verify.
 */
export const STAGE_KINDS = ['build', 'push', 'configure-credentials', 'deploy', 'verify'] as const;
export type StageKind = (typeof STAGE_KINDS)[number];

export type StageStatus = 'pending' | 'running' | 'succeeded' | 'failed' | 'skipped';
export type RunStatus = 'succeeded' | 'failed';

export type CredentialScope = 'registry-write' | 'cluster-admin';
export type DeployTarget = 'remote' | 'local';

export interface ImageSpec {
  /** Registry account the image is pushed under, e.g. "acme" in acme/web:latest */
  registryUser: string;
  name: string;
  floatingTag: string;
}

export interface WorkloadSpec {
  name: string;
  namespace: string;
  replicas: number;
  /** When omitted the resolved immutable reference is used. */
  image?: string;
  containerPort: number;
  labels: Record<string, string>;
}

export interface ServiceSpec {
  name: string;
  selector: Record<string, string>;
  port: number;
  targetPort: number;
  type: 'ClusterIP' | 'NodePort' | 'LoadBalancer';
}

interface StageBase {
  name: string;
  dependsOn: readonly string[];
}

export interface BuildStage extends StageBase {
  kind: 'build';
  context: string;
  dockerfile?: string;
  command?: string;
}

export interface PushStage extends StageBase {
  kind: 'push';
  command?: string;
}

export interface ConfigureCredentialsStage extends StageBase {
  kind: 'configure-credentials';
  command?: string;
}

export interface DeployStage extends StageBase {
  kind: 'deploy';
  target: DeployTarget;
  workload: WorkloadSpec;
  service?: ServiceSpec;
  rolloutTimeoutMs?: number;
}

export interface VerifyStage extends StageBase {
  kind: 'verify';
  command: string;
}

export type Stage = BuildStage | PushStage | ConfigureCredentialsStage | DeployStage | VerifyStage;

export interface PipelineDefinition {
  readonly name: string;
  readonly image: Readonly<ImageSpec>;
  readonly stages: readonly Stage[];
}

export interface ResolvedImage {
  /** registry-username/image-name */
  repository: string;
  tag: string;
  floatingTag: string;
  /** repository:tag, content-addressed */
  reference: string;
  /** repository:floatingTag */
  floatingReference: string;
}

export interface WorkloadRef {
  namespace: string;
  name: string;
}

export interface RolloutState {
  desiredReplicas: number;
  /** null until the first valid observation */
  readyReplicas: number | null;
  observedAt: Date | null;
}

export type RolloutStatus = 'succeeded' | 'timed-out' | 'aborted';

export interface RolloutOutcome {
  status: RolloutStatus;
  elapsedMs: number;
  observations: number;
  state: RolloutState;
}

export interface StageResult {
  readonly stage: string;
  readonly kind: StageKind;
  readonly status: StageStatus;
  readonly startedAt: Date | null;
  readonly completedAt: Date | null;
  /** Redacted diagnostic output, verbatim otherwise. */
  readonly output: string;
  readonly exitCode: number | null;
  readonly error?: PipelineError;
  readonly rollout?: RolloutOutcome;
}

export interface RunResult {
  runId: string;
  pipeline: string;
  status: RunStatus;
  image: ResolvedImage | null;
  stages: StageResult[];
  failedStage?: string;
  error?: PipelineError;
  startedAt: Date;
  completedAt: Date;
}

export interface ScopedCredential {
  readonly scope: CredentialScope;
  /** Environment entries pointing tools at the materialized secret. */
  readonly env: Readonly<Record<string, string>>;
  readonly directory: string;
}

export type OutputListener = (stage: string, line: string, stream: 'stdout' | 'stderr') => void;

export interface RunContext {
  readonly runId: string;
  readonly image: ResolvedImage;
  readonly secrets: SecretStore;
  readonly signal?: AbortSignal;
  /** Credential held by the stage currently executing, if it needs one. */
  credential: ScopedCredential | null;
  readonly results: Map<string, StageResult>;
  readonly onOutput?: OutputListener;
}
