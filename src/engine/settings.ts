export const ENGINE_SETTINGS = Symbol('ENGINE_SETTINGS');

export interface EngineSettings {
  dockerBin: string;
  kubectlBin: string;
  /** Pause between rollout observations. */
  rolloutIntervalMs: number;
  /** Default rollout timeout when a deploy stage sets none. */
  rolloutTimeoutMs: number;
  /** Consecutive ready observations needed before a rollout counts as converged. */
  rolloutConfirmations: number;
}

export const DEFAULT_ENGINE_SETTINGS: EngineSettings = {
  dockerBin: 'docker',
  kubectlBin: 'kubectl',
  rolloutIntervalMs: 2_000,
  rolloutTimeoutMs: 300_000,
  rolloutConfirmations: 2,
};
