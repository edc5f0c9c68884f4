import { ConfigService } from '@nestjs/config';
import { ConfigurationError } from '../engine/errors';
import { SecretStore } from '../engine/secret-store';
import { DEFAULT_ENGINE_SETTINGS, EngineSettings } from '../engine/settings';

export const SECRET_STORE = Symbol('SECRET_STORE');

function positiveInt(config: ConfigService, key: string, fallback: number): number {
  const raw = config.get<string>(key);
  if (raw === undefined || raw === '') return fallback;
  const value = Number.parseInt(raw, 10);
  if (!Number.isFinite(value) || value <= 0) {
    throw new ConfigurationError(`${key} must be a positive integer, got "${raw}"`);
  }
  return value;
}

export function loadEngineSettings(config: ConfigService): EngineSettings {
  return {
    dockerBin: config.get<string>('DOCKER_BIN') || DEFAULT_ENGINE_SETTINGS.dockerBin,
    kubectlBin: config.get<string>('KUBECTL_BIN') || DEFAULT_ENGINE_SETTINGS.kubectlBin,
    rolloutIntervalMs: positiveInt(
      config,
      'ROLLOUT_INTERVAL_MS',
      DEFAULT_ENGINE_SETTINGS.rolloutIntervalMs,
    ),
    rolloutTimeoutMs: positiveInt(
      config,
      'ROLLOUT_TIMEOUT_MS',
      DEFAULT_ENGINE_SETTINGS.rolloutTimeoutMs,
    ),
    rolloutConfirmations: positiveInt(
      config,
      'ROLLOUT_CONFIRMATIONS',
      DEFAULT_ENGINE_SETTINGS.rolloutConfirmations,
    ),
  };
}

/**
 * Secrets are read once at startup. KUBE_CONFIG_DATA is the base64-encoded kubeconfig.
 * Missing values are not an error here: a run that needs them fails its preflight.
 */
export function loadSecretStore(config: ConfigService): SecretStore {
  const username = config.get<string>('REGISTRY_USERNAME');
  const password = config.get<string>('REGISTRY_PASSWORD');
  const server = config.get<string>('REGISTRY_SERVER') || undefined;
  const kubeconfigData = config.get<string>('KUBE_CONFIG_DATA');

  return new SecretStore({
    registry: username && password ? { username, password, server } : undefined,
    cluster: kubeconfigData
      ? { kubeconfig: Buffer.from(kubeconfigData, 'base64').toString('utf8') }
      : undefined,
  });
}
