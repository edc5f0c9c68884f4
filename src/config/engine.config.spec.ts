import { ConfigService } from '@nestjs/config';
import { ConfigurationError } from '../engine/errors';
import { DEFAULT_ENGINE_SETTINGS } from '../engine/settings';
import { loadEngineSettings, loadSecretStore } from './engine.config';

describe('engine configuration', () => {
  it('falls back to defaults', () => {
    expect(loadEngineSettings(new ConfigService({}))).toEqual(DEFAULT_ENGINE_SETTINGS);
  });

  it('reads tool paths and rollout timings', () => {
    const settings = loadEngineSettings(
      new ConfigService({
        DOCKER_BIN: '/usr/local/bin/docker',
        ROLLOUT_INTERVAL_MS: '500',
        ROLLOUT_TIMEOUT_MS: '60000',
      }),
    );
    expect(settings.dockerBin).toBe('/usr/local/bin/docker');
    expect(settings.rolloutIntervalMs).toBe(500);
    expect(settings.rolloutTimeoutMs).toBe(60000);
  });

  it('rejects a non-positive interval', () => {
    expect(() => loadEngineSettings(new ConfigService({ ROLLOUT_INTERVAL_MS: '0' }))).toThrow(
      ConfigurationError,
    );
  });

  it('decodes the base64 kubeconfig', () => {
    const kubeconfig = 'apiVersion: v1\nkind: Config\n';
    const store = loadSecretStore(
      new ConfigService({
        REGISTRY_USERNAME: 'ci-bot',
        REGISTRY_PASSWORD: 'test-secret',
        KUBE_CONFIG_DATA: Buffer.from(kubeconfig).toString('base64'),
      }),
    );
    expect(store.cluster()?.kubeconfig).toBe(kubeconfig);
    expect(store.registry()?.username).toBe('ci-bot');
    expect(store.has('registry-write')).toBe(true);
  });

  it('leaves a scope empty when its secret is incomplete', () => {
    const store = loadSecretStore(new ConfigService({ REGISTRY_USERNAME: 'ci-bot' }));
    expect(store.has('registry-write')).toBe(false);
    expect(store.has('cluster-admin')).toBe(false);
  });
});
