import { SecretStore } from '../secret-store';
import { DEFAULT_ENGINE_SETTINGS, EngineSettings } from '../settings';
import type { PipelineDefinition, Stage } from '../types';

export const COMMIT = '3f9c2e1a7b';

export const TEST_SETTINGS: EngineSettings = {
  ...DEFAULT_ENGINE_SETTINGS,
  rolloutIntervalMs: 2,
  rolloutTimeoutMs: 10,
};

export const TEST_KUBECONFIG = [
  'apiVersion: v1',
  'kind: Config',
  'users:',
  '- name: ci',
  '  user:',
  '    token: test-cluster-token',
].join('\n');

export function testSecrets(): SecretStore {
  return new SecretStore({
    registry: { username: 'ci-bot', password: 'test-secret' },
    cluster: { kubeconfig: TEST_KUBECONFIG },
  });
}

export function referenceStages(replicas = 3): Stage[] {
  return [
    { name: 'build', kind: 'build', dependsOn: [], context: '.' },
    { name: 'push', kind: 'push', dependsOn: ['build'] },
    { name: 'configure-credentials', kind: 'configure-credentials', dependsOn: ['push'] },
    {
      name: 'deploy',
      kind: 'deploy',
      dependsOn: ['configure-credentials'],
      target: 'remote',
      workload: {
        name: 'hello-web',
        namespace: 'default',
        replicas,
        containerPort: 5000,
        labels: {},
      },
      service: {
        name: 'hello-web',
        selector: { app: 'hello-web' },
        port: 80,
        targetPort: 5000,
        type: 'ClusterIP',
      },
    },
    { name: 'verify', kind: 'verify', dependsOn: ['deploy'], command: './smoke-test.sh' },
  ];
}

export function definitionOf(stages: Stage[], name = 'hello-web'): PipelineDefinition {
  return {
    name,
    image: { registryUser: 'acme', name: 'hello-web', floatingTag: 'latest' },
    stages,
  };
}
