import { Pipeline } from '../entities/pipeline.entity';

/**
 * Sample pipeline inserted on first start when no pipelines exist:
 * build → push → configure-credentials → deploy → verify.
 */
export const PIPELINE_SEED: Partial<Pipeline>[] = [
  {
    name: 'hello-web',
    repository: 'example/hello-web',
    branch: 'main',
    definition: {
      name: 'hello-web',
      image: { registryUser: 'example', name: 'hello-web', floatingTag: 'latest' },
      stages: [
        { name: 'build', kind: 'build', context: '.' },
        { name: 'push', kind: 'push', dependsOn: ['build'] },
        { name: 'configure-credentials', kind: 'configure-credentials', dependsOn: ['push'] },
        {
          name: 'deploy',
          kind: 'deploy',
          dependsOn: ['configure-credentials'],
          target: 'remote',
          workload: { name: 'hello-web', namespace: 'default', replicas: 1, containerPort: 5000 },
          service: {
            name: 'hello-web',
            selector: { app: 'hello-web' },
            port: 80,
            targetPort: 5000,
          },
          rolloutTimeoutMs: 300000,
        },
        {
          name: 'verify',
          kind: 'verify',
          dependsOn: ['deploy'],
          command: 'kubectl get service hello-web --namespace default',
        },
      ],
    },
  },
];
