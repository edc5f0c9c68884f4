import { Test } from '@nestjs/testing';
import { CLOCK } from './clock';
import { CLUSTER_CLIENT } from './cluster-client';
import { COMMAND_RUNNER } from './command-runner';
import { CredentialResolver } from './credential-resolver.service';
import {
  CancellationError,
  ConfigurationError,
  ExecutionError,
  TimeoutError,
} from './errors';
import { PipelineController } from './pipeline-controller.service';
import { RolloutWatcher } from './rollout-watcher.service';
import { SecretStore } from './secret-store';
import { ENGINE_SETTINGS } from './settings';
import { StageExecutor } from './stage-executor.service';
import { ScriptedClusterClient } from './testing/fake-cluster-client';
import { FakeCommandRunner } from './testing/fake-command-runner';
import {
  COMMIT,
  definitionOf,
  referenceStages,
  testSecrets,
  TEST_SETTINGS,
} from './testing/fixtures';
import { ManualClock } from './testing/manual-clock';
import type { Stage, StageResult } from './types';

describe('PipelineController', () => {
  let runner: FakeCommandRunner;
  let cluster: ScriptedClusterClient;
  let clock: ManualClock;
  let credentials: CredentialResolver;
  let controller: PipelineController;

  async function compile(observations: Array<number | Error> = [3]) {
    runner = new FakeCommandRunner();
    cluster = new ScriptedClusterClient(observations);
    clock = new ManualClock();

    const moduleRef = await Test.createTestingModule({
      providers: [
        { provide: ENGINE_SETTINGS, useValue: TEST_SETTINGS },
        { provide: COMMAND_RUNNER, useValue: runner },
        { provide: CLUSTER_CLIENT, useValue: cluster },
        { provide: CLOCK, useValue: clock },
        CredentialResolver,
        StageExecutor,
        RolloutWatcher,
        PipelineController,
      ],
    }).compile();

    credentials = moduleRef.get(CredentialResolver);
    controller = moduleRef.get(PipelineController);
  }

  const statuses = (stages: StageResult[]) => stages.map((s) => [s.stage, s.status]);

  beforeEach(async () => {
    await compile();
  });

  it('runs the reference chain to success', async () => {
    const result = await controller.run(definitionOf(referenceStages()), {
      tag: COMMIT,
      secrets: testSecrets(),
    });

    expect(result.status).toBe('succeeded');
    expect(result.error).toBeUndefined();
    expect(result.image?.reference).toBe(`acme/hello-web:${COMMIT}`);
    expect(statuses(result.stages)).toEqual([
      ['build', 'succeeded'],
      ['push', 'succeeded'],
      ['configure-credentials', 'succeeded'],
      ['deploy', 'succeeded'],
      ['verify', 'succeeded'],
    ]);
    expect(runner.labels()).toEqual([
      `docker build -t acme/hello-web:${COMMIT} .`,
      `docker push acme/hello-web:${COMMIT}`,
      `docker tag acme/hello-web:${COMMIT} acme/hello-web:latest`,
      'docker push acme/hello-web:latest',
      'kubectl cluster-info --request-timeout=20s',
      'kubectl apply --namespace default -f -',
      './smoke-test.sh',
    ]);
    expect(credentials.heldCount()).toBe(0);
  });

  const REFERENCE_NAMES = ['build', 'push', 'configure-credentials', 'deploy', 'verify'];

  it.each([
    [1, 'docker build -t'],
    [2, `docker push acme/hello-web:${COMMIT}`],
    [3, 'kubectl cluster-info'],
    [4, 'kubectl apply'],
    [5, './smoke-test.sh'],
  ])('when stage %i fails, earlier stages succeed and later ones are skipped', async (k, label) => {
    runner.respond(label, 1, ['failed']);

    const result = await controller.run(definitionOf(referenceStages()), {
      tag: COMMIT,
      secrets: testSecrets(),
    });

    expect(result.status).toBe('failed');
    expect(result.failedStage).toBe(REFERENCE_NAMES[k - 1]);
    expect(result.error).toBeInstanceOf(ExecutionError);
    expect(statuses(result.stages)).toEqual(
      REFERENCE_NAMES.map((name, index) => [
        name,
        index < k - 1 ? 'succeeded' : index === k - 1 ? 'failed' : 'skipped',
      ]),
    );
    expect(credentials.heldCount()).toBe(0);
  });

  it('rejects a cyclic definition without running anything', async () => {
    const stages: Stage[] = [
      { name: 'build', kind: 'build', dependsOn: ['verify'], context: '.' },
      { name: 'verify', kind: 'verify', dependsOn: ['build'], command: './smoke-test.sh' },
    ];

    const result = await controller.run(definitionOf(stages), {
      tag: COMMIT,
      secrets: testSecrets(),
    });

    expect(result.status).toBe('failed');
    expect(result.error).toBeInstanceOf(ConfigurationError);
    expect(statuses(result.stages)).toEqual([
      ['build', 'skipped'],
      ['verify', 'skipped'],
    ]);
    expect(runner.calls).toHaveLength(0);
  });

  it('rejects a dangling dependency without running anything', async () => {
    const stages: Stage[] = [{ name: 'push', kind: 'push', dependsOn: ['build'] }];

    const result = await controller.run(definitionOf(stages), {
      tag: COMMIT,
      secrets: testSecrets(),
    });

    expect(result.error?.message).toBe('Stage "push" depends on unknown stage "build"');
    expect(runner.calls).toHaveLength(0);
  });

  it('aborts before any side effect when a secret is missing', async () => {
    const registryOnly = new SecretStore({
      registry: { username: 'ci-bot', password: 'test-secret' },
    });

    const result = await controller.run(definitionOf(referenceStages()), {
      tag: COMMIT,
      secrets: registryOnly,
    });

    expect(result.status).toBe('failed');
    expect(result.error).toBeInstanceOf(ConfigurationError);
    expect(result.error?.message).toBe('No secret configured for scope(s): cluster-admin');
    expect(runner.calls).toHaveLength(0);
  });

  it('rejects a tag that is neither a commit hash nor the floating tag', async () => {
    const result = await controller.run(definitionOf(referenceStages()), {
      tag: 'release-1',
      secrets: testSecrets(),
    });

    expect(result.error).toBeInstanceOf(ConfigurationError);
    expect(result.image).toBeNull();
    expect(runner.calls).toHaveLength(0);
  });

  it('rejects a workload whose image is not the resolved image', async () => {
    const stages = referenceStages().map((stage) =>
      stage.kind === 'deploy'
        ? { ...stage, workload: { ...stage.workload, image: 'acme/other:latest' } }
        : stage,
    );

    const result = await controller.run(definitionOf(stages), {
      tag: COMMIT,
      secrets: testSecrets(),
    });

    expect(result.error).toBeInstanceOf(ConfigurationError);
    expect(runner.calls).toHaveLength(0);
  });

  it('skips deploy and verify when the push fails, leaving the floating tag alone', async () => {
    const stages = referenceStages().filter((s) => s.kind !== 'configure-credentials');
    const chain = stages.map((s) => (s.kind === 'deploy' ? { ...s, dependsOn: ['push'] } : s));
    runner.respond(`docker push acme/hello-web:${COMMIT}`, 1, ['unauthorized']);

    const result = await controller.run(definitionOf(chain), {
      tag: COMMIT,
      secrets: testSecrets(),
    });

    expect(result.status).toBe('failed');
    expect(result.failedStage).toBe('push');
    expect(statuses(result.stages)).toEqual([
      ['build', 'succeeded'],
      ['push', 'failed'],
      ['deploy', 'skipped'],
      ['verify', 'skipped'],
    ]);
    expect(runner.labels()).toEqual([
      `docker build -t acme/hello-web:${COMMIT} .`,
      `docker push acme/hello-web:${COMMIT}`,
    ]);
    expect(credentials.heldCount()).toBe(0);
  });

  it('fails the deploy with a TimeoutError when the rollout does not converge', async () => {
    await compile([1]);

    const result = await controller.run(definitionOf(referenceStages()), {
      tag: COMMIT,
      secrets: testSecrets(),
    });

    const deploy = result.stages[3];
    expect(result.failedStage).toBe('deploy');
    expect(deploy.status).toBe('failed');
    expect(deploy.error).toBeInstanceOf(TimeoutError);
    expect(deploy.rollout?.status).toBe('timed-out');
    expect(deploy.rollout?.state.readyReplicas).toBe(1);
    expect(result.stages[4].status).toBe('skipped');
  });

  it('watches the rollout with the cluster credential in place', async () => {
    await controller.run(definitionOf(referenceStages()), {
      tag: COMMIT,
      secrets: testSecrets(),
    });

    expect(cluster.requests[0].workload).toEqual({ namespace: 'default', name: 'hello-web' });
    expect(cluster.requests[0].env.KUBECONFIG).toMatch(/kubeconfig$/);
  });

  it('deploys idempotently against a converged cluster', async () => {
    const deployOnly = definitionOf(
      referenceStages()
        .filter((s) => s.kind === 'deploy')
        .map((s) => ({ ...s, dependsOn: [] })),
    );

    const first = await controller.run(deployOnly, { tag: COMMIT, secrets: testSecrets() });
    const second = await controller.run(deployOnly, { tag: COMMIT, secrets: testSecrets() });

    expect(first.status).toBe('succeeded');
    expect(second.status).toBe('succeeded');
    const [firstState, secondState] = [first, second].map((r) => r.stages[0].rollout?.state);
    expect(secondState?.readyReplicas).toBe(firstState?.readyReplicas);
    expect(secondState?.desiredReplicas).toBe(firstState?.desiredReplicas);
    expect(runner.labels()).toEqual([
      'kubectl apply --namespace default -f -',
      'kubectl apply --namespace default -f -',
    ]);
  });

  it('still watches the rollout for a local deploy', async () => {
    const local = definitionOf([
      { name: 'build', kind: 'build', dependsOn: [], context: '.' },
      {
        name: 'deploy',
        kind: 'deploy',
        dependsOn: ['build'],
        target: 'local',
        workload: {
          name: 'hello-web',
          namespace: 'default',
          replicas: 1,
          containerPort: 5000,
          labels: {},
        },
      },
    ]);

    const result = await controller.run(local, { tag: 'latest', secrets: SecretStore.empty() });

    expect(result.status).toBe('succeeded');
    expect(runner.labels()).toEqual(['docker build -t acme/hello-web:latest .']);
    expect(cluster.requests.length).toBeGreaterThan(0);
  });

  it('redacts secrets from stored stage output', async () => {
    runner.respond('kubectl cluster-info', 0, ['using token test-cluster-token']);

    const result = await controller.run(definitionOf(referenceStages()), {
      tag: COMMIT,
      secrets: testSecrets(),
    });

    expect(result.stages[2].output).toBe(
      '$ kubectl cluster-info --request-timeout=20s\nusing token [REDACTED]',
    );
  });

  it('fails the in-flight stage and skips the rest when cancelled mid-stage', async () => {
    const abort = new AbortController();
    runner.respond((command) => {
      if (command.label.startsWith('docker push')) abort.abort();
      return false;
    }, 0);

    const result = await controller.run(definitionOf(referenceStages()), {
      tag: COMMIT,
      secrets: testSecrets(),
      signal: abort.signal,
    });

    expect(result.status).toBe('failed');
    expect(result.failedStage).toBe('push');
    expect(result.error).toBeInstanceOf(CancellationError);
    expect(statuses(result.stages)).toEqual([
      ['build', 'succeeded'],
      ['push', 'failed'],
      ['configure-credentials', 'skipped'],
      ['deploy', 'skipped'],
      ['verify', 'skipped'],
    ]);
  });

  it('aborts the rollout watch immediately on cancellation', async () => {
    await compile([0]);
    const abort = new AbortController();
    clock.onSleep = () => abort.abort();

    const result = await controller.run(definitionOf(referenceStages()), {
      tag: COMMIT,
      secrets: testSecrets(),
      signal: abort.signal,
    });

    const deploy = result.stages[3];
    expect(deploy.status).toBe('failed');
    expect(deploy.error).toBeInstanceOf(CancellationError);
    expect(deploy.rollout?.status).toBe('aborted');
    expect(cluster.requests).toHaveLength(1);
  });

  it('reports each stage as it starts and settles', async () => {
    const events: string[] = [];

    await controller.run(definitionOf(referenceStages().slice(0, 2)), {
      tag: COMMIT,
      secrets: testSecrets(),
      onStageStart: (stage) => {
        events.push(`start:${stage.name}`);
      },
      onStageComplete: (result) => {
        events.push(`${result.status}:${result.stage}`);
      },
    });

    expect(events).toEqual(['start:build', 'succeeded:build', 'start:push', 'succeeded:push']);
  });
});
