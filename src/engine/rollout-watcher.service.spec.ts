import { RolloutWatcher } from './rollout-watcher.service';
import { ScriptedClusterClient } from './testing/fake-cluster-client';
import { ManualClock } from './testing/manual-clock';
import { TEST_SETTINGS } from './testing/fixtures';

const workload = { namespace: 'default', name: 'hello-web' };

describe('RolloutWatcher', () => {
  let clock: ManualClock;

  beforeEach(() => {
    clock = new ManualClock();
  });

  function watcherFor(observations: Array<number | Error>) {
    const cluster = new ScriptedClusterClient(observations);
    return { cluster, watcher: new RolloutWatcher(cluster, clock, TEST_SETTINGS) };
  }

  it('needs two consecutive ready observations', async () => {
    const { cluster, watcher } = watcherFor([1, 2, 3, 3]);

    const outcome = await watcher.watch(workload, 3, 100, { intervalMs: 2 });

    expect(outcome.status).toBe('succeeded');
    expect(outcome.observations).toBe(4);
    expect(cluster.requests).toHaveLength(4);
    expect(outcome.elapsedMs).toBe(6);
    expect(outcome.state).toEqual({
      desiredReplicas: 3,
      readyReplicas: 3,
      observedAt: new Date(6),
    });
  });

  it('restarts the streak when readiness drops', async () => {
    const { watcher } = watcherFor([3, 2, 3, 3]);

    const outcome = await watcher.watch(workload, 3, 100, { intervalMs: 2 });

    expect(outcome.status).toBe('succeeded');
    expect(outcome.observations).toBe(4);
  });

  it('times out once the elapsed time reaches the timeout', async () => {
    const { watcher } = watcherFor([0, 1]);

    const outcome = await watcher.watch(workload, 2, 10, { intervalMs: 2 });

    expect(outcome.status).toBe('timed-out');
    expect(outcome.elapsedMs).toBeGreaterThanOrEqual(10);
    expect(outcome.observations).toBe(6);
    expect(outcome.state.readyReplicas).toBe(1);
  });

  it('succeeds immediately for a scale-to-zero workload', async () => {
    const { cluster, watcher } = watcherFor([5]);

    const outcome = await watcher.watch(workload, 0, 10);

    expect(outcome.status).toBe('succeeded');
    expect(outcome.observations).toBe(0);
    expect(outcome.elapsedMs).toBe(0);
    expect(cluster.requests).toHaveLength(0);
  });

  it('does not let a negative observation advance the state', async () => {
    const { watcher } = watcherFor([1, -1, 2, 2]);
    const seen: Array<number | null> = [];
    const errors: string[] = [];

    const outcome = await watcher.watch(workload, 2, 100, {
      intervalMs: 2,
      onObservation: (state) => seen.push(state.readyReplicas),
      onObservationError: (message) => errors.push(message),
    });

    expect(outcome.status).toBe('succeeded');
    expect(seen).toEqual([1, 2, 2]);
    expect(errors).toEqual(['Invalid ready replica count: -1']);
  });

  it('breaks the streak on a failed observation', async () => {
    const { watcher } = watcherFor([2, new Error('connection refused'), 2, 2]);

    const outcome = await watcher.watch(workload, 2, 100, { intervalMs: 2 });

    expect(outcome.status).toBe('succeeded');
    expect(outcome.observations).toBe(4);
    expect(outcome.elapsedMs).toBe(6);
  });

  it('reports the last valid state on timeout', async () => {
    const { watcher } = watcherFor([1, new Error('connection refused')]);

    const outcome = await watcher.watch(workload, 2, 4, { intervalMs: 2 });

    expect(outcome.status).toBe('timed-out');
    expect(outcome.state).toEqual({
      desiredReplicas: 2,
      readyReplicas: 1,
      observedAt: new Date(0),
    });
  });

  it('stops polling as soon as the watch is aborted', async () => {
    const { cluster, watcher } = watcherFor([0]);
    const controller = new AbortController();
    clock.onSleep = (now) => {
      if (now >= 4) controller.abort();
    };

    const outcome = await watcher.watch(workload, 2, 100, {
      intervalMs: 2,
      signal: controller.signal,
    });

    expect(outcome.status).toBe('aborted');
    expect(cluster.requests).toHaveLength(3);
  });

  it('returns immediately when already aborted', async () => {
    const { cluster, watcher } = watcherFor([0]);
    const controller = new AbortController();
    controller.abort();

    const outcome = await watcher.watch(workload, 2, 100, { signal: controller.signal });

    expect(outcome.status).toBe('aborted');
    expect(cluster.requests).toHaveLength(0);
  });

  it('uses the configured interval by default', async () => {
    const { watcher } = watcherFor([0, 1, 1]);

    await watcher.watch(workload, 1, 100);

    expect(clock.sleeps).toEqual([TEST_SETTINGS.rolloutIntervalMs, TEST_SETTINGS.rolloutIntervalMs]);
  });
});
