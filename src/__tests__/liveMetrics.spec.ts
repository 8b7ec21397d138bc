import { describe, expect, test } from 'vitest';
import { IdentityAllocator } from '../identity/allocator.js';
import { LiveMetrics } from '../metrics/live.js';
import { RunCoordinator } from '../runner/coordinator.js';
import { MetricStore } from '../store/metricStore.js';

async function metricValues(metrics: LiveMetrics, name: string) {
  const snapshot = await metrics.getRegister().getMetricsAsJSON();
  return snapshot.find((metric) => metric.name === name)?.values ?? [];
}

describe('LiveMetrics', () => {
  test('labels task counters with run, scenario, task and status', async () => {
    const metrics = new LiveMetrics({ promPort: 0 });
    metrics.recordTask({
      runId: 'run-1',
      scenarioName: 'light_load',
      taskName: 'light_computation',
      status: 'FAILURE',
      latencyMs: 40
    });

    const values = await metricValues(metrics, 'loadtest_tasks_total');
    expect(values).toHaveLength(1);
    expect(values[0].labels).toEqual({
      run_id: 'run-1',
      scenario: 'light_load',
      task: 'light_computation',
      status: 'FAILURE'
    });
    expect(values[0].value).toBe(1);
  });

  test('tracks active devices and store write failures through the coordinator', async () => {
    const metrics = new LiveMetrics({ promPort: 0 });
    const store = MetricStore.open(':memory:', { onWriteError: () => metrics.recordWriteFailure() });
    const coordinator = new RunCoordinator({
      allocator: new IdentityAllocator({ mode: 'random', baseId: 'device' }),
      store,
      liveMetrics: metrics
    });
    coordinator.startRun({ scenarioName: 'light_load', expectedWorkerCount: 2 });
    const first = coordinator.acquireDevice();
    coordinator.acquireDevice();
    coordinator.releaseDevice(first);

    const active = await metricValues(metrics, 'loadtest_active_devices');
    expect(active.map((value) => value.value)).toEqual([1]);

    await store.close();
    await store.record({
      runId: 'run-1',
      timestamp: '2026-01-05T10:00:00.000Z',
      scenarioName: 'light_load',
      deviceId: first,
      deviceRequirements: {},
      taskName: 'light_computation',
      taskParameters: {},
      latencyMs: 1,
      status: 'SUCCESS'
    });
    const failures = await metricValues(metrics, 'loadtest_store_write_failures_total');
    expect(failures.map((value) => value.value)).toEqual([1]);
  });

  test('start and stop are no-ops when the port is disabled', async () => {
    const metrics = new LiveMetrics({ promPort: 0 });
    await expect(metrics.start()).resolves.toBeUndefined();
    await expect(metrics.stop()).resolves.toBeUndefined();
  });
});
