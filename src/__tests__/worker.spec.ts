import { describe, expect, test, vi } from 'vitest';
import { DEVICE_RUNTIME_INIT_TASK, DeviceWorker, pickTask } from '../runner/worker.js';
import {
  DeviceIdentity,
  EngineHooks,
  OffloadCallOptions,
  OffloadClient,
  OffloadOutcome,
  OffloadSession,
  ScenarioDefinition,
  TaskCompletion,
  WorkloadDescriptor
} from '../types.js';

const SCENARIO: ScenarioDefinition = {
  name: 'unit',
  description: 'worker unit test',
  identityMode: 'random',
  baseRequirements: { ID: 'device', FLAVOUR: 'GlobalOptimizer' },
  waitTime: { minMs: 0, maxMs: 0 },
  tasks: [{ name: 'ping', weight: 1, parameters: { n: 1 } }]
};

interface HookHarness {
  readonly hooks: EngineHooks;
  readonly controller: AbortController;
  readonly completions: TaskCompletion[];
  readonly released: DeviceIdentity[];
}

function createHooks(stopAfter: number): HookHarness {
  const controller = new AbortController();
  const completions: TaskCompletion[] = [];
  const released: DeviceIdentity[] = [];
  const hooks: EngineHooks = {
    signal: controller.signal,
    acquireDevice: () => 'device-1',
    recordCompletion: async (_deviceId, completion) => {
      completions.push(completion);
      if (completions.length >= stopAfter) controller.abort();
      return true;
    },
    releaseDevice: (deviceId) => {
      released.push(deviceId);
    }
  };
  return { hooks, controller, completions, released };
}

const FALLBACK_OUTCOME: OffloadOutcome = { status: 'SUCCESS', latencyMs: 1 };

type CallHandler = (workload: WorkloadDescriptor, options: OffloadCallOptions) => Promise<OffloadOutcome>;

function createClient(calls: CallHandler[]) {
  const close = vi.fn(async () => undefined);
  const session: OffloadSession = {
    call: (workload, options = {}) => {
      const next = calls.shift();
      if (!next) return Promise.resolve(FALLBACK_OUTCOME);
      return next(workload, options);
    },
    close
  };
  const client: OffloadClient = { openSession: async () => session };
  return { client, close };
}

function steppingClock(step: number): () => number {
  let value = -step;
  return () => {
    value += step;
    return value;
  };
}

const noWait = async (_ms: number, signal?: AbortSignal): Promise<boolean> => !signal?.aborted;

describe('pickTask', () => {
  const tasks = [
    { name: 'light', weight: 1, parameters: {} },
    { name: 'heavy', weight: 3, parameters: {} }
  ];

  test('walks cumulative weights', () => {
    expect(pickTask(tasks, () => 0.2).name).toBe('light');
    expect(pickTask(tasks, () => 0.5).name).toBe('heavy');
    expect(pickTask(tasks, () => 0.999).name).toBe('heavy');
  });

  test('rejects an empty task list', () => {
    expect(() => pickTask([], () => 0)).toThrow('Cannot pick a task from an empty task list');
  });
});

describe('DeviceWorker', () => {
  test('records a transport error verbatim and keeps offloading', async () => {
    const { hooks, completions, released } = createHooks(3);
    const { client, close } = createClient([
      async () => {
        throw new Error('Connection reset by peer');
      },
      async () => ({ status: 'SUCCESS', latencyMs: 5 }),
      async () => ({ status: 'FAILURE', errorMessage: 'remote failed' })
    ]);

    await new DeviceWorker({ scenario: SCENARIO, client, hooks, sleep: noWait, now: steppingClock(4) }).run();

    const requirements = { ID: 'device-1', FLAVOUR: 'GlobalOptimizer' };
    expect(completions).toEqual([
      {
        deviceRequirements: requirements,
        taskName: 'ping',
        taskParameters: { n: 1 },
        latencyMs: 4,
        status: 'FAILURE',
        errorMessage: 'Connection reset by peer'
      },
      {
        deviceRequirements: requirements,
        taskName: 'ping',
        taskParameters: { n: 1 },
        latencyMs: 5,
        status: 'SUCCESS'
      },
      {
        deviceRequirements: requirements,
        taskName: 'ping',
        taskParameters: { n: 1 },
        latencyMs: 4,
        status: 'FAILURE',
        errorMessage: 'remote failed'
      }
    ]);
    expect(close).toHaveBeenCalledTimes(1);
    expect(released).toEqual(['device-1']);
  });

  test('substitutes measured latency and a readable message for blank outcomes', async () => {
    const { hooks, completions } = createHooks(3);
    const { client } = createClient([
      async () => ({ status: 'SUCCESS', latencyMs: Number.NaN }),
      async () => {
        throw new Error();
      },
      async () => ({ status: 'FAILURE', latencyMs: 2 })
    ]);

    await new DeviceWorker({ scenario: SCENARIO, client, hooks, sleep: noWait, now: steppingClock(4) }).run();

    expect(completions.map(({ latencyMs, status, errorMessage }) => ({ latencyMs, status, errorMessage }))).toEqual([
      { latencyMs: 4, status: 'SUCCESS', errorMessage: undefined },
      { latencyMs: 4, status: 'FAILURE', errorMessage: 'Offload of ping failed without an error message' },
      { latencyMs: 2, status: 'FAILURE', errorMessage: 'Remote execution of ping failed' }
    ]);
  });

  test('names the device when its runtime fails without a message', async () => {
    const { hooks, completions } = createHooks(10);
    const client: OffloadClient = {
      openSession: async () => {
        throw new Error('');
      }
    };

    await new DeviceWorker({ scenario: SCENARIO, client, hooks, sleep: noWait }).run();

    expect(completions.map((entry) => entry.errorMessage)).toEqual([
      'Device runtime for device-1 failed to initialise'
    ]);
  });

  test('records a runtime init failure and ends the device', async () => {
    const { hooks, completions, released } = createHooks(10);
    const client: OffloadClient = {
      openSession: async () => {
        throw new Error('runtime unavailable');
      }
    };

    await new DeviceWorker({ scenario: SCENARIO, client, hooks, sleep: noWait }).run();

    expect(completions).toEqual([
      {
        deviceRequirements: { ID: 'device-1', FLAVOUR: 'GlobalOptimizer' },
        taskName: DEVICE_RUNTIME_INIT_TASK,
        taskParameters: {},
        latencyMs: 0,
        status: 'FAILURE',
        errorMessage: 'runtime unavailable'
      }
    ]);
    expect(released).toEqual(['device-1']);
  });

  test('does not record a call cut short by the stop signal', async () => {
    const { hooks, controller, completions, released } = createHooks(10);
    const { client, close } = createClient([
      (_workload, options) =>
        new Promise((_resolve, reject) => {
          options.signal?.addEventListener('abort', () => reject(new Error('cancelled')), { once: true });
          setTimeout(() => controller.abort(), 5);
        })
    ]);

    await new DeviceWorker({ scenario: SCENARIO, client, hooks, sleep: noWait }).run();

    expect(completions).toEqual([]);
    expect(close).toHaveBeenCalledTimes(1);
    expect(released).toEqual(['device-1']);
  });

  test('waits a random initial delay before the first task', async () => {
    const { hooks } = createHooks(1);
    const { client } = createClient([]);
    const sleep = vi.fn(noWait);

    await new DeviceWorker({
      scenario: { ...SCENARIO, initialDelayMaxMs: 1_000, waitTime: { minMs: 200, maxMs: 400 } },
      client,
      hooks,
      sleep,
      random: () => 0.5
    }).run();

    expect(sleep.mock.calls.map(([ms]) => ms)).toEqual([500, 300]);
  });

  test('uses the pooled profile of its identity', async () => {
    const { hooks, completions } = createHooks(1);
    const openSession = vi.fn(createClient([]).client.openSession);
    const pooled = { ID: 'device-1', FLAVOUR: 'HighPerformance', IS_CONFIDENTIAL: false };

    await new DeviceWorker({
      scenario: { ...SCENARIO, identityMode: 'pool', devicePool: [pooled] },
      client: { openSession },
      hooks,
      sleep: noWait
    }).run();

    expect(openSession).toHaveBeenCalledWith('device-1', pooled);
    expect(completions[0].deviceRequirements).toEqual(pooled);
  });
});
