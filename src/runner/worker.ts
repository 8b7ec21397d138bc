import { performance } from 'perf_hooks';
import { ConfigurationError, errorMessage } from '../errors.js';
import { resolveRequirements } from '../scenarios/catalog.js';
import {
  DeviceIdentity,
  DeviceRequirements,
  EngineHooks,
  OffloadClient,
  OffloadSession,
  ScenarioDefinition,
  TaskCompletion,
  TaskDefinition
} from '../types.js';
import { logger } from '../utils/logger.js';
import { RandomSource, uniformBetween } from '../utils/random.js';
import { sleep as abortableSleep } from '../utils/time.js';

export const DEVICE_RUNTIME_INIT_TASK = 'device_runtime_init';

export interface DeviceWorkerOptions {
  readonly scenario: ScenarioDefinition;
  readonly client: OffloadClient;
  readonly hooks: EngineHooks;
  readonly random?: RandomSource;
  readonly sleep?: (ms: number, signal?: AbortSignal) => Promise<boolean>;
  readonly now?: () => number;
}

export function pickTask(tasks: readonly TaskDefinition[], random: RandomSource): TaskDefinition {
  if (tasks.length === 0) {
    throw new ConfigurationError('Cannot pick a task from an empty task list');
  }
  const total = tasks.reduce((sum, task) => sum + task.weight, 0);
  let threshold = random() * total;
  for (const task of tasks) {
    threshold -= task.weight;
    if (threshold < 0) return task;
  }
  return tasks[tasks.length - 1];
}

/**
 * One simulated device: holds an identity for its whole lifetime and offloads
 * tasks until the run's stop signal fires.
 */
export class DeviceWorker {
  private readonly random: RandomSource;
  private readonly sleep: (ms: number, signal?: AbortSignal) => Promise<boolean>;
  private readonly now: () => number;

  constructor(private readonly options: DeviceWorkerOptions) {
    this.random = options.random ?? Math.random;
    this.sleep = options.sleep ?? abortableSleep;
    this.now = options.now ?? (() => performance.now());
  }

  async run(): Promise<void> {
    const { hooks, scenario, client } = this.options;
    const deviceId = hooks.acquireDevice();
    try {
      const requirements = resolveRequirements(scenario, deviceId);
      let session: OffloadSession;
      try {
        session = await client.openSession(deviceId, requirements);
      } catch (error) {
        const message = errorMessage(error) || `Device runtime for ${deviceId} failed to initialise`;
        logger.error({ deviceId, error: message }, 'Device runtime failed to initialise');
        await hooks.recordCompletion(deviceId, {
          deviceRequirements: requirements,
          taskName: DEVICE_RUNTIME_INIT_TASK,
          taskParameters: {},
          latencyMs: 0,
          status: 'FAILURE',
          errorMessage: message
        });
        return;
      }
      try {
        await this.loop(deviceId, requirements, session);
      } finally {
        await this.closeSession(deviceId, session);
      }
    } finally {
      hooks.releaseDevice(deviceId);
    }
  }

  private async loop(
    deviceId: DeviceIdentity,
    requirements: DeviceRequirements,
    session: OffloadSession
  ): Promise<void> {
    const { hooks, scenario } = this.options;
    const { signal } = hooks;

    if (scenario.initialDelayMaxMs && scenario.initialDelayMaxMs > 0) {
      const delayMs = uniformBetween(this.random, 0, scenario.initialDelayMaxMs);
      if (!(await this.sleep(delayMs, signal))) return;
    }

    while (!signal.aborted) {
      const task = pickTask(scenario.tasks, this.random);
      const completion = await this.attempt(requirements, session, task);
      if (!completion) break;
      await hooks.recordCompletion(deviceId, completion);
      const waitMs = uniformBetween(this.random, scenario.waitTime.minMs, scenario.waitTime.maxMs);
      if (!(await this.sleep(waitMs, signal))) break;
    }
  }

  /** Resolves `undefined` when the call was cut short by the stop signal. */
  private async attempt(
    requirements: DeviceRequirements,
    session: OffloadSession,
    task: TaskDefinition
  ): Promise<TaskCompletion | undefined> {
    const { signal } = this.options.hooks;
    const started = this.now();
    const base = {
      deviceRequirements: requirements,
      taskName: task.name,
      taskParameters: task.parameters
    };
    try {
      const outcome = await session.call(
        { name: task.name, parameters: task.parameters },
        { signal, timeoutMs: task.timeoutMs }
      );
      const reported = outcome.latencyMs;
      return {
        ...base,
        latencyMs: reported !== undefined && Number.isFinite(reported) ? reported : this.now() - started,
        status: outcome.status,
        errorMessage:
          outcome.status === 'FAILURE' && !outcome.errorMessage
            ? `Remote execution of ${task.name} failed`
            : outcome.errorMessage,
        metricValue: outcome.metricValue
      };
    } catch (error) {
      if (signal.aborted) return undefined;
      const message = errorMessage(error) || `Offload of ${task.name} failed without an error message`;
      logger.warn({ deviceId: requirements.ID, task: task.name, error: message }, 'Offload call failed');
      return {
        ...base,
        latencyMs: this.now() - started,
        status: 'FAILURE',
        errorMessage: message
      };
    }
  }

  private async closeSession(deviceId: DeviceIdentity, session: OffloadSession): Promise<void> {
    try {
      await session.close();
    } catch (error) {
      logger.warn({ deviceId, error: errorMessage(error) }, 'Failed to close device runtime session');
    }
  }
}
