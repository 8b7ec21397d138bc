import { ConfigurationError, InvalidRunStateError, errorMessage } from '../errors.js';
import { IdentityAllocator } from '../identity/allocator.js';
import { allocatorOptionsFor, validateScenario } from '../scenarios/catalog.js';
import { OffloadClient, RunReport, ScenarioDefinition } from '../types.js';
import { logger } from '../utils/logger.js';
import { RandomSource } from '../utils/random.js';
import { sleep as abortableSleep } from '../utils/time.js';
import { RunCoordinator } from './coordinator.js';
import { DeviceWorker } from './worker.js';

export interface SwarmEngineOptions {
  readonly allocator: IdentityAllocator;
  readonly coordinator: RunCoordinator;
  readonly client: OffloadClient;
  readonly random?: RandomSource;
  readonly sleep?: (ms: number, signal?: AbortSignal) => Promise<boolean>;
}

export interface SwarmRunOptions {
  readonly users: number;
  /** Workers started per second. */
  readonly spawnRate: number;
  readonly runTimeMs?: number;
  readonly runId?: string;
}

function whenAborted(signal: AbortSignal): Promise<void> {
  if (signal.aborted) return Promise.resolve();
  return new Promise((resolve) => {
    signal.addEventListener('abort', () => resolve(), { once: true });
  });
}

/**
 * Minimal swarm-style load generator: ramps `users` device workers up at
 * `spawnRate` per second and keeps them offloading until stopped.
 */
export class SwarmEngine {
  private stopController: AbortController | undefined;
  private readonly sleep: (ms: number, signal?: AbortSignal) => Promise<boolean>;

  constructor(private readonly options: SwarmEngineOptions) {
    this.sleep = options.sleep ?? abortableSleep;
  }

  async run(scenario: ScenarioDefinition, runOptions: SwarmRunOptions): Promise<RunReport> {
    const { allocator, coordinator } = this.options;
    if (coordinator.getState() !== 'IDLE') {
      throw new InvalidRunStateError('start a run', coordinator.getState());
    }
    validateScenario(scenario);
    if (!(runOptions.spawnRate > 0)) {
      throw new ConfigurationError(`Spawn rate must be positive, received ${runOptions.spawnRate}`);
    }
    if (runOptions.runTimeMs !== undefined && !(runOptions.runTimeMs > 0)) {
      throw new ConfigurationError(`Run time must be positive, received ${runOptions.runTimeMs}ms`);
    }
    allocator.configure(allocatorOptionsFor(scenario));
    const context = coordinator.startRun({
      scenarioName: scenario.name,
      expectedWorkerCount: runOptions.users,
      runId: runOptions.runId
    });

    const stopController = new AbortController();
    this.stopController = stopController;
    const onCoordinatorStop = (): void => this.stop('run stopped by coordinator');
    coordinator.signal.addEventListener('abort', onCoordinatorStop, { once: true });
    const runTimer =
      runOptions.runTimeMs !== undefined
        ? setTimeout(() => this.stop('run time elapsed'), runOptions.runTimeMs)
        : undefined;

    const workers: Promise<void>[] = [];
    try {
      const spawnIntervalMs = 1_000 / runOptions.spawnRate;
      for (let index = 0; index < runOptions.users; index += 1) {
        if (stopController.signal.aborted) break;
        workers.push(this.startWorker(scenario));
        if (index < runOptions.users - 1 && !(await this.sleep(spawnIntervalMs, stopController.signal))) {
          break;
        }
      }
      logger.info({ runId: context.runId, spawned: workers.length }, 'Spawn complete');
      await Promise.race([Promise.all(workers), whenAborted(stopController.signal)]);
    } finally {
      if (runTimer) clearTimeout(runTimer);
      coordinator.signal.removeEventListener('abort', onCoordinatorStop);
      this.stopController = undefined;
    }

    const report = await coordinator.stopRun();
    await Promise.all(workers);
    return report;
  }

  /** Ends the current run; a no-op when nothing is running. */
  stop(reason = 'stop requested'): void {
    if (!this.stopController || this.stopController.signal.aborted) return;
    logger.info({ reason }, 'Stopping swarm');
    this.stopController.abort();
  }

  private startWorker(scenario: ScenarioDefinition): Promise<void> {
    const worker = new DeviceWorker({
      scenario,
      client: this.options.client,
      hooks: this.options.coordinator,
      random: this.options.random,
      sleep: this.options.sleep
    });
    return worker.run().catch((error: unknown) => {
      logger.error({ scenario: scenario.name, error: errorMessage(error) }, 'Device worker crashed');
    });
  }
}
