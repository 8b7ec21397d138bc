import { randomUUID } from 'crypto';
import dayjs from 'dayjs';
import { InvalidRunStateError, PoolExhaustedError, errorMessage } from '../errors.js';
import { IdentityAllocator } from '../identity/allocator.js';
import { LiveMetrics } from '../metrics/live.js';
import { MetricStore } from '../store/metricStore.js';
import {
  DeviceIdentity,
  EngineHooks,
  MetricRecord,
  RunContext,
  RunReport,
  RunState,
  TaskCompletion
} from '../types.js';
import { logger } from '../utils/logger.js';

export type MetricRecorder = Pick<MetricStore, 'record' | 'flush'>;

export interface RunCoordinatorOptions {
  readonly allocator: IdentityAllocator;
  readonly store: MetricRecorder;
  readonly liveMetrics?: LiveMetrics;
  readonly clock?: () => Date;
  readonly generateRunId?: (startedAt: Date) => string;
}

export interface StartRunRequest {
  readonly scenarioName: string;
  readonly expectedWorkerCount: number;
  /** Overrides the generated run id, e.g. to resume labelling from the CLI. */
  readonly runId?: string;
}

interface RecordTally {
  attempted: number;
  written: number;
  failed: number;
}

export function generateRunId(startedAt: Date): string {
  return `run-${dayjs(startedAt).format('YYYYMMDD-HHmmss')}-${randomUUID().slice(0, 8)}`;
}

/**
 * Owns the lifecycle of one load-test run and exposes it to the engine as
 * `EngineHooks`.
 *
 * IDLE -> VALIDATING -> RUNNING -> DRAINING -> IDLE
 */
export class RunCoordinator implements EngineHooks {
  private state: RunState = 'IDLE';
  private context: RunContext | undefined;
  private controller = new AbortController();
  private tally: RecordTally = { attempted: 0, written: 0, failed: 0 };
  private readonly liveDevices = new Set<DeviceIdentity>();
  private readonly inFlight = new Set<Promise<boolean>>();
  private idleWaiters: Array<() => void> = [];
  private stopping: Promise<RunReport> | undefined;
  private readonly clock: () => Date;
  private readonly nextRunId: (startedAt: Date) => string;

  constructor(private readonly options: RunCoordinatorOptions) {
    this.clock = options.clock ?? (() => new Date());
    this.nextRunId = options.generateRunId ?? generateRunId;
  }

  get signal(): AbortSignal {
    return this.controller.signal;
  }

  getState(): RunState {
    return this.state;
  }

  liveDeviceCount(): number {
    return this.liveDevices.size;
  }

  startRun(request: StartRunRequest): RunContext {
    if (this.state !== 'IDLE') {
      throw new InvalidRunStateError('start a run', this.state);
    }
    this.state = 'VALIDATING';
    this.stopping = undefined;
    const startedAt = this.clock();
    const runId = request.runId ?? this.nextRunId(startedAt);
    try {
      this.options.allocator.validate(request.expectedWorkerCount);
    } catch (error) {
      this.state = 'IDLE';
      logger.error(
        { runId, scenario: request.scenarioName, error: errorMessage(error) },
        'Run configuration rejected'
      );
      throw error;
    }

    this.controller = new AbortController();
    this.tally = { attempted: 0, written: 0, failed: 0 };
    this.liveDevices.clear();
    this.context = {
      runId,
      scenarioName: request.scenarioName,
      expectedWorkerCount: request.expectedWorkerCount,
      startedAt: startedAt.toISOString()
    };
    this.state = 'RUNNING';
    logger.info(
      {
        runId,
        scenario: request.scenarioName,
        expectedWorkerCount: request.expectedWorkerCount,
        identityMode: this.options.allocator.getMode()
      },
      'Run started'
    );
    return this.context;
  }

  acquireDevice(): DeviceIdentity {
    const context = this.requireContext('acquire a device', ['RUNNING']);
    let deviceId: DeviceIdentity;
    try {
      deviceId = this.options.allocator.nextIdentity();
    } catch (error) {
      if (error instanceof PoolExhaustedError) {
        // validation guarantees one pooled identity per worker
        logger.error(
          { runId: context.runId, poolSize: error.poolSize, liveDevices: this.liveDevices.size },
          'Device pool exhausted after a successful validation'
        );
      }
      throw error;
    }
    this.liveDevices.add(deviceId);
    this.options.liveMetrics?.deviceStarted(context.scenarioName);
    logger.debug({ runId: context.runId, deviceId }, 'Device started');
    return deviceId;
  }

  recordCompletion(deviceId: DeviceIdentity, completion: TaskCompletion): Promise<boolean> {
    const context = this.context;
    if (!context || (this.state !== 'RUNNING' && this.state !== 'DRAINING')) {
      logger.warn({ deviceId, task: completion.taskName, state: this.state }, 'Completion outside of a run ignored');
      return Promise.resolve(false);
    }
    const record: MetricRecord = {
      runId: context.runId,
      timestamp: this.clock().toISOString(),
      scenarioName: context.scenarioName,
      deviceId,
      ...completion
    };
    const tally = this.tally;
    tally.attempted += 1;
    try {
      this.options.liveMetrics?.recordTask({
        runId: context.runId,
        scenarioName: context.scenarioName,
        taskName: completion.taskName,
        status: completion.status,
        latencyMs: completion.latencyMs
      });
    } catch (error) {
      logger.warn(
        { runId: context.runId, deviceId, task: completion.taskName, error: errorMessage(error) },
        'Live metrics update failed'
      );
    }

    const pending: Promise<boolean> = this.options.store.record(record).then(
      (written) => {
        if (written) {
          tally.written += 1;
        } else {
          tally.failed += 1;
        }
        this.inFlight.delete(pending);
        return written;
      },
      (error: unknown) => {
        tally.failed += 1;
        this.inFlight.delete(pending);
        logger.error({ runId: context.runId, deviceId, error: errorMessage(error) }, 'Metric recorder rejected');
        return false;
      }
    );
    this.inFlight.add(pending);
    return pending;
  }

  releaseDevice(deviceId: DeviceIdentity): void {
    if (!this.liveDevices.delete(deviceId)) {
      logger.warn({ deviceId }, 'Release of a device that is not live ignored');
      return;
    }
    if (this.context) {
      this.options.liveMetrics?.deviceStopped(this.context.scenarioName);
    }
    logger.debug({ runId: this.context?.runId, deviceId }, 'Device stopped');
    if (this.liveDevices.size === 0) {
      const waiters = this.idleWaiters;
      this.idleWaiters = [];
      waiters.forEach((resolve) => resolve());
    }
  }

  /**
   * Signals every worker to stop, waits for devices to be released and their
   * records to settle, then frees the pool for the next run. Records written
   * before the stop are kept. Calls made while the run drains, or after it
   * drained, share the same report.
   */
  stopRun(): Promise<RunReport> {
    if (this.stopping && (this.state === 'DRAINING' || this.state === 'IDLE')) {
      return this.stopping;
    }
    let context: RunContext;
    try {
      context = this.requireContext('stop the run', ['RUNNING']);
    } catch (error) {
      return Promise.reject(error);
    }
    this.state = 'DRAINING';
    this.stopping = this.drain(context);
    return this.stopping;
  }

  private async drain(context: RunContext): Promise<RunReport> {
    logger.info({ runId: context.runId, liveDevices: this.liveDevices.size }, 'Stopping run');
    this.controller.abort();

    await this.waitForDevices();
    await Promise.all([...this.inFlight]);
    await this.options.store.flush();
    this.options.allocator.reset();

    const report: RunReport = {
      context,
      stoppedAt: this.clock().toISOString(),
      recordsAttempted: this.tally.attempted,
      recordsWritten: this.tally.written,
      recordsFailed: this.tally.failed
    };
    this.context = undefined;
    this.state = 'IDLE';
    logger.info(
      {
        runId: context.runId,
        recordsAttempted: report.recordsAttempted,
        recordsWritten: report.recordsWritten,
        recordsFailed: report.recordsFailed
      },
      'Run stopped'
    );
    return report;
  }

  private waitForDevices(): Promise<void> {
    if (this.liveDevices.size === 0) return Promise.resolve();
    return new Promise((resolve) => {
      this.idleWaiters.push(resolve);
    });
  }

  private requireContext(operation: string, allowed: readonly RunState[]): RunContext {
    if (!this.context || !allowed.includes(this.state)) {
      throw new InvalidRunStateError(operation, this.state);
    }
    return this.context;
  }
}
