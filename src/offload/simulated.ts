import { RemoteExecutionFailure } from '../errors.js';
import {
  DeviceIdentity,
  DeviceRequirements,
  OffloadCallOptions,
  OffloadClient,
  OffloadOutcome,
  OffloadSession,
  WaitTimeRange,
  WorkloadDescriptor
} from '../types.js';
import { RandomSource, createSeededRandom, hashStringToSeed, uniformBetween } from '../utils/random.js';
import { sleep as abortableSleep } from '../utils/time.js';

export interface SimulatedOffloadOptions {
  readonly latency?: WaitTimeRange;
  /** Share of calls that complete with a FAILURE status. */
  readonly failureRate?: number;
  /** Share of calls that throw a transport-level error instead of returning. */
  readonly transportErrorRate?: number;
  /** Share of devices whose session cannot be opened. */
  readonly sessionFailureRate?: number;
  readonly seed?: number;
  readonly sleep?: (ms: number, signal?: AbortSignal) => Promise<boolean>;
}

const DEFAULT_LATENCY: WaitTimeRange = { minMs: 20, maxMs: 120 };
const DEFAULT_SEED = 1_337;

/**
 * In-process stand-in for the remote offload runtime. Each device draws from
 * its own seeded stream so outcomes do not depend on worker interleaving.
 */
export class SimulatedOffloadClient implements OffloadClient {
  private readonly latency: WaitTimeRange;
  private readonly failureRate: number;
  private readonly transportErrorRate: number;
  private readonly sessionFailureRate: number;
  private readonly seed: number;
  private readonly sleep: (ms: number, signal?: AbortSignal) => Promise<boolean>;
  private openSessions = 0;

  constructor(options: SimulatedOffloadOptions = {}) {
    this.latency = options.latency ?? DEFAULT_LATENCY;
    this.failureRate = clampRate(options.failureRate ?? 0, 'failureRate');
    this.transportErrorRate = clampRate(options.transportErrorRate ?? 0, 'transportErrorRate');
    this.sessionFailureRate = clampRate(options.sessionFailureRate ?? 0, 'sessionFailureRate');
    this.seed = options.seed ?? DEFAULT_SEED;
    this.sleep = options.sleep ?? abortableSleep;
    if (this.latency.minMs < 0 || this.latency.maxMs < this.latency.minMs) {
      throw new Error(`Invalid simulated latency range ${this.latency.minMs}..${this.latency.maxMs}ms`);
    }
  }

  async openSession(deviceId: DeviceIdentity, _requirements: DeviceRequirements): Promise<OffloadSession> {
    const random = createSeededRandom(hashStringToSeed(`${this.seed}:${deviceId}`));
    if (random() < this.sessionFailureRate) {
      throw new RemoteExecutionFailure(`Failed to initialize device runtime for ${deviceId}`);
    }
    this.openSessions += 1;
    return new SimulatedSession(this, random);
  }

  activeSessions(): number {
    return this.openSessions;
  }

  /** @internal */
  async execute(
    random: RandomSource,
    workload: WorkloadDescriptor,
    options: OffloadCallOptions
  ): Promise<OffloadOutcome> {
    const latencyMs = Math.round(uniformBetween(random, this.latency.minMs, this.latency.maxMs));
    const roll = random();
    const effectiveLatency =
      options.timeoutMs !== undefined ? Math.min(latencyMs, options.timeoutMs) : latencyMs;
    const completed = await this.sleep(effectiveLatency, options.signal);
    if (!completed) {
      throw new RemoteExecutionFailure(`Offload of ${workload.name} cancelled`);
    }
    if (options.timeoutMs !== undefined && latencyMs > options.timeoutMs) {
      throw new RemoteExecutionFailure(`Offload of ${workload.name} timed out after ${options.timeoutMs}ms`);
    }
    if (roll < this.transportErrorRate) {
      throw new RemoteExecutionFailure(`Connection reset while offloading ${workload.name}`);
    }
    if (roll < this.transportErrorRate + this.failureRate) {
      return {
        latencyMs,
        status: 'FAILURE',
        errorMessage: `Remote execution of ${workload.name} returned an error`
      };
    }
    return { latencyMs, status: 'SUCCESS' };
  }

  /** @internal */
  sessionClosed(): void {
    this.openSessions = Math.max(0, this.openSessions - 1);
  }
}

class SimulatedSession implements OffloadSession {
  private closed = false;

  constructor(
    private readonly client: SimulatedOffloadClient,
    private readonly random: RandomSource
  ) {}

  call(workload: WorkloadDescriptor, options: OffloadCallOptions = {}): Promise<OffloadOutcome> {
    if (this.closed) {
      return Promise.reject(new RemoteExecutionFailure('Device runtime session is closed'));
    }
    return this.client.execute(this.random, workload, options);
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    this.client.sessionClosed();
  }
}

function clampRate(value: number, label: string): number {
  if (!Number.isFinite(value) || value < 0 || value > 1) {
    throw new Error(`${label} must be within [0, 1], received ${value}`);
  }
  return value;
}
