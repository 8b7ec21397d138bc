export type DeviceIdentity = string;

export type IdentityMode = 'random' | 'pool';

export type TaskStatus = 'SUCCESS' | 'FAILURE';

export type RunState = 'IDLE' | 'VALIDATING' | 'RUNNING' | 'DRAINING';

export type JsonValue =
  | string
  | number
  | boolean
  | null
  | readonly JsonValue[]
  | { readonly [key: string]: JsonValue | undefined };

export type JsonObject = { readonly [key: string]: JsonValue | undefined };

export type GeoLocation = {
  readonly latitude: number;
  readonly longitude: number;
};

/**
 * Hardware profile a simulated device announces when it opens its offload
 * session. Extra keys are carried through to the store untouched.
 */
export interface DeviceRequirements {
  readonly ID: DeviceIdentity;
  readonly FLAVOUR: string;
  readonly IS_CONFIDENTIAL?: boolean;
  readonly PROVIDERS?: readonly string[];
  readonly GEOLOCATION?: GeoLocation;
  readonly [key: string]: JsonValue | undefined;
}

export interface MetricRecord {
  readonly runId: string;
  /** ISO-8601 timestamp taken when the task attempt completed. */
  readonly timestamp: string;
  readonly scenarioName: string;
  readonly deviceId: DeviceIdentity;
  readonly deviceRequirements: JsonObject;
  readonly taskName: string;
  readonly taskParameters: JsonObject;
  readonly latencyMs: number;
  readonly status: TaskStatus;
  readonly errorMessage?: string;
  readonly metricValue?: number;
}

export interface TimeRange {
  readonly from?: string | Date;
  readonly to?: string | Date;
}

export interface MetricQueryFilters {
  readonly runId?: string;
  readonly scenarioName?: string;
  readonly deviceId?: DeviceIdentity;
  readonly timeRange?: TimeRange;
}

export interface RunSummaryRow {
  readonly runId: string;
  readonly scenarioName: string;
  readonly totalRequests: number;
  readonly deviceCount: number;
  readonly avgLatencyMs: number;
  readonly successCount: number;
  readonly successRatePct: number;
}

export interface StoreStats {
  readonly pending: number;
  readonly written: number;
  readonly failed: number;
}

export interface RunContext {
  readonly runId: string;
  readonly scenarioName: string;
  readonly expectedWorkerCount: number;
  readonly startedAt: string;
}

export interface RunReport {
  readonly context: RunContext;
  readonly stoppedAt: string;
  readonly recordsAttempted: number;
  readonly recordsWritten: number;
  readonly recordsFailed: number;
}

/** Outcome of one task attempt as reported by a worker. */
export interface TaskCompletion {
  readonly deviceRequirements: JsonObject;
  readonly taskName: string;
  readonly taskParameters: JsonObject;
  readonly latencyMs: number;
  readonly status: TaskStatus;
  readonly errorMessage?: string;
  readonly metricValue?: number;
}

export interface WorkloadDescriptor {
  readonly name: string;
  readonly parameters: JsonObject;
}

export interface OffloadCallOptions {
  readonly signal?: AbortSignal;
  readonly timeoutMs?: number;
}

export interface OffloadOutcome {
  /** Remote-side latency; the worker measures wall time when omitted. */
  readonly latencyMs?: number;
  readonly status: TaskStatus;
  readonly errorMessage?: string;
  readonly metricValue?: number;
}

export interface OffloadSession {
  call(workload: WorkloadDescriptor, options?: OffloadCallOptions): Promise<OffloadOutcome>;
  close(): Promise<void>;
}

export interface OffloadClient {
  openSession(deviceId: DeviceIdentity, requirements: DeviceRequirements): Promise<OffloadSession>;
}

export interface WaitTimeRange {
  readonly minMs: number;
  readonly maxMs: number;
}

export interface TaskDefinition {
  readonly name: string;
  readonly weight: number;
  readonly parameters: JsonObject;
  readonly timeoutMs?: number;
}

export interface ScenarioDefinition {
  readonly name: string;
  readonly description: string;
  readonly identityMode: IdentityMode;
  /** Base profile; in random mode its ID is the prefix of every generated identity. */
  readonly baseRequirements: DeviceRequirements;
  /** Pooled device profiles, required in pool mode. */
  readonly devicePool?: readonly DeviceRequirements[];
  readonly waitTime: WaitTimeRange;
  readonly initialDelayMaxMs?: number;
  readonly tasks: readonly TaskDefinition[];
}

/**
 * Lifecycle hooks a load-generation engine drives. Hooks may run concurrently,
 * one call chain per simulated device.
 */
export interface EngineHooks {
  readonly signal: AbortSignal;
  acquireDevice(): DeviceIdentity;
  recordCompletion(deviceId: DeviceIdentity, completion: TaskCompletion): Promise<boolean>;
  releaseDevice(deviceId: DeviceIdentity): void;
}
