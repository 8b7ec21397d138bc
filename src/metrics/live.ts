import http from 'http';
import { Counter, Gauge, Histogram, Registry, collectDefaultMetrics } from 'prom-client';
import { logger } from '../utils/logger.js';
import { TaskStatus } from '../types.js';

const TASK_LATENCY_BUCKETS = [5, 10, 25, 50, 100, 250, 500, 1_000, 2_500, 5_000, 10_000];

export interface LiveMetricsOptions {
  /** 0 disables the HTTP exposition endpoint. */
  readonly promPort: number;
  readonly collectDefaults?: boolean;
}

export interface TaskObservation {
  readonly runId: string;
  readonly scenarioName: string;
  readonly taskName: string;
  readonly status: TaskStatus;
  readonly latencyMs: number;
}

export class LiveMetrics {
  private readonly registry = new Registry();
  private readonly tasks: Counter<'run_id' | 'scenario' | 'task' | 'status'>;
  private readonly latency: Histogram<'scenario' | 'task'>;
  private readonly activeDevices: Gauge<'scenario'>;
  private readonly writeFailures: Counter<string>;
  private server: http.Server | undefined;

  constructor(private readonly options: LiveMetricsOptions) {
    if (options.collectDefaults) {
      collectDefaultMetrics({ register: this.registry });
    }
    this.tasks = new Counter({
      name: 'loadtest_tasks_total',
      help: 'Offloaded task attempts by outcome',
      labelNames: ['run_id', 'scenario', 'task', 'status'],
      registers: [this.registry]
    });
    this.latency = new Histogram({
      name: 'loadtest_task_latency_ms',
      help: 'Offloaded task latency in milliseconds',
      labelNames: ['scenario', 'task'],
      buckets: TASK_LATENCY_BUCKETS,
      registers: [this.registry]
    });
    this.activeDevices = new Gauge({
      name: 'loadtest_active_devices',
      help: 'Simulated devices currently holding an identity',
      labelNames: ['scenario'],
      registers: [this.registry]
    });
    this.writeFailures = new Counter({
      name: 'loadtest_store_write_failures_total',
      help: 'Metric records the store could not persist',
      registers: [this.registry]
    });
  }

  async start(): Promise<void> {
    if (this.options.promPort <= 0 || this.server) return;
    const server = http.createServer((_req, res) => {
      this.registry
        .metrics()
        .then((body) => {
          res.setHeader('Content-Type', this.registry.contentType);
          res.end(body);
        })
        .catch((error: unknown) => {
          logger.error({ error }, 'Failed to render metrics');
          res.statusCode = 500;
          res.end();
        });
    });
    await new Promise<void>((resolve, reject) => {
      server.once('error', reject);
      server.listen(this.options.promPort, () => {
        server.off('error', reject);
        resolve();
      });
    });
    this.server = server;
    logger.info({ promPort: this.options.promPort }, 'Prometheus endpoint listening');
  }

  async stop(): Promise<void> {
    const server = this.server;
    if (!server) return;
    this.server = undefined;
    await new Promise<void>((resolve, reject) => {
      server.close((error) => (error ? reject(error) : resolve()));
    });
  }

  recordTask(observation: TaskObservation): void {
    this.tasks.inc({
      run_id: observation.runId,
      scenario: observation.scenarioName,
      task: observation.taskName,
      status: observation.status
    });
    if (Number.isFinite(observation.latencyMs)) {
      this.latency.observe(
        { scenario: observation.scenarioName, task: observation.taskName },
        observation.latencyMs
      );
    }
  }

  deviceStarted(scenarioName: string): void {
    this.activeDevices.inc({ scenario: scenarioName });
  }

  deviceStopped(scenarioName: string): void {
    this.activeDevices.dec({ scenario: scenarioName });
  }

  recordWriteFailure(): void {
    this.writeFailures.inc();
  }

  getRegister(): Registry {
    return this.registry;
  }
}
