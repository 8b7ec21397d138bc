#!/usr/bin/env node
import 'dotenv/config';
import { loadRunConfig } from './config.js';
import { IdentityAllocator } from './identity/allocator.js';
import { LiveMetrics } from './metrics/live.js';
import { SimulatedOffloadClient } from './offload/simulated.js';
import { RunCoordinator } from './runner/coordinator.js';
import { SwarmEngine } from './runner/engine.js';
import { listScenarios } from './scenarios/catalog.js';
import { MetricStore } from './store/metricStore.js';
import { logger, setLogLevel } from './utils/logger.js';

async function main(): Promise<void> {
  const config = loadRunConfig();
  setLogLevel(config.logLevel);

  if (config.listScenarios) {
    for (const scenario of listScenarios()) {
      console.log(`${scenario.name.padEnd(20)} ${scenario.identityMode.padEnd(7)} ${scenario.description}`);
    }
    return;
  }

  const liveMetrics = new LiveMetrics({ promPort: config.promPort, collectDefaults: true });
  const store = MetricStore.open(config.dbPath, {
    writeRetries: config.writeRetries,
    onWriteError: () => liveMetrics.recordWriteFailure()
  });
  const allocator = new IdentityAllocator();
  const coordinator = new RunCoordinator({ allocator, store, liveMetrics });
  const engine = new SwarmEngine({
    allocator,
    coordinator,
    client: new SimulatedOffloadClient({
      latency: config.simulation.latency,
      failureRate: config.simulation.failureRate,
      seed: config.simulation.seed
    })
  });

  const onSignal = (signal: NodeJS.Signals): void => engine.stop(signal);
  process.once('SIGINT', onSignal);
  process.once('SIGTERM', onSignal);

  try {
    await liveMetrics.start();
    logger.info(
      {
        scenario: config.scenario.name,
        users: config.users,
        spawnRate: config.spawnRate,
        runTimeMs: config.runTimeMs,
        dbPath: config.dbPath
      },
      'loadtest.starting'
    );
    const report = await engine.run(config.scenario, {
      users: config.users,
      spawnRate: config.spawnRate,
      runTimeMs: config.runTimeMs,
      runId: config.runId
    });
    for (const row of store.summarize({ runId: report.context.runId })) {
      logger.info(
        {
          runId: row.runId,
          scenario: row.scenarioName,
          requests: row.totalRequests,
          devices: row.deviceCount,
          avgLatencyMs: Number(row.avgLatencyMs.toFixed(2)),
          successRatePct: Number(row.successRatePct.toFixed(2))
        },
        'loadtest.summary'
      );
    }
    logger.info(
      {
        runId: report.context.runId,
        startedAt: report.context.startedAt,
        stoppedAt: report.stoppedAt,
        recordsWritten: report.recordsWritten,
        recordsFailed: report.recordsFailed
      },
      'loadtest.completed'
    );
  } finally {
    process.off('SIGINT', onSignal);
    process.off('SIGTERM', onSignal);
    await store.close();
    await liveMetrics.stop();
  }
}

main().catch((error: unknown) => {
  const detail = error instanceof Error ? error.stack ?? error.message : String(error);
  logger.error({ detail }, 'loadtest.failed');
  process.exit(1);
});
