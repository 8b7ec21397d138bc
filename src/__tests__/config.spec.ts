import path from 'path';
import { describe, expect, test } from 'vitest';
import { loadRunConfig, parseCliOptions } from '../config.js';
import { ConfigurationError } from '../errors.js';

describe('parseCliOptions', () => {
  test('accepts both --flag value and --flag=value', () => {
    expect(parseCliOptions(['--scenario', 'heavy_load', '--users=4', '--spawn-rate', '2.5', '--list-scenarios'])).toEqual({
      scenario: 'heavy_load',
      users: 4,
      spawnRate: 2.5,
      listScenarios: true
    });
  });

  test('rejects unknown flags and missing values', () => {
    expect(() => parseCliOptions(['--verbose'])).toThrow('Unknown option --verbose');
    expect(() => parseCliOptions(['--db'])).toThrow('Option --db requires a value');
    expect(() => parseCliOptions(['--users', 'many'])).toThrow(ConfigurationError);
  });
});

describe('loadRunConfig', () => {
  test('falls back to defaults', () => {
    const config = loadRunConfig([], {});
    expect(config.scenario.name).toBe('light_load');
    expect(config.users).toBe(1);
    expect(config.spawnRate).toBe(1);
    expect(config.runTimeMs).toBeUndefined();
    expect(config.dbPath).toBe(path.resolve('data/metrics.db'));
    expect(config.promPort).toBe(0);
    expect(config.logLevel).toBe('info');
    expect(config.writeRetries).toBe(2);
    expect(config.simulation).toEqual({ failureRate: 0, latency: { minMs: 20, maxMs: 120 }, seed: 1337 });
    expect(config.listScenarios).toBe(false);
  });

  test('defaults users to the pool size for pool scenarios', () => {
    expect(loadRunConfig(['--scenario', 'energy_efficiency'], {}).users).toBe(10);
  });

  test('lets flags override environment variables', () => {
    const config = loadRunConfig(['--users', '3', '--db', ':memory:', '--log-level', 'DEBUG'], {
      SCENARIO: 'concurrent_stress',
      USERS: '50',
      RUN_TIME_SEC: '30',
      METRICS_DB_PATH: '/tmp/ignored.db',
      PROM_PORT: '9464',
      SIM_FAILURE_RATE: '0.25',
      SIM_SEED: '99',
      RUN_ID: 'nightly-01'
    });
    expect(config.scenario.name).toBe('concurrent_stress');
    expect(config.users).toBe(3);
    expect(config.runTimeMs).toBe(30_000);
    expect(config.dbPath).toBe(':memory:');
    expect(config.promPort).toBe(9464);
    expect(config.logLevel).toBe('debug');
    expect(config.runId).toBe('nightly-01');
    expect(config.simulation.failureRate).toBe(0.25);
    expect(config.simulation.seed).toBe(99);
  });

  test('reports every invalid value at once', () => {
    expect(() =>
      loadRunConfig(['--users', '0'], { SIM_FAILURE_RATE: '2', LOG_LEVEL: 'loud' })
    ).toThrow(ConfigurationError);
    try {
      loadRunConfig(['--users', '0'], { SIM_FAILURE_RATE: '2', LOG_LEVEL: 'loud' });
    } catch (error) {
      const message = error instanceof Error ? error.message : '';
      expect(message).toMatch(/^Invalid run configuration: /);
      expect(message).toContain('users:');
      expect(message).toContain('logLevel:');
      expect(message).toContain('failureRate:');
    }
  });

  test('rejects an inverted simulated latency range and unknown scenarios', () => {
    expect(() => loadRunConfig([], { SIM_LATENCY_MIN_MS: '200', SIM_LATENCY_MAX_MS: '100' })).toThrow(
      'SIM_LATENCY_MAX_MS must not be below SIM_LATENCY_MIN_MS'
    );
    expect(() => loadRunConfig(['--scenario', 'nope'], {})).toThrow("Unknown scenario 'nope'");
  });
});
