import { describe, expect, test } from 'vitest';
import {
  allocatorOptionsFor,
  getScenario,
  listScenarios,
  resolveRequirements,
  validateScenario
} from '../scenarios/catalog.js';

describe('scenario catalog', () => {
  test('ships the five built-in scenarios, all valid', () => {
    expect(listScenarios().map((scenario) => scenario.name)).toEqual([
      'light_load',
      'heavy_load',
      'concurrent_stress',
      'device_pool',
      'energy_efficiency'
    ]);
    for (const scenario of listScenarios()) {
      expect(() => validateScenario(scenario)).not.toThrow();
    }
  });

  test('looks scenarios up case-insensitively', () => {
    expect(getScenario(' Heavy_Load ').tasks[0]).toEqual({
      name: 'matrix_multiplication',
      weight: 1,
      parameters: { size: 100, iterations: 5 }
    });
  });

  test('device_pool alternates flavours and spreads latitude', () => {
    const pool = getScenario('device_pool').devicePool ?? [];
    expect(pool).toHaveLength(10);
    expect(pool[0]).toMatchObject({
      ID: 'device-pool-01',
      FLAVOUR: 'GlobalOptimizer',
      GEOLOCATION: { latitude: 41.3951, longitude: 2.1734 }
    });
    expect(pool[1]).toMatchObject({ ID: 'device-pool-02', FLAVOUR: 'HighPerformance' });
    expect(pool[9].ID).toBe('device-pool-10');
  });

  test('derives allocator options from the identity mode', () => {
    expect(allocatorOptionsFor(getScenario('light_load'))).toEqual({ mode: 'random', baseId: 'device-light' });
    const energy = allocatorOptionsFor(getScenario('energy_efficiency'));
    expect(energy.mode).toBe('pool');
    expect(energy.pool?.[0]).toBe('edge-efficiency-001');
    expect(energy.pool).toHaveLength(10);
  });

  test('resolves requirements for pooled and generated identities', () => {
    const pooled = getScenario('device_pool');
    expect(resolveRequirements(pooled, 'device-pool-04').FLAVOUR).toBe('HighPerformance');

    const stress = getScenario('concurrent_stress');
    expect(resolveRequirements(stress, 'device-ICE-abc')).toEqual({
      ...stress.baseRequirements,
      ID: 'device-ICE-abc'
    });
  });

  test('rejects broken definitions', () => {
    const base = getScenario('light_load');
    expect(() => validateScenario({ ...base, tasks: [] })).toThrow('Scenario light_load defines no tasks');
    expect(() => validateScenario({ ...base, waitTime: { minMs: 5, maxMs: 1 } })).toThrow(
      'Scenario light_load has an invalid wait time range'
    );
    expect(() => validateScenario({ ...base, identityMode: 'pool' })).toThrow(
      'Scenario light_load uses pool mode without a device pool'
    );
  });
});
