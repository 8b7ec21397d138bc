import { ConfigurationError } from '../errors.js';
import { AllocatorOptions } from '../identity/allocator.js';
import { DeviceIdentity, DeviceRequirements, ScenarioDefinition } from '../types.js';

function buildDevicePool(
  count: number,
  build: (index: number) => DeviceRequirements
): DeviceRequirements[] {
  return Array.from({ length: count }, (_, offset) => build(offset + 1));
}

const DEVICE_POOL_SIZE = 10;

const BUILTIN_SCENARIOS: Record<string, ScenarioDefinition> = {
  light_load: {
    name: 'light_load',
    description: 'Low frequency, small computations; baseline latency',
    identityMode: 'random',
    baseRequirements: {
      ID: 'device-light',
      FLAVOUR: 'GlobalOptimizer',
      IS_CONFIDENTIAL: false,
      PROVIDERS: ['provider_1'],
      GEOLOCATION: { latitude: 41.3851, longitude: 2.1734 }
    },
    waitTime: { minMs: 3_000, maxMs: 5_000 },
    tasks: [{ name: 'light_computation', weight: 1, parameters: { duration: 1 } }]
  },
  heavy_load: {
    name: 'heavy_load',
    description: 'Back-to-back matrix multiplications with no think time',
    identityMode: 'random',
    baseRequirements: {
      ID: 'device-high-load',
      FLAVOUR: 'GlobalOptimizer',
      PROVIDERS: ['provider_1'],
      GEOLOCATION: { latitude: 59.3294, longitude: 18.0687 }
    },
    waitTime: { minMs: 0, maxMs: 0 },
    tasks: [{ name: 'matrix_multiplication', weight: 1, parameters: { size: 100, iterations: 5 } }]
  },
  concurrent_stress: {
    name: 'concurrent_stress',
    description: 'Confidential devices offloading a one-second CPU stress',
    identityMode: 'random',
    baseRequirements: {
      ID: 'device-ICE',
      FLAVOUR: 'GlobalOptimizer',
      IS_CONFIDENTIAL: true,
      PROVIDERS: ['provider_1'],
      GEOLOCATION: { latitude: 52.2294, longitude: 21.0113 }
    },
    waitTime: { minMs: 1_000, maxMs: 3_000 },
    tasks: [{ name: 'stress', weight: 1, parameters: { duration: 1 } }]
  },
  device_pool: {
    name: 'device_pool',
    description: 'Fixed device ids so per-device history can be compared across runs',
    identityMode: 'pool',
    baseRequirements: {
      ID: 'device-pool-default',
      FLAVOUR: 'GlobalOptimizer',
      IS_CONFIDENTIAL: false,
      PROVIDERS: ['provider_1'],
      GEOLOCATION: { latitude: 41.3851, longitude: 2.1734 }
    },
    // odd devices optimise globally, even ones ask for high performance
    devicePool: buildDevicePool(DEVICE_POOL_SIZE, (index) => ({
      ID: `device-pool-${String(index).padStart(2, '0')}`,
      FLAVOUR: index % 2 !== 0 ? 'GlobalOptimizer' : 'HighPerformance',
      IS_CONFIDENTIAL: false,
      PROVIDERS: ['provider_1'],
      GEOLOCATION: {
        latitude: Number((41.3851 + index * 0.01).toFixed(4)),
        longitude: 2.1734
      }
    })),
    waitTime: { minMs: 2_000, maxMs: 4_000 },
    tasks: [{ name: 'compute_metrics', weight: 1, parameters: { duration: 2 } }]
  },
  energy_efficiency: {
    name: 'energy_efficiency',
    description: 'Pooled devices running controlled CPU load for power measurements',
    identityMode: 'pool',
    baseRequirements: {
      ID: 'edge-efficiency-default',
      FLAVOUR: 'GlobalOptimizer',
      PROVIDERS: ['ICE'],
      GEOLOCATION: { latitude: 42.2294, longitude: 12.0687 }
    },
    devicePool: buildDevicePool(DEVICE_POOL_SIZE, (index) => ({
      ID: `edge-efficiency-${String(index).padStart(3, '0')}`,
      FLAVOUR: 'GlobalOptimizer',
      PROVIDERS: ['ICE'],
      GEOLOCATION: { latitude: 42.2294, longitude: 12.0687 }
    })),
    waitTime: { minMs: 10_000, maxMs: 20_000 },
    initialDelayMaxMs: 5_000,
    tasks: [
      {
        name: 'stress_ng_cpu',
        weight: 1,
        parameters: { duration: 500, cpuLoad: 50, workers: 0 }
      }
    ]
  }
};

export function listScenarios(): ScenarioDefinition[] {
  return Object.values(BUILTIN_SCENARIOS);
}

export function getScenario(name: string): ScenarioDefinition {
  const scenario = BUILTIN_SCENARIOS[name.trim().toLowerCase()];
  if (!scenario) {
    throw new ConfigurationError(
      `Unknown scenario '${name}'. Available: ${Object.keys(BUILTIN_SCENARIOS).join(', ')}`
    );
  }
  return scenario;
}

export function allocatorOptionsFor(scenario: ScenarioDefinition): AllocatorOptions {
  if (scenario.identityMode === 'pool') {
    return {
      mode: 'pool',
      baseId: scenario.baseRequirements.ID,
      pool: (scenario.devicePool ?? []).map((profile) => profile.ID)
    };
  }
  return { mode: 'random', baseId: scenario.baseRequirements.ID };
}

/**
 * Pooled devices announce their own profile; every other device reuses the
 * scenario's base profile under its allocated id.
 */
export function resolveRequirements(
  scenario: ScenarioDefinition,
  deviceId: DeviceIdentity
): DeviceRequirements {
  const pooled = scenario.devicePool?.find((profile) => profile.ID === deviceId);
  if (pooled) return pooled;
  return { ...scenario.baseRequirements, ID: deviceId };
}

export function validateScenario(scenario: ScenarioDefinition): void {
  if (scenario.tasks.length === 0) {
    throw new ConfigurationError(`Scenario ${scenario.name} defines no tasks`);
  }
  if (scenario.tasks.some((task) => !(task.weight > 0))) {
    throw new ConfigurationError(`Scenario ${scenario.name} has a task with a non-positive weight`);
  }
  if (scenario.waitTime.minMs < 0 || scenario.waitTime.maxMs < scenario.waitTime.minMs) {
    throw new ConfigurationError(`Scenario ${scenario.name} has an invalid wait time range`);
  }
  if (scenario.identityMode === 'pool' && (scenario.devicePool?.length ?? 0) === 0) {
    throw new ConfigurationError(`Scenario ${scenario.name} uses pool mode without a device pool`);
  }
}
