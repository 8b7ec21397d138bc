import { randomBytes } from 'crypto';
import { ConfigurationError, WorkerCountMismatchError } from '../errors.js';
import { DeviceIdentity, IdentityMode } from '../types.js';
import { IdentityPool } from './pool.js';

export interface AllocatorOptions {
  readonly mode: IdentityMode;
  readonly baseId: string;
  readonly pool?: readonly DeviceIdentity[];
}

const RANDOM_SUFFIX_BYTES = 16;
const MAX_GENERATION_ATTEMPTS = 5;

export function generateRandomIdentity(baseId: string): DeviceIdentity {
  return `${baseId}-${randomBytes(RANDOM_SUFFIX_BYTES).toString('hex')}`;
}

/**
 * Hands out device identities, either freshly generated (`random`) or checked
 * out of a fixed pool (`pool`).
 */
export class IdentityAllocator {
  private mode: IdentityMode = 'random';
  private baseId = 'device';
  private pool: IdentityPool | undefined;
  private readonly issued = new Set<DeviceIdentity>();

  constructor(
    options?: AllocatorOptions,
    private readonly generate: (baseId: string) => DeviceIdentity = generateRandomIdentity
  ) {
    if (options) {
      this.configure(options);
    }
  }

  configure(options: AllocatorOptions): void {
    if (!options.baseId || options.baseId.trim().length === 0) {
      throw new ConfigurationError('Allocator base id must be a non-empty string');
    }
    if (options.mode === 'pool') {
      if (!options.pool || options.pool.length === 0) {
        throw new ConfigurationError('Pool mode requires a non-empty device pool');
      }
      this.pool = new IdentityPool(options.pool);
    } else {
      this.pool = undefined;
    }
    this.mode = options.mode;
    this.baseId = options.baseId;
    this.issued.clear();
  }

  getMode(): IdentityMode {
    return this.mode;
  }

  poolSize(): number | undefined {
    return this.pool?.size();
  }

  validate(expectedWorkerCount: number): void {
    if (!Number.isInteger(expectedWorkerCount) || expectedWorkerCount <= 0) {
      throw new ConfigurationError(
        `Expected worker count must be a positive integer, received ${expectedWorkerCount}`
      );
    }
    if (this.pool && this.pool.size() !== expectedWorkerCount) {
      throw new WorkerCountMismatchError(this.pool.size(), expectedWorkerCount);
    }
  }

  nextIdentity(): DeviceIdentity {
    if (this.pool) {
      return this.pool.checkout();
    }
    // 128 random bits make a repeat unreachable in practice; the set only
    // guards against a broken generator.
    for (let attempt = 0; attempt < MAX_GENERATION_ATTEMPTS; attempt += 1) {
      const identity = this.generate(this.baseId);
      if (!this.issued.has(identity)) {
        this.issued.add(identity);
        return identity;
      }
    }
    throw new ConfigurationError(
      `Identity generator repeated an issued identity ${MAX_GENERATION_ATTEMPTS} times for base '${this.baseId}'`
    );
  }

  reset(): void {
    this.pool?.releaseAll();
    this.issued.clear();
  }
}
