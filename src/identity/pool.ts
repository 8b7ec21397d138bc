import { ConfigurationError, PoolExhaustedError } from '../errors.js';
import { DeviceIdentity } from '../types.js';

interface PoolEntry {
  readonly identity: DeviceIdentity;
  checkedOut: boolean;
}

/**
 * Fixed, ordered set of reusable device identities.
 *
 * `checkout` runs to completion without yielding to the event loop, so the
 * scan-and-flag below is the critical section: two workers racing at run start
 * can never claim the same entry.
 */
export class IdentityPool {
  private entries: PoolEntry[] = [];
  private checkedOutCount = 0;

  constructor(identities?: readonly DeviceIdentity[]) {
    if (identities) {
      this.seed(identities);
    }
  }

  seed(identities: readonly DeviceIdentity[]): void {
    if (this.checkedOutCount > 0) {
      throw new ConfigurationError('Cannot reseed the device pool while identities are checked out');
    }
    if (identities.length === 0) {
      throw new ConfigurationError('Device pool must contain at least one identity');
    }
    const seen = new Set<DeviceIdentity>();
    for (const identity of identities) {
      if (!identity || identity.trim().length === 0) {
        throw new ConfigurationError('Device pool identities must be non-empty strings');
      }
      if (seen.has(identity)) {
        throw new ConfigurationError(`Duplicate device identity in pool: ${identity}`);
      }
      seen.add(identity);
    }
    this.entries = identities.map((identity) => ({ identity, checkedOut: false }));
  }

  checkout(): DeviceIdentity {
    for (const entry of this.entries) {
      if (!entry.checkedOut) {
        entry.checkedOut = true;
        this.checkedOutCount += 1;
        return entry.identity;
      }
    }
    throw new PoolExhaustedError(this.entries.length);
  }

  releaseAll(): void {
    for (const entry of this.entries) {
      entry.checkedOut = false;
    }
    this.checkedOutCount = 0;
  }

  size(): number {
    return this.entries.length;
  }

  available(): number {
    return this.entries.length - this.checkedOutCount;
  }

  identities(): DeviceIdentity[] {
    return this.entries.map((entry) => entry.identity);
  }
}
