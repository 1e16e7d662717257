/**
 * Tests for SnapshotPersister
 */

import { SnapshotPersister } from './persister';
import { TenantRegistry } from '../registry/tenant-registry';
import { PersistError } from '../error-handling';
import { ConfigStore, RegistrySnapshot } from '../types';
import { TEST_DEFAULTS, deferred } from '../testing/fakes';

class MemoryStore implements ConfigStore {
  saved: RegistrySnapshot[] = [];
  failures: Error[] = [];
  gate: Promise<void> | null = null;

  async load(): Promise<RegistrySnapshot | null> {
    return this.saved[this.saved.length - 1] ?? null;
  }

  async save(snapshot: RegistrySnapshot): Promise<void> {
    if (this.gate) {
      await this.gate;
    }
    const failure = this.failures.shift();
    if (failure) {
      throw failure;
    }
    this.saved.push(snapshot);
  }
}

describe('SnapshotPersister', () => {
  let registry: TenantRegistry;
  let store: MemoryStore;
  let persister: SnapshotPersister;

  beforeEach(() => {
    registry = new TenantRegistry({ defaults: TEST_DEFAULTS, maxTenants: 3, tickIntervalMs: 1000 });
    registry.register({ id: 'master' });
    store = new MemoryStore();
    persister = new SnapshotPersister(store, registry);
  });

  it('should save the current registry snapshot', async () => {
    await persister.persist();

    expect(store.saved).toEqual([registry.snapshot()]);
    expect(persister.getStats()).toEqual({ saves: 1, last_error: null });
  });

  it('should run saves one at a time in call order', async () => {
    const gate = deferred<void>();
    store.gate = gate.promise;

    const first = persister.persist();
    registry.register({ id: 'guild-1' });
    const second = persister.persist();
    gate.resolve();
    await Promise.all([first, second]);

    expect(store.saved.map(snapshot => snapshot.tenants.length)).toEqual([2, 2]);
    expect(persister.getStats().saves).toBe(2);
  });

  it('should wrap store failures and keep accepting saves', async () => {
    store.failures.push(new Error('disk full'));

    await expect(persister.persist()).rejects.toThrow(PersistError);
    expect(persister.getStats()).toEqual({ saves: 0, last_error: 'Failed to save registry: disk full' });

    await persister.persist();
    expect(persister.getStats()).toEqual({ saves: 1, last_error: null });
  });
});
