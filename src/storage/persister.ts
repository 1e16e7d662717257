/**
 * Saves registry snapshots one at a time
 */

import { ConfigStore, Persister } from '../types';
import { PersistError, errorMessage } from '../error-handling';
import { TenantRegistry } from '../registry/tenant-registry';
import { logger } from '../utils/logger';

export class SnapshotPersister implements Persister {
  private chain: Promise<void> = Promise.resolve();
  private saves = 0;
  private lastError: PersistError | null = null;
  private log = logger.child('Persister');

  constructor(private readonly store: ConfigStore, private readonly registry: TenantRegistry) {}

  /**
   * Snapshot the registry and save it after any save already queued.
   * Rejects with PersistError; in-memory state is unaffected.
   */
  persist(): Promise<void> {
    const next = this.chain.then(() => this.save());
    this.chain = next.catch(() => undefined);
    return next;
  }

  getStats(): { saves: number; last_error: string | null } {
    return { saves: this.saves, last_error: this.lastError ? this.lastError.message : null };
  }

  private async save(): Promise<void> {
    try {
      await this.store.save(this.registry.snapshot());
      this.saves++;
      this.lastError = null;
    } catch (error) {
      const persistError =
        error instanceof PersistError ? error : new PersistError(`Failed to save registry: ${errorMessage(error)}`, error);
      this.lastError = persistError;
      this.log.error(persistError.message);
      throw persistError;
    }
  }
}
