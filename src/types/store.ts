import { RegistrySnapshot } from './tenant';

export interface ConfigStore {
  load(): Promise<RegistrySnapshot | null>;
  save(snapshot: RegistrySnapshot): Promise<void>;
  close?(): Promise<void>;
}

/** Writes the current registry state to the store. Rejects with PersistError. */
export interface Persister {
  persist(): Promise<void>;
}
