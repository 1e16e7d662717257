/**
 * Registry owning every tenant record. Reads return frozen copies; writes go
 * through `mutate`, which is exclusive per tenant and publishes a draft only
 * after the caller's function has returned.
 */

import { EventEmitter } from 'events';
import { randomUUID } from 'crypto';
import {
  RegistrySnapshot,
  Tenant,
  TenantDefaults,
  TenantRecord,
  TenantRegistration
} from '../types';
import {
  AlreadyRegisteredError,
  CapacityExceededError,
  NotFoundError,
  PermissionDeniedError,
  ValidationError
} from '../error-handling';
import { clampCounter } from '../monitoring/debounce-evaluator';
import { KeyedLock } from '../utils/keyed-lock';
import { logger } from '../utils/logger';

export const DEFAULT_TENANT_NAME = 'Noname server';

export interface TenantRegistryOptions {
  defaults: TenantDefaults;
  maxTenants: number;
  tickIntervalMs: number;
  masterId?: string | null;
}

export class TenantRegistry extends EventEmitter {
  private tenants: Map<string, Tenant> = new Map();
  private lock = new KeyedLock();
  private defaults: TenantDefaults;
  private maxTenants: number;
  private tickIntervalMs: number;
  private masterId: string | null;
  private log = logger.child('Registry');

  constructor(options: TenantRegistryOptions) {
    super();
    this.defaults = cloneDefaults(options.defaults);
    this.maxTenants = options.maxTenants;
    this.tickIntervalMs = options.tickIntervalMs;
    this.masterId = options.masterId ?? null;
  }

  /**
   * Rebuild a registry from a persisted snapshot. Records are restored as
   * saved, without capacity checks.
   */
  static fromSnapshot(snapshot: RegistrySnapshot, defaults: TenantDefaults): TenantRegistry {
    const registry = new TenantRegistry({
      defaults,
      maxTenants: snapshot.max_tenants,
      tickIntervalMs: snapshot.tick_interval_ms,
      masterId: snapshot.master_id
    });

    for (const record of snapshot.tenants) {
      const tenant = fromRecord(record);
      clampCounter(tenant);
      registry.tenants.set(tenant.id, tenant);
    }

    return registry;
  }

  register(input: TenantRegistration): Readonly<Tenant> {
    const id = input.id ?? randomUUID();
    if (this.tenants.has(id)) {
      throw new AlreadyRegisteredError(id);
    }

    if (this.masterId === null) {
      this.masterId = id;
      this.log.info(`Server ${id} designated as master`);
    }

    if (id !== this.masterId && this.count() >= this.maxTenants) {
      throw new CapacityExceededError(this.count(), this.maxTenants);
    }

    const tenant = this.createTenant(id, input);
    this.tenants.set(id, tenant);
    this.log.info(`Registered server ${id} (${tenant.name})`);
    this.emit('tenant:registered', freeze(tenant));
    return freeze(tenant);
  }

  unregister(id: string): void {
    if (!this.tenants.has(id)) {
      throw new NotFoundError(id);
    }
    if (id === this.masterId) {
      throw new PermissionDeniedError('The master server cannot be removed', id);
    }

    this.tenants.delete(id);
    this.log.info(`Removed server ${id}`);
    this.emit('tenant:removed', id);
  }

  /**
   * Remove every tenant except the master. Returns how many were removed.
   */
  unregisterAll(): number {
    const removed = Array.from(this.tenants.keys()).filter(id => id !== this.masterId);
    removed.forEach(id => {
      this.tenants.delete(id);
      this.emit('tenant:removed', id);
    });

    if (removed.length > 0) {
      this.log.info(`Removed ${removed.length} servers`);
    }
    return removed.length;
  }

  /**
   * Drop every non-master tenant and rebuild the master from the given
   * defaults, keeping its identity and delivery target.
   */
  reset(defaults: TenantDefaults): void {
    this.defaults = cloneDefaults(defaults);
    this.unregisterAll();

    if (this.masterId === null) {
      return;
    }
    const master = this.tenants.get(this.masterId);
    if (master) {
      this.tenants.set(
        master.id,
        this.createTenant(master.id, {
          name: master.name,
          notify_channel: master.notify_channel,
          notify_role: master.notify_role
        })
      );
    }
    this.log.info('Registry reset to defaults');
  }

  get(id: string): Readonly<Tenant> | undefined {
    const tenant = this.tenants.get(id);
    return tenant ? freeze(tenant) : undefined;
  }

  has(id: string): boolean {
    return this.tenants.has(id);
  }

  /** All tenants in registration order. */
  list(): Readonly<Tenant>[] {
    return Array.from(this.tenants.values(), freeze);
  }

  /**
   * Read-modify-write one tenant. `f` receives a private draft; the draft is
   * normalized and published when `f` returns. Throws NotFoundError when the
   * tenant is unknown, or was removed or rebuilt before the draft was published.
   */
  async mutate<R>(id: string, f: (draft: Tenant) => R | Promise<R>): Promise<R> {
    return this.lock.run(id, async () => {
      const original = this.tenants.get(id);
      if (!original) {
        throw new NotFoundError(id);
      }

      const draft = cloneTenant(original);
      const result = await f(draft);

      if (this.tenants.get(id) !== original) {
        throw new NotFoundError(id);
      }
      if (!Number.isInteger(draft.required_consecutive) || draft.required_consecutive < 1) {
        throw new ValidationError('required_consecutive must be an integer of at least 1', [
          { field: 'required_consecutive', message: 'must be >= 1', value: draft.required_consecutive }
        ]);
      }

      draft.id = id;
      clampCounter(draft);
      this.tenants.set(id, draft);
      return result;
    });
  }

  isMaster(id: string | null): boolean {
    return id !== null && this.masterId === id;
  }

  getMasterId(): string | null {
    return this.masterId;
  }

  setMaster(id: string): void {
    if (!this.tenants.has(id)) {
      throw new NotFoundError(id);
    }
    this.masterId = id;
    this.log.info(`Server ${id} designated as master`);
  }

  getMaxTenants(): number {
    return this.maxTenants;
  }

  setMaxTenants(limit: number): void {
    this.maxTenants = limit;
  }

  /** Number of non-master tenants, the figure capacity applies to. */
  count(): number {
    let count = 0;
    for (const id of this.tenants.keys()) {
      if (id !== this.masterId) {
        count++;
      }
    }
    return count;
  }

  getTickIntervalMs(): number {
    return this.tickIntervalMs;
  }

  setTickIntervalMs(ms: number): void {
    this.tickIntervalMs = ms;
  }

  snapshot(): RegistrySnapshot {
    return {
      master_id: this.masterId,
      max_tenants: this.maxTenants,
      tick_interval_ms: this.tickIntervalMs,
      tenants: Array.from(this.tenants.values(), toRecord)
    };
  }

  private createTenant(id: string, input: TenantRegistration): Tenant {
    const defaults = this.defaults;
    return {
      id,
      name: input.name ?? DEFAULT_TENANT_NAME,
      resource_name: input.resource_name ?? defaults.resource_name,
      resource_address: input.resource_address ?? defaults.resource_address,
      interval_ms: input.interval_ms ?? defaults.interval_ms,
      timeout_ms: input.timeout_ms ?? defaults.timeout_ms,
      required_consecutive: input.required_consecutive ?? defaults.required_consecutive,
      message_templates: { ...(input.message_templates ?? defaults.message_templates) },
      notify_channel: input.notify_channel ?? null,
      notify_role: input.notify_role ?? null,
      current_status: 'unknown',
      consecutive_count: 0,
      accumulating_status: null,
      last_status_change: null,
      status_message_id: null
    };
  }
}

function cloneDefaults(defaults: TenantDefaults): TenantDefaults {
  return { ...defaults, message_templates: { ...defaults.message_templates } };
}

function cloneTenant(tenant: Tenant): Tenant {
  return {
    ...tenant,
    message_templates: { ...tenant.message_templates },
    last_status_change: tenant.last_status_change ? new Date(tenant.last_status_change.getTime()) : null
  };
}

function freeze(tenant: Tenant): Readonly<Tenant> {
  const copy = cloneTenant(tenant);
  Object.freeze(copy.message_templates);
  return Object.freeze(copy);
}

function toRecord(tenant: Tenant): TenantRecord {
  return {
    ...tenant,
    message_templates: { ...tenant.message_templates },
    last_status_change: tenant.last_status_change ? tenant.last_status_change.toISOString() : null
  };
}

function fromRecord(record: TenantRecord): Tenant {
  return {
    ...record,
    message_templates: { ...record.message_templates },
    last_status_change: record.last_status_change ? new Date(record.last_status_change) : null
  };
}
