/**
 * Tenant, transition and snapshot types
 */

/** Confirmed status of a monitored resource. `unknown` only before the first confirmation. */
export type ResourceStatus = 'up' | 'down' | 'unknown';

/** Raw status a probe sample maps to. */
export type SampleStatus = Exclude<ResourceStatus, 'unknown'>;

export interface MessageTemplates {
  up: string;
  down: string;
}

/**
 * Settings a tenant starts with. Taken from the `defaults` block of the
 * configuration file.
 */
export interface TenantDefaults {
  resource_name: string;
  resource_address: string;
  interval_ms: number;
  timeout_ms: number;
  required_consecutive: number;
  message_templates: MessageTemplates;
}

export interface Tenant extends TenantDefaults {
  id: string;
  name: string;
  notify_channel: string | null;
  notify_role: string | null;
  current_status: ResourceStatus;
  consecutive_count: number;
  accumulating_status: SampleStatus | null;
  last_status_change: Date | null;
  status_message_id: string | null;
}

/** Fields accepted by `TenantRegistry.register`; anything omitted comes from the defaults. */
export interface TenantRegistration extends Partial<TenantDefaults> {
  id?: string;
  name?: string;
  notify_channel?: string | null;
  notify_role?: string | null;
}

export interface Transition {
  tenant_id: string;
  from: ResourceStatus;
  to: SampleStatus;
  at: Date;
}

/** Persisted form of a tenant: dates as ISO strings. */
export interface TenantRecord extends Omit<Tenant, 'last_status_change'> {
  last_status_change: string | null;
}

export interface RegistrySnapshot {
  master_id: string | null;
  max_tenants: number;
  tick_interval_ms: number;
  tenants: TenantRecord[];
}
