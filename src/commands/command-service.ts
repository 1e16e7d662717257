/**
 * Transport neutral command handlers: permission checks, parameter
 * validation, registry mutation and persistence
 */

import { MessageTemplates, Persister, Prober, RegistrySnapshot, SampleStatus, Tenant } from '../types';
import {
  ErrorHandler,
  NotFoundError,
  PermissionDeniedError,
  PersistError,
  SystemHealth,
  ValidationError
} from '../error-handling';
import { DEFAULT_TENANT_NAME, TenantRegistry } from '../registry/tenant-registry';
import { ConfigManager, toTenantDefaults } from '../config/config-manager';
import { LIMITS, Range, isIntegerInRange, isStringInRange } from '../config/limits';
import { LoopStatus, ScheduleLoop } from '../monitoring/schedule-loop';
import { DispatchSink, DispatchStats } from '../alerts/dispatch-sink';
import { REPOSITORY_URL, VERSION } from '../version';
import { logger } from '../utils/logger';

export interface CommandContext {
  /** Server the command was issued from, null outside any server */
  tenantId: string | null;
  /** Who issued the command, for the audit log */
  actor: string;
}

export interface CommandResult<T = undefined> {
  message: string;
  warning?: string;
  data?: T;
}

export interface ServerSummary {
  id: string;
  name: string;
  master: boolean;
}

export interface ServerView {
  id: string;
  name: string;
  resource_name: string;
  resource_address: string;
  interval_seconds: number;
  timeout_seconds: number;
  required_attempts: number;
  channel: string | null;
  role: string | null;
  messages: MessageTemplates;
  status: Tenant['current_status'];
  since: string | null;
}

export interface BotInfo {
  version: string;
  repository: string;
  running_since: string;
  uptime_seconds: number;
}

export interface DebugData {
  snapshot: RegistrySnapshot;
  loop: LoopStatus | null;
  dispatch: DispatchStats | null;
  health: SystemHealth | null;
}

export interface CommandServiceOptions {
  registry: TenantRegistry;
  prober: Prober;
  persister: Persister;
  configManager: ConfigManager;
  loop?: ScheduleLoop;
  sink?: DispatchSink;
  errorHandler?: ErrorHandler;
  startedAt?: Date;
}

const ID_PATTERN = /^[A-Za-z0-9_-]{1,64}$/;

export class CommandService {
  private readonly registry: TenantRegistry;
  private readonly prober: Prober;
  private readonly persister: Persister;
  private readonly configManager: ConfigManager;
  private readonly loop: ScheduleLoop | undefined;
  private readonly sink: DispatchSink | undefined;
  private readonly errorHandler: ErrorHandler | undefined;
  private readonly startedAt: Date;
  private log = logger.child('Commands');

  constructor(options: CommandServiceOptions) {
    this.registry = options.registry;
    this.prober = options.prober;
    this.persister = options.persister;
    this.configManager = options.configManager;
    this.loop = options.loop;
    this.sink = options.sink;
    this.errorHandler = options.errorHandler;
    this.startedAt = options.startedAt ?? new Date();
  }

  // Server registry

  async register(ctx: CommandContext, name?: string): Promise<CommandResult<ServerView>> {
    const id = this.requireTenantId(ctx);
    const serverName = name === undefined ? DEFAULT_TENANT_NAME : this.requireString('name', name, LIMITS.serverName);

    const tenant = this.registry.register({ id, name: serverName });
    this.log.info(`User ${ctx.actor} registered server ${serverName} (${id})`);
    return this.persisted(`Registered ${serverName}!`, toView(tenant));
  }

  async setLimit(ctx: CommandContext, limit: number): Promise<CommandResult> {
    this.requireMaster(ctx);
    const value = this.requireInteger('limit', limit, LIMITS.maxServers);

    this.registry.setMaxTenants(value);
    this.log.info(`User ${ctx.actor} changed servers limit to ${value}`);
    return this.persisted(`Changed servers limit to ${value}!`);
  }

  listServers(ctx: CommandContext): CommandResult<ServerSummary[]> {
    this.requireMaster(ctx);
    const servers = this.registry.list().map(tenant => ({
      id: tenant.id,
      name: tenant.name,
      master: this.registry.isMaster(tenant.id)
    }));
    return {
      message: `${servers.length} registered servers (limit ${this.registry.getMaxTenants()} besides the master)`,
      data: servers
    };
  }

  async removeServer(ctx: CommandContext, id: string): Promise<CommandResult> {
    this.requireMaster(ctx);
    const tenant = this.registry.get(id);
    if (!tenant) {
      throw new NotFoundError(id);
    }

    this.registry.unregister(id);
    this.log.info(`User ${ctx.actor} removed server ${tenant.name} (${id})`);
    return this.persisted(`Removed ${tenant.name} (${id}) from the registry!`);
  }

  async removeAllServers(ctx: CommandContext): Promise<CommandResult<number>> {
    this.requireMaster(ctx);
    const removed = this.registry.unregisterAll();
    this.log.info(`User ${ctx.actor} removed all ${removed} servers`);
    return this.persisted(`Removed ${removed} servers, the master server is kept.`, removed);
  }

  // Per server configuration

  getServer(ctx: CommandContext): CommandResult<ServerView> {
    const tenant = this.requireTenant(ctx);
    return { message: `${tenant.resource_name} is ${tenant.current_status}`, data: toView(tenant) };
  }

  async setName(ctx: CommandContext, name: string): Promise<CommandResult> {
    const id = this.requireTenant(ctx).id;
    const value = this.requireString('name', name, LIMITS.name);

    await this.registry.mutate(id, draft => {
      draft.resource_name = value;
    });
    this.log.info(`User ${ctx.actor} renamed the resource of server ${id} to ${value}`);
    return this.persisted(`Changed resource name to ${value}!`);
  }

  async setAddress(ctx: CommandContext, address: string): Promise<CommandResult> {
    const id = this.requireTenant(ctx).id;
    const value = this.requireString('address', address, LIMITS.address).trim();

    let resolved: string;
    try {
      resolved = await this.prober.resolve(value);
    } catch (error) {
      throw new ValidationError(`Address ${value} can not be resolved`, [
        { field: 'address', message: error instanceof Error ? error.message : String(error), value }
      ]);
    }

    await this.registry.mutate(id, draft => {
      draft.resource_address = value;
    });
    this.log.info(`User ${ctx.actor} changed the address of server ${id} to ${value} (${resolved})`);
    return this.persisted(`Changed resource address to ${value} (${resolved})!`);
  }

  async setInterval(ctx: CommandContext, seconds: number): Promise<CommandResult> {
    const id = this.requireTenant(ctx).id;
    const value = this.requireInteger('interval', seconds, LIMITS.intervalSeconds);

    await this.registry.mutate(id, draft => {
      draft.interval_ms = value * 1000;
    });
    this.log.info(`User ${ctx.actor} changed the interval of server ${id} to ${value}s`);
    return this.persisted(`Changed interval between attempts to ${value} seconds!`);
  }

  async setTimeout(ctx: CommandContext, seconds: number): Promise<CommandResult> {
    const id = this.requireTenant(ctx).id;
    const value = this.requireInteger('timeout', seconds, LIMITS.timeoutSeconds);

    await this.registry.mutate(id, draft => {
      draft.timeout_ms = value * 1000;
    });
    this.log.info(`User ${ctx.actor} changed the timeout of server ${id} to ${value}s`);
    return this.persisted(`Changed timeout to ${value} seconds!`);
  }

  async setAttempts(ctx: CommandContext, attempts: number): Promise<CommandResult> {
    const id = this.requireTenant(ctx).id;
    const value = this.requireInteger('attempts', attempts, LIMITS.attempts);

    await this.registry.mutate(id, draft => {
      draft.required_consecutive = value;
    });
    this.log.info(`User ${ctx.actor} changed the required attempts of server ${id} to ${value}`);
    return this.persisted(`Changed required consecutive attempts to ${value}!`);
  }

  async setChannel(ctx: CommandContext, channel: string): Promise<CommandResult> {
    const id = this.requireTenant(ctx).id;
    const value = this.requireId('channel', channel);

    await this.registry.mutate(id, draft => {
      if (draft.notify_channel !== value) {
        // the old status message lives in the old channel
        draft.status_message_id = null;
      }
      draft.notify_channel = value;
    });
    this.log.info(`User ${ctx.actor} changed the channel of server ${id} to ${value}`);
    return this.persisted(`Changed notification channel to ${value}!`);
  }

  async setRole(ctx: CommandContext, role: string | null): Promise<CommandResult> {
    const id = this.requireTenant(ctx).id;
    const value = role === null ? null : this.requireId('role', role);

    await this.registry.mutate(id, draft => {
      draft.notify_role = value;
    });
    this.log.info(`User ${ctx.actor} changed the role of server ${id} to ${value ?? 'none'}`);
    return this.persisted(value === null ? 'Removed the notification role!' : `Changed notification role to ${value}!`);
  }

  async setMessage(ctx: CommandContext, status: SampleStatus, text: string): Promise<CommandResult> {
    const id = this.requireTenant(ctx).id;
    if (status !== 'up' && status !== 'down') {
      throw new ValidationError(`Unknown message status ${String(status)}`, [
        { field: 'status', message: 'status must be up or down', value: status }
      ]);
    }
    const value = this.requireString('message', text, LIMITS.message);

    await this.registry.mutate(id, draft => {
      draft.message_templates[status] = value;
    });
    this.log.info(`User ${ctx.actor} changed the ${status} message of server ${id}`);
    return this.persisted(`Changed ${status} message!`);
  }

  // Global settings

  async reset(ctx: CommandContext): Promise<CommandResult> {
    this.requireMaster(ctx);
    this.log.info(`User ${ctx.actor} reset configuration to defaults`);

    const config = await this.configManager.loadConfig();
    this.registry.reset(toTenantDefaults(config.defaults));
    this.registry.setMaxTenants(config.max_servers);
    this.applyTickInterval(config.tick_interval_seconds * 1000);

    return this.persisted(`Reset configuration to ${this.configManager.getConfigPath()} defaults!`);
  }

  async setTickInterval(ctx: CommandContext, seconds: number): Promise<CommandResult> {
    this.requireMaster(ctx);
    const value = this.requireInteger('tick_interval', seconds, LIMITS.tickIntervalSeconds);

    this.applyTickInterval(value * 1000);
    this.log.info(`User ${ctx.actor} changed the tick interval to ${value}s`);
    return this.persisted(`Changed tick interval to ${value} seconds!`);
  }

  // Diagnostics

  info(): CommandResult<BotInfo> {
    const uptimeSeconds = Math.floor((Date.now() - this.startedAt.getTime()) / 1000);
    return {
      message: `Resource watchdog v${VERSION}, running since ${this.startedAt.toISOString()}`,
      data: {
        version: VERSION,
        repository: REPOSITORY_URL,
        running_since: this.startedAt.toISOString(),
        uptime_seconds: uptimeSeconds
      }
    };
  }

  debugData(ctx: CommandContext): CommandResult<DebugData> {
    this.requireMaster(ctx);
    this.log.info(`User ${ctx.actor} requested debug data`);
    return {
      message: 'Debug data',
      data: {
        snapshot: this.registry.snapshot(),
        loop: this.loop ? this.loop.getStatus() : null,
        dispatch: this.sink ? this.sink.getStats() : null,
        health: this.errorHandler ? this.errorHandler.getSystemHealth() : null
      }
    };
  }

  private applyTickInterval(ms: number): void {
    if (this.loop) {
      this.loop.setTickInterval(ms);
    } else {
      this.registry.setTickIntervalMs(ms);
    }
  }

  /**
   * Save the registry; a failed save is reported as a warning, the change stays applied
   */
  private async persisted<T = undefined>(message: string, data?: T): Promise<CommandResult<T>> {
    const result: CommandResult<T> = data === undefined ? { message } : { message, data };
    try {
      await this.persister.persist();
    } catch (error) {
      if (!(error instanceof PersistError)) {
        throw error;
      }
      this.errorHandler?.report(error);
      result.warning = `The change is active but could not be saved: ${error.message}`;
    }
    return result;
  }

  private requireTenantId(ctx: CommandContext): string {
    if (ctx.tenantId === null) {
      throw new PermissionDeniedError('This command can only be used in a server');
    }
    return ctx.tenantId;
  }

  private requireTenant(ctx: CommandContext): Readonly<Tenant> {
    const id = this.requireTenantId(ctx);
    const tenant = this.registry.get(id);
    if (!tenant) {
      throw new NotFoundError(id);
    }
    return tenant;
  }

  private requireMaster(ctx: CommandContext): void {
    if (!this.registry.isMaster(ctx.tenantId)) {
      throw new PermissionDeniedError(
        'This command can only be executed in the master server',
        ctx.tenantId ?? undefined
      );
    }
  }

  private requireString(field: string, value: unknown, range: Range): string {
    if (!isStringInRange(value, range)) {
      throw new ValidationError(`${field} must be ${range.min} to ${range.max} characters long`, [
        { field, message: `length must be between ${range.min} and ${range.max}`, value }
      ]);
    }
    return value;
  }

  private requireInteger(field: string, value: unknown, range: Range): number {
    if (!isIntegerInRange(value, range)) {
      throw new ValidationError(`${field} must be an integer between ${range.min} and ${range.max}`, [
        { field, message: `must be between ${range.min} and ${range.max}`, value }
      ]);
    }
    return value;
  }

  private requireId(field: string, value: unknown): string {
    if (typeof value !== 'string' || !ID_PATTERN.test(value)) {
      throw new ValidationError(`${field} must be a valid id`, [
        { field, message: 'must be 1 to 64 letters, digits, dashes or underscores', value }
      ]);
    }
    return value;
  }
}

export function toView(tenant: Readonly<Tenant>): ServerView {
  return {
    id: tenant.id,
    name: tenant.name,
    resource_name: tenant.resource_name,
    resource_address: tenant.resource_address,
    interval_seconds: tenant.interval_ms / 1000,
    timeout_seconds: tenant.timeout_ms / 1000,
    required_attempts: tenant.required_consecutive,
    channel: tenant.notify_channel,
    role: tenant.notify_role,
    messages: { ...tenant.message_templates },
    status: tenant.current_status,
    since: tenant.last_status_change ? tenant.last_status_change.toISOString() : null
  };
}
