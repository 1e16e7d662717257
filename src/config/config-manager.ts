/**
 * Configuration manager for the watchdog's JSON config file
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { EventEmitter } from 'events';
import { DefaultsConfig, ServerConfig, TenantDefaults, WatchdogConfig } from '../types';
import { FieldError, ValidationError } from '../error-handling';
import { DEFAULT_DOWN_MESSAGE, DEFAULT_UP_MESSAGE } from '../alerts/template';
import { LIMITS, isIntegerInRange, isStringInRange } from './limits';
import { Logger } from '../utils/logger';

export type ConfigValidationError = FieldError;

export const DEFAULT_CONFIG_PATH = './config.json';

type UnknownRecord = Record<string, unknown>;

export class ConfigManager extends EventEmitter {
  private logger: Logger;
  private configPath: string;
  private currentConfig: WatchdogConfig | null = null;

  constructor(configPath?: string) {
    super();
    this.logger = new Logger('ConfigManager');
    this.configPath = configPath || process.env.CONFIG_PATH || DEFAULT_CONFIG_PATH;
  }

  /**
   * Read and validate the config file, writing the defaults when it is missing
   */
  async loadConfig(): Promise<WatchdogConfig> {
    this.logger.info(`Loading configuration from ${this.configPath}`);

    if (!(await this.fileExists(this.configPath))) {
      this.logger.info('Config file not found, creating default configuration');
      const defaultConfig = this.getDefaultConfig();
      await this.saveConfig(defaultConfig);
      return defaultConfig;
    }

    const configData = await fs.readFile(this.configPath, 'utf-8');
    let parsedConfig: unknown;
    try {
      parsedConfig = JSON.parse(configData);
    } catch (error) {
      throw new ValidationError(
        `Malformed config data in ${this.configPath}: ${error instanceof Error ? error.message : String(error)}`,
        [],
        'ConfigManager'
      );
    }

    const validatedConfig = this.validateConfig(parsedConfig);
    this.currentConfig = validatedConfig;
    this.logger.info('Configuration loaded and validated successfully');
    return validatedConfig;
  }

  async saveConfig(config: WatchdogConfig): Promise<void> {
    const validatedConfig = this.validateConfig(config);

    await fs.mkdir(path.dirname(this.configPath), { recursive: true });
    await fs.writeFile(this.configPath, JSON.stringify(validatedConfig, null, 2), 'utf-8');

    this.currentConfig = validatedConfig;
    this.logger.info('Configuration saved successfully');
    this.emit('configChanged', validatedConfig);
  }

  getCurrentConfig(): WatchdogConfig | null {
    return this.currentConfig;
  }

  getConfigPath(): string {
    return this.configPath;
  }

  validateConfig(config: unknown): WatchdogConfig {
    if (!isRecord(config)) {
      throw new ValidationError('Configuration must be an object', [], 'ConfigManager');
    }

    const errors: ConfigValidationError[] = [];
    const fallback = this.getDefaultConfig();

    const masterServer = config.master_server ?? null;
    if (masterServer !== null && (typeof masterServer !== 'string' || masterServer.trim() === '')) {
      errors.push({ field: 'master_server', message: 'master_server must be a non-empty string or null', value: masterServer });
    }

    const maxServers = config.max_servers ?? fallback.max_servers;
    if (!isIntegerInRange(maxServers, LIMITS.maxServers)) {
      errors.push(rangeError('max_servers', LIMITS.maxServers, maxServers));
    }

    const tickInterval = config.tick_interval_seconds ?? fallback.tick_interval_seconds;
    if (!isIntegerInRange(tickInterval, LIMITS.tickIntervalSeconds)) {
      errors.push(rangeError('tick_interval_seconds', LIMITS.tickIntervalSeconds, tickInterval));
    }

    const queueCapacity = config.dispatch_queue_capacity ?? fallback.dispatch_queue_capacity;
    if (!isIntegerInRange(queueCapacity, LIMITS.queueCapacity)) {
      errors.push(rangeError('dispatch_queue_capacity', LIMITS.queueCapacity, queueCapacity));
    }

    const defaults = this.validateDefaults(config.defaults ?? fallback.defaults, errors);
    const servers = this.validateServers(config.servers ?? [], errors);

    if (errors.length > 0) {
      const message = errors.map(err => `${err.field}: ${err.message}`).join('; ');
      throw new ValidationError(`Configuration validation failed: ${message}`, errors, 'ConfigManager');
    }

    return {
      master_server: typeof masterServer === 'string' ? masterServer : null,
      max_servers: isIntegerInRange(maxServers, LIMITS.maxServers) ? maxServers : fallback.max_servers,
      tick_interval_seconds: isIntegerInRange(tickInterval, LIMITS.tickIntervalSeconds)
        ? tickInterval
        : fallback.tick_interval_seconds,
      dispatch_queue_capacity: isIntegerInRange(queueCapacity, LIMITS.queueCapacity)
        ? queueCapacity
        : fallback.dispatch_queue_capacity,
      defaults,
      servers
    };
  }

  getDefaultConfig(): WatchdogConfig {
    return {
      master_server: null,
      max_servers: 10,
      tick_interval_seconds: 10,
      dispatch_queue_capacity: 256,
      defaults: {
        resource_name: 'Example',
        resource_address: 'example.com',
        interval_seconds: 10,
        timeout_seconds: 5,
        required_attempts: 3,
        up_message: DEFAULT_UP_MESSAGE,
        down_message: DEFAULT_DOWN_MESSAGE
      },
      servers: []
    };
  }

  private validateDefaults(value: unknown, errors: ConfigValidationError[]): DefaultsConfig {
    const fallback = this.getDefaultConfig().defaults;
    if (!isRecord(value)) {
      errors.push({ field: 'defaults', message: 'defaults must be an object', value });
      return fallback;
    }

    const field = <T>(
      key: keyof DefaultsConfig,
      check: (candidate: unknown) => candidate is T,
      message: string,
      otherwise: T
    ): T => {
      const candidate = value[key] ?? otherwise;
      if (check(candidate)) {
        return candidate;
      }
      errors.push({ field: `defaults.${key}`, message, value: candidate });
      return otherwise;
    };

    return {
      resource_name: field(
        'resource_name',
        (v): v is string => isStringInRange(v, LIMITS.name),
        `resource_name must be 1 to ${LIMITS.name.max} characters`,
        fallback.resource_name
      ),
      resource_address: field(
        'resource_address',
        (v): v is string => isStringInRange(v, LIMITS.address),
        `resource_address must be 1 to ${LIMITS.address.max} characters`,
        fallback.resource_address
      ),
      interval_seconds: field(
        'interval_seconds',
        (v): v is number => isIntegerInRange(v, LIMITS.intervalSeconds),
        rangeMessage('interval_seconds', LIMITS.intervalSeconds),
        fallback.interval_seconds
      ),
      timeout_seconds: field(
        'timeout_seconds',
        (v): v is number => isIntegerInRange(v, LIMITS.timeoutSeconds),
        rangeMessage('timeout_seconds', LIMITS.timeoutSeconds),
        fallback.timeout_seconds
      ),
      required_attempts: field(
        'required_attempts',
        (v): v is number => isIntegerInRange(v, LIMITS.attempts),
        rangeMessage('required_attempts', LIMITS.attempts),
        fallback.required_attempts
      ),
      up_message: field(
        'up_message',
        (v): v is string => isStringInRange(v, LIMITS.message),
        `up_message must be 1 to ${LIMITS.message.max} characters`,
        fallback.up_message
      ),
      down_message: field(
        'down_message',
        (v): v is string => isStringInRange(v, LIMITS.message),
        `down_message must be 1 to ${LIMITS.message.max} characters`,
        fallback.down_message
      )
    };
  }

  private validateServers(value: unknown, errors: ConfigValidationError[]): ServerConfig[] {
    if (!Array.isArray(value)) {
      errors.push({ field: 'servers', message: 'servers must be an array', value });
      return [];
    }

    const servers: ServerConfig[] = [];
    const seen = new Set<string>();

    value.forEach((server: unknown, index: number) => {
      const prefix = `servers[${index}]`;
      if (!isRecord(server)) {
        errors.push({ field: prefix, message: 'server must be an object', value: server });
        return;
      }

      const { id, name, channel, role } = server;
      const serverErrors: ConfigValidationError[] = [];

      if (typeof id !== 'string' || id.trim() === '') {
        serverErrors.push({ field: `${prefix}.id`, message: 'id must be a non-empty string', value: id });
      } else if (seen.has(id)) {
        serverErrors.push({ field: `${prefix}.id`, message: 'id must be unique', value: id });
      }
      if (!isStringInRange(name, LIMITS.serverName)) {
        serverErrors.push({ field: `${prefix}.name`, message: `name must be 1 to ${LIMITS.serverName.max} characters`, value: name });
      }
      if (!isOptionalId(channel)) {
        serverErrors.push({ field: `${prefix}.channel`, message: 'channel must be a string or null', value: channel });
      }
      if (!isOptionalId(role)) {
        serverErrors.push({ field: `${prefix}.role`, message: 'role must be a string or null', value: role });
      }

      errors.push(...serverErrors);
      if (
        serverErrors.length === 0 &&
        typeof id === 'string' &&
        typeof name === 'string' &&
        isOptionalId(channel) &&
        isOptionalId(role)
      ) {
        seen.add(id);
        servers.push({ id, name, channel: channel ?? null, role: role ?? null });
      }
    });

    return servers;
  }

  private async fileExists(filePath: string): Promise<boolean> {
    try {
      await fs.access(filePath);
      return true;
    } catch {
      return false;
    }
  }
}

/**
 * Tenant settings in the registry's units
 */
export function toTenantDefaults(defaults: DefaultsConfig): TenantDefaults {
  return {
    resource_name: defaults.resource_name,
    resource_address: defaults.resource_address,
    interval_ms: defaults.interval_seconds * 1000,
    timeout_ms: defaults.timeout_seconds * 1000,
    required_consecutive: defaults.required_attempts,
    message_templates: { up: defaults.up_message, down: defaults.down_message }
  };
}

function isRecord(value: unknown): value is UnknownRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isOptionalId(value: unknown): value is string | null | undefined {
  return value === undefined || value === null || (typeof value === 'string' && value.trim() !== '');
}

function rangeMessage(field: string, range: { min: number; max: number }): string {
  return `${field} must be an integer between ${range.min} and ${range.max}`;
}

function rangeError(field: string, range: { min: number; max: number }, value: unknown): ConfigValidationError {
  return { field, message: rangeMessage(field, range), value };
}
