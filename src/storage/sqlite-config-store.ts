/**
 * SQLite backed store for the registry snapshot
 */

import sqlite3 from 'sqlite3';
import { Database } from 'sqlite3';
import path from 'path';
import {
  ConfigStore,
  Logger,
  RegistrySnapshot,
  ResourceStatus,
  SampleStatus,
  TenantRecord
} from '../types';
import { PersistError, errorMessage } from '../error-handling';

export const DATABASE_FILE = 'watchdog.db';

const SCHEMA = [
  `CREATE TABLE IF NOT EXISTS settings (
    key TEXT PRIMARY KEY,
    value TEXT NOT NULL
  )`,
  `CREATE TABLE IF NOT EXISTS tenants (
    position INTEGER NOT NULL,
    id TEXT PRIMARY KEY,
    name TEXT NOT NULL,
    resource_name TEXT NOT NULL,
    resource_address TEXT NOT NULL,
    interval_ms INTEGER NOT NULL,
    timeout_ms INTEGER NOT NULL,
    required_consecutive INTEGER NOT NULL,
    notify_channel TEXT,
    notify_role TEXT,
    up_message TEXT NOT NULL,
    down_message TEXT NOT NULL,
    current_status TEXT NOT NULL,
    consecutive_count INTEGER NOT NULL,
    accumulating_status TEXT,
    last_status_change TEXT,
    status_message_id TEXT
  )`
];

const INSERT_TENANT = `
  INSERT INTO tenants (
    position, id, name, resource_name, resource_address, interval_ms, timeout_ms,
    required_consecutive, notify_channel, notify_role, up_message, down_message,
    current_status, consecutive_count, accumulating_status, last_status_change, status_message_id
  ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
`;

type SqlParam = string | number | null;

export class SqliteConfigStore implements ConfigStore {
  private db: Database | null = null;
  private dbPath: string;
  private logger: Logger;

  /**
   * @param location data directory, or `:memory:`
   */
  constructor(logger: Logger, location: string = './data') {
    this.logger = logger;
    this.dbPath = location === ':memory:' ? location : path.join(location, DATABASE_FILE);
  }

  /**
   * Open the database and create the tables
   */
  async initialize(): Promise<void> {
    await new Promise<void>((resolve, reject) => {
      const db = new sqlite3.Database(this.dbPath, err => {
        if (err) {
          this.logger.error('Failed to open database:', err.message);
          reject(new PersistError(`Failed to open database ${this.dbPath}`, err));
          return;
        }
        this.db = db;
        resolve();
      });
    });

    for (const statement of SCHEMA) {
      await this.run(statement);
    }
    this.logger.info(`Config store initialized at ${this.dbPath}`);
  }

  async load(): Promise<RegistrySnapshot | null> {
    try {
      const settingRows = await this.all('SELECT key, value FROM settings');
      if (settingRows.length === 0) {
        return null;
      }

      const settings = new Map<string, unknown>();
      for (const row of settingRows) {
        const columns = toColumns(row);
        const key = columns.get('key');
        const value = columns.get('value');
        if (typeof key === 'string' && typeof value === 'string') {
          settings.set(key, JSON.parse(value));
        }
      }

      const tenantRows = await this.all('SELECT * FROM tenants ORDER BY position');
      const masterId = settings.get('master_id');

      return {
        master_id: typeof masterId === 'string' ? masterId : null,
        max_tenants: requireNumber(settings.get('max_tenants'), 'max_tenants'),
        tick_interval_ms: requireNumber(settings.get('tick_interval_ms'), 'tick_interval_ms'),
        tenants: tenantRows.map(parseTenantRow)
      };
    } catch (error) {
      if (error instanceof PersistError) {
        throw error;
      }
      throw new PersistError(`Malformed saved data in ${this.dbPath}: ${errorMessage(error)}`, error);
    }
  }

  /**
   * Replace the stored snapshot in a single transaction
   */
  async save(snapshot: RegistrySnapshot): Promise<void> {
    await this.run('BEGIN TRANSACTION');
    try {
      await this.run('DELETE FROM settings');
      await this.run('DELETE FROM tenants');

      const settings: Array<[string, unknown]> = [
        ['master_id', snapshot.master_id],
        ['max_tenants', snapshot.max_tenants],
        ['tick_interval_ms', snapshot.tick_interval_ms]
      ];
      for (const [key, value] of settings) {
        await this.run('INSERT INTO settings (key, value) VALUES (?, ?)', [key, JSON.stringify(value)]);
      }

      for (const [position, tenant] of snapshot.tenants.entries()) {
        await this.run(INSERT_TENANT, [
          position,
          tenant.id,
          tenant.name,
          tenant.resource_name,
          tenant.resource_address,
          tenant.interval_ms,
          tenant.timeout_ms,
          tenant.required_consecutive,
          tenant.notify_channel,
          tenant.notify_role,
          tenant.message_templates.up,
          tenant.message_templates.down,
          tenant.current_status,
          tenant.consecutive_count,
          tenant.accumulating_status,
          tenant.last_status_change,
          tenant.status_message_id
        ]);
      }

      await this.run('COMMIT');
      this.logger.debug(`Saved ${snapshot.tenants.length} servers`);
    } catch (error) {
      await this.run('ROLLBACK').catch(rollbackError => {
        this.logger.error('Failed to roll back transaction:', rollbackError);
      });
      throw error instanceof PersistError ? error : new PersistError(`Failed to save registry: ${errorMessage(error)}`, error);
    }
  }

  async close(): Promise<void> {
    return new Promise((resolve, reject) => {
      if (!this.db) {
        resolve();
        return;
      }

      this.db.close(err => {
        if (err) {
          this.logger.error('Failed to close database:', err.message);
          reject(new PersistError('Failed to close database', err));
          return;
        }

        this.logger.info('Database connection closed');
        this.db = null;
        resolve();
      });
    });
  }

  private run(sql: string, params: SqlParam[] = []): Promise<void> {
    return new Promise((resolve, reject) => {
      if (!this.db) {
        reject(new PersistError('Database not initialized'));
        return;
      }
      this.db.run(sql, params, (err: Error | null) => {
        if (err) {
          reject(new PersistError(err.message, err));
          return;
        }
        resolve();
      });
    });
  }

  private all(sql: string, params: SqlParam[] = []): Promise<unknown[]> {
    return new Promise((resolve, reject) => {
      if (!this.db) {
        reject(new PersistError('Database not initialized'));
        return;
      }
      this.db.all(sql, params, (err: Error | null, rows: unknown[]) => {
        if (err) {
          reject(new PersistError(err.message, err));
          return;
        }
        resolve(rows);
      });
    });
  }
}

function toColumns(row: unknown): Map<string, unknown> {
  if (typeof row !== 'object' || row === null) {
    throw new Error('row is not an object');
  }
  return new Map<string, unknown>(Object.entries(row));
}

function parseTenantRow(row: unknown): TenantRecord {
  const columns = toColumns(row);
  const text = (key: string): string => {
    const value = columns.get(key);
    if (typeof value !== 'string') {
      throw new Error(`column ${key} is not text`);
    }
    return value;
  };
  const optionalText = (key: string): string | null => {
    const value = columns.get(key);
    return typeof value === 'string' ? value : null;
  };
  const int = (key: string): number => requireNumber(columns.get(key), key);

  const currentStatus = text('current_status');
  if (!isResourceStatus(currentStatus)) {
    throw new Error(`invalid status ${currentStatus}`);
  }
  const accumulating = optionalText('accumulating_status');

  return {
    id: text('id'),
    name: text('name'),
    resource_name: text('resource_name'),
    resource_address: text('resource_address'),
    interval_ms: int('interval_ms'),
    timeout_ms: int('timeout_ms'),
    required_consecutive: int('required_consecutive'),
    notify_channel: optionalText('notify_channel'),
    notify_role: optionalText('notify_role'),
    message_templates: { up: text('up_message'), down: text('down_message') },
    current_status: currentStatus,
    consecutive_count: int('consecutive_count'),
    accumulating_status: accumulating !== null && isSampleStatus(accumulating) ? accumulating : null,
    last_status_change: optionalText('last_status_change'),
    status_message_id: optionalText('status_message_id')
  };
}

function requireNumber(value: unknown, key: string): number {
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    throw new Error(`${key} is not a number`);
  }
  return value;
}

function isResourceStatus(value: string): value is ResourceStatus {
  return value === 'up' || value === 'down' || value === 'unknown';
}

function isSampleStatus(value: string): value is SampleStatus {
  return value === 'up' || value === 'down';
}
