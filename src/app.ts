/**
 * Main application class wiring the watchdog components together
 */

import { ConfigStore, EnvironmentConfig, Notifier, Prober, WatchdogConfig } from './types';
import { Logger } from './utils/logger';
import { ConfigManager, toTenantDefaults } from './config/config-manager';
import { SqliteConfigStore } from './storage/sqlite-config-store';
import { SnapshotPersister } from './storage/persister';
import { TenantRegistry } from './registry/tenant-registry';
import { IcmpProber } from './monitoring/icmp-prober';
import { ScheduleLoop } from './monitoring/schedule-loop';
import { DispatchSink } from './alerts/dispatch-sink';
import { DiscordNotifier } from './alerts/discord-notifier';
import { CommandService } from './commands/command-service';
import { ApiServer } from './api/api-server';
import { ErrorHandler, WatchdogError, errorMessage } from './error-handling';
import { VERSION } from './version';

export interface WatchdogAppOptions {
  env: EnvironmentConfig;
  configManager?: ConfigManager;
  store?: ConfigStore;
  prober?: Prober;
  notifier?: Notifier;
  /** Skip listening on a port, for embedding and tests */
  enableApi?: boolean;
}

interface Components {
  config: WatchdogConfig;
  store: ConfigStore;
  registry: TenantRegistry;
  persister: SnapshotPersister;
  sink: DispatchSink;
  loop: ScheduleLoop;
  commands: CommandService;
  api: ApiServer;
}

export class WatchdogApp {
  private logger: Logger;
  private options: WatchdogAppOptions;
  private configManager: ConfigManager;
  private errorHandler: ErrorHandler;
  private components: Components | null = null;
  private isRunning = false;

  constructor(options: WatchdogAppOptions) {
    this.logger = new Logger('WatchdogApp');
    this.options = options;
    this.configManager = options.configManager ?? new ConfigManager(options.env.configPath);
    this.errorHandler = new ErrorHandler();
  }

  /**
   * Load configuration, open the store and restore or bootstrap the registry
   */
  async initialize(): Promise<void> {
    if (this.components) {
      this.logger.warn('App is already initialized');
      return;
    }

    this.logger.info(`Initializing resource watchdog v${VERSION}...`);
    const config = await this.configManager.loadConfig();
    const store = await this.openStore();

    const snapshot = await store.load();
    const defaults = toTenantDefaults(config.defaults);
    let registry: TenantRegistry;
    if (snapshot) {
      registry = TenantRegistry.fromSnapshot(snapshot, defaults);
      this.logger.info(`Restored ${snapshot.tenants.length} servers from the store`);
    } else {
      registry = new TenantRegistry({
        defaults,
        maxTenants: config.max_servers,
        tickIntervalMs: config.tick_interval_seconds * 1000,
        masterId: config.master_server
      });
      this.logger.info('No saved data found, bootstrapping from configuration');
    }
    this.registerConfiguredServers(registry, config, snapshot !== null);

    const persister = new SnapshotPersister(store, registry);
    const prober = this.options.prober ?? new IcmpProber();
    const notifier = this.options.notifier ?? new DiscordNotifier({ token: this.options.env.discordToken });

    const sink = new DispatchSink({
      registry,
      notifier,
      capacity: config.dispatch_queue_capacity,
      persister,
      errorHandler: this.errorHandler
    });
    const loop = new ScheduleLoop({ registry, prober, sink, persister, errorHandler: this.errorHandler });
    const commands = new CommandService({
      registry,
      prober,
      persister,
      configManager: this.configManager,
      loop,
      sink,
      errorHandler: this.errorHandler
    });
    const api = new ApiServer(
      commands,
      new Logger('ApiServer'),
      { port: this.options.env.port, host: this.options.env.host, apiToken: this.options.env.apiToken },
      loop,
      this.errorHandler
    );

    try {
      await persister.persist();
    } catch (error) {
      this.logger.warn(`Initial save failed, continuing with in-memory state: ${errorMessage(error)}`);
    }

    this.components = { config, store, registry, persister, sink, loop, commands, api };
    this.logger.info('Resource watchdog initialized');
  }

  async start(): Promise<void> {
    const components = this.requireComponents();
    if (this.isRunning) {
      this.logger.warn('App is already running');
      return;
    }

    this.errorHandler.startHealthMonitoring();
    components.sink.start();
    components.loop.start();
    if (this.options.enableApi !== false) {
      await components.api.start();
    }
    this.isRunning = true;
    this.logger.info('Resource watchdog started');
  }

  /**
   * Let the current tick and delivery finish, then save and close everything
   */
  async stop(): Promise<void> {
    if (!this.components) {
      return;
    }
    const { loop, sink, api, persister, store } = this.components;
    this.logger.info('Stopping resource watchdog...');

    await loop.stop();
    await sink.stop();
    this.errorHandler.stopHealthMonitoring();
    if (this.options.enableApi !== false) {
      await api.stop();
    }

    try {
      await persister.persist();
    } catch (error) {
      this.logger.error('Final save failed:', error);
    }
    if (store.close) {
      await store.close();
    }

    this.isRunning = false;
    this.components = null;
    this.logger.info('Resource watchdog stopped');
  }

  getRegistry(): TenantRegistry {
    return this.requireComponents().registry;
  }

  getCommands(): CommandService {
    return this.requireComponents().commands;
  }

  getLoop(): ScheduleLoop {
    return this.requireComponents().loop;
  }

  getSink(): DispatchSink {
    return this.requireComponents().sink;
  }

  getApiServer(): ApiServer {
    return this.requireComponents().api;
  }

  getErrorHandler(): ErrorHandler {
    return this.errorHandler;
  }

  private async openStore(): Promise<ConfigStore> {
    if (this.options.store) {
      return this.options.store;
    }
    const store = new SqliteConfigStore(new Logger('ConfigStore'), this.options.env.dataPath);
    await store.initialize();
    return store;
  }

  /**
   * Make sure the configured master and preregistered servers exist.
   * Servers already present in restored data keep their state.
   */
  private registerConfiguredServers(registry: TenantRegistry, config: WatchdogConfig, restored: boolean): void {
    const master = config.master_server;
    if (master !== null) {
      try {
        if (!registry.has(master)) {
          const entry = config.servers.find(server => server.id === master);
          registry.register({
            id: master,
            name: entry?.name ?? 'Master server',
            notify_channel: entry?.channel ?? null,
            notify_role: entry?.role ?? null
          });
        }
        if (registry.getMasterId() !== master) {
          registry.setMaster(master);
        }
      } catch (error) {
        if (!(error instanceof WatchdogError)) {
          throw error;
        }
        this.logger.warn(`Could not designate ${master} as master: ${error.message}`);
      }
    }

    if (restored) {
      return;
    }

    for (const server of config.servers) {
      if (registry.has(server.id)) {
        continue;
      }
      try {
        registry.register({
          id: server.id,
          name: server.name,
          notify_channel: server.channel ?? null,
          notify_role: server.role ?? null
        });
      } catch (error) {
        if (!(error instanceof WatchdogError)) {
          throw error;
        }
        this.logger.warn(`Skipping configured server ${server.id}: ${error.message}`);
      }
    }
  }

  private requireComponents(): Components {
    if (!this.components) {
      throw new Error('App is not initialized. Call initialize() first.');
    }
    return this.components;
  }
}
