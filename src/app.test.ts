/**
 * Wiring tests for WatchdogApp with in-process stand-ins
 */

import { WatchdogApp } from './app';
import { ConfigManager } from './config/config-manager';
import { SqliteConfigStore } from './storage/sqlite-config-store';
import { EnvironmentConfig, Logger, WatchdogConfig } from './types';
import { FAILURE, FakeProber, RecordingNotifier } from './testing/fakes';

// Mock logger for testing
const mockLogger: Logger = {
  info: jest.fn(),
  warn: jest.fn(),
  error: jest.fn(),
  debug: jest.fn()
};

const ENV: EnvironmentConfig = {
  discordToken: 'test-token',
  configPath: '/tmp/watchdog-test/config.json',
  dataPath: ':memory:',
  port: 0,
  host: '127.0.0.1',
  apiToken: null
};

describe('WatchdogApp', () => {
  let configManager: ConfigManager;
  let store: SqliteConfigStore;
  let prober: FakeProber;
  let notifier: RecordingNotifier;

  function createApp(): WatchdogApp {
    return new WatchdogApp({ env: ENV, configManager, store, prober, notifier, enableApi: false });
  }

  beforeEach(async () => {
    configManager = new ConfigManager(ENV.configPath);
    const defaults = configManager.getDefaultConfig();
    const config: WatchdogConfig = {
      ...defaults,
      master_server: 'guild-1',
      defaults: { ...defaults.defaults, resource_address: 'host-a', required_attempts: 1 },
      servers: [
        { id: 'guild-1', name: 'Home', channel: 'chan-1', role: 'role-1' },
        { id: 'guild-2', name: 'Friends', channel: 'chan-2', role: null }
      ]
    };
    jest.spyOn(configManager, 'loadConfig').mockResolvedValue(config);

    store = new SqliteConfigStore(mockLogger, ':memory:');
    await store.initialize();
    prober = new FakeProber().script('host-a', [FAILURE]);
    notifier = new RecordingNotifier();
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('should bootstrap the configured servers and save them', async () => {
    const app = createApp();

    await app.initialize();

    const registry = app.getRegistry();
    expect(registry.list().map(t => [t.id, t.name, t.notify_channel])).toEqual([
      ['guild-1', 'Home', 'chan-1'],
      ['guild-2', 'Friends', 'chan-2']
    ]);
    expect(registry.getMasterId()).toBe('guild-1');
    expect((await store.load())?.tenants.map(t => t.id)).toEqual(['guild-1', 'guild-2']);

    await app.stop();
  });

  it('should notify every server sharing the address after one probe', async () => {
    const app = createApp();
    await app.initialize();
    app.getSink().start();

    const transitions = await app.getLoop().runTick();
    await app.getSink().whenIdle();

    expect(prober.calls).toHaveLength(1);
    expect(transitions.map(t => t.tenant_id)).toEqual(['guild-1', 'guild-2']);
    expect(notifier.sent).toEqual([
      { channel: 'chan-1', role: 'role-1', message: 'Example is down, <@&role-1>.' },
      { channel: 'chan-2', role: null, message: 'Example is down, people.' }
    ]);
    expect(app.getRegistry().get('guild-2')?.status_message_id).toBe('status-2');

    await app.stop();
  });

  it('should restore saved state instead of the configuration', async () => {
    const first = createApp();
    await first.initialize();
    await first.getLoop().runTick();
    await first.getCommands().setName({ tenantId: 'guild-2', actor: 'bob' }, 'Game');

    const second = createApp();
    await second.initialize();

    expect(second.getRegistry().get('guild-1')?.current_status).toBe('down');
    expect(second.getRegistry().get('guild-2')?.resource_name).toBe('Game');

    await second.stop();
  });

  it('should refuse access before initialization', () => {
    expect(() => createApp().getRegistry()).toThrow('App is not initialized. Call initialize() first.');
  });
});
