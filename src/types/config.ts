/**
 * Configuration file interfaces
 */

export interface DefaultsConfig {
  resource_name: string;
  resource_address: string;
  interval_seconds: number;
  timeout_seconds: number;
  required_attempts: number;
  up_message: string;
  down_message: string;
}

export interface ServerConfig {
  id: string;
  name: string;
  channel?: string | null;
  role?: string | null;
}

export interface WatchdogConfig {
  master_server: string | null;
  max_servers: number;
  tick_interval_seconds: number;
  dispatch_queue_capacity: number;
  defaults: DefaultsConfig;
  servers: ServerConfig[];
}

export interface EnvironmentConfig {
  discordToken: string;
  configPath: string;
  dataPath: string;
  port: number;
  host: string;
  apiToken: string | null;
}
