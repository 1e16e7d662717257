/**
 * Process environment settings. `.env` is loaded by the entry point before this runs.
 */

import { EnvironmentConfig } from '../types';
import { FieldError, ValidationError } from '../error-handling';
import { DEFAULT_CONFIG_PATH } from './config-manager';

export const DEFAULT_DATA_PATH = './data';
export const DEFAULT_PORT = 8080;
export const DEFAULT_HOST = '127.0.0.1';

export function loadEnvironment(env: NodeJS.ProcessEnv = process.env): EnvironmentConfig {
  const errors: FieldError[] = [];

  const discordToken = env.DISCORD_TOKEN?.trim() ?? '';
  if (discordToken === '') {
    errors.push({ field: 'DISCORD_TOKEN', message: 'DISCORD_TOKEN must be set' });
  }

  let port = DEFAULT_PORT;
  if (env.PORT !== undefined && env.PORT !== '') {
    port = Number(env.PORT);
    if (!Number.isInteger(port) || port < 0 || port > 65535) {
      errors.push({ field: 'PORT', message: 'PORT must be an integer between 0 and 65535', value: env.PORT });
    }
  }

  if (errors.length > 0) {
    throw new ValidationError(
      `Invalid environment: ${errors.map(err => err.message).join('; ')}`,
      errors,
      'Environment'
    );
  }

  return {
    discordToken,
    configPath: env.CONFIG_PATH || DEFAULT_CONFIG_PATH,
    dataPath: env.DATA_PATH || DEFAULT_DATA_PATH,
    port,
    host: env.HOST || DEFAULT_HOST,
    apiToken: env.API_TOKEN || null
  };
}
