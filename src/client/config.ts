/**
 * Connection settings for the lab API.
 *
 * Values come from explicit overrides first and the environment second.
 * The resulting object is handed to the client; nothing is kept globally.
 */

import configSchema from '../../schema/client-config.schema.json';
import { createAjv, formatSchemaErrors } from '../utilities/schemaValidation';
import { ConfigError } from './errors';

export interface LabClientConfig {
  host: string;
  username: string;
  password: string;
}

export const ENV_HOST = 'EVE_HOST';
export const ENV_USER = 'EVE_USER';
export const ENV_PASSWORD = 'EVE_PASSWORD';

const SETTINGS: Array<{ key: keyof LabClientConfig; env: string; label: string }> = [
  { key: 'host', env: ENV_HOST, label: 'host' },
  { key: 'username', env: ENV_USER, label: 'username' },
  { key: 'password', env: ENV_PASSWORD, label: 'password' },
];

const validateConfig = createAjv().compile<LabClientConfig>(configSchema);

export function loadClientConfig(
  env: NodeJS.ProcessEnv = process.env,
  overrides: Partial<LabClientConfig> = {}
): LabClientConfig {
  const config: LabClientConfig = { host: '', username: '', password: '' };
  const missing: string[] = [];

  for (const { key, env: envName, label } of SETTINGS) {
    const value = overrides[key] ?? env[envName] ?? '';
    if (value === '') {
      missing.push(`missing lab API ${label}: set ${label} or the ${envName} environment variable`);
    }
    config[key] = value;
  }
  if (missing.length > 0) {
    throw new ConfigError(missing);
  }

  config.host = config.host.replace(/\/+$/, '');
  if (!validateConfig(config)) {
    throw new ConfigError([formatSchemaErrors(validateConfig.errors)]);
  }
  return config;
}
