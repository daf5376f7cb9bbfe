/**
 * API Client Helper
 * Builds a GraphApiClient from the config file and environment
 */

import { GraphApiClient } from '../services/api.js';
import { ConfigError, ConfigService, ENV_KEYS } from '../services/config.js';

/**
 * @throws ConfigError when a required credential is missing
 */
export function createApiClient(configPath?: string): GraphApiClient {
  const config = new ConfigService(configPath);
  const credentials = config.getCredentials();

  if (!credentials) {
    const missing = config.getMissingKeys().map((key) => `${ENV_KEYS[key]} (${key})`);
    throw new ConfigError(
      `Missing Graph credentials: ${missing.join(', ')}. ` +
        `Set the environment variables or add the keys to ${config.getConfigPath()}`
    );
  }

  return new GraphApiClient(credentials);
}
