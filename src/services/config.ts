/**
 * Config Service
 * Reads Graph credentials from a JSON config file, with environment variable overrides
 */

import fs from 'node:fs';
import path from 'node:path';
import os from 'node:os';
import type { AppConfig, ConfigKey, GraphClientConfig } from '../types/config.js';

const DEFAULT_CONFIG_DIR = path.join(os.homedir(), '.config', 'graph-collector');
const DEFAULT_CONFIG_FILE = 'config.json';

/** Environment variable taking precedence over each config key */
export const ENV_KEYS: Record<ConfigKey, string> = {
  client_id: 'GRAPH_CLIENT_ID',
  client_secret: 'GRAPH_CLIENT_SECRET',
  tenant_id: 'GRAPH_TENANT_ID',
  user_agent: 'GRAPH_USER_AGENT',
};

const REQUIRED_KEYS: ConfigKey[] = ['client_id', 'client_secret', 'tenant_id'];

export class ConfigError extends Error {
  public readonly code = 'CONFIG_INVALID';

  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export class ConfigService {
  private configPath: string;
  private config: AppConfig;
  private env: NodeJS.ProcessEnv;

  constructor(configPath?: string, env: NodeJS.ProcessEnv = process.env) {
    this.configPath = configPath || path.join(DEFAULT_CONFIG_DIR, DEFAULT_CONFIG_FILE);
    this.env = env;
    this.config = this.load();
  }

  /**
   * A missing file is an empty config; an unreadable or malformed one is an error
   */
  private load(): AppConfig {
    if (!fs.existsSync(this.configPath)) {
      return {};
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(fs.readFileSync(this.configPath, 'utf-8'));
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new ConfigError(`Cannot read config file ${this.configPath}: ${reason}`);
    }

    if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
      throw new ConfigError(`Config file ${this.configPath} must contain a JSON object`);
    }

    const config: AppConfig = {};
    for (const key of Object.keys(ENV_KEYS)) {
      if (!isConfigKey(key)) continue;
      const value: unknown = Object.getOwnPropertyDescriptor(parsed, key)?.value;
      if (value === undefined) continue;
      if (typeof value !== 'string') {
        throw new ConfigError(`Config key "${key}" must be a string`);
      }
      config[key] = value;
    }
    return config;
  }

  /**
   * Value for a key, environment first
   */
  get(key: ConfigKey): string | undefined {
    const envValue = this.env[ENV_KEYS[key]];
    if (envValue && envValue.length > 0) {
      return envValue;
    }
    const value = this.config[key];
    return value && value.length > 0 ? value : undefined;
  }

  getConfigPath(): string {
    return this.configPath;
  }

  getMissingKeys(): ConfigKey[] {
    return REQUIRED_KEYS.filter((key) => !this.get(key));
  }

  hasCredentials(): boolean {
    return this.getMissingKeys().length === 0;
  }

  /**
   * Complete client config, or null when a required key is missing
   */
  getCredentials(): GraphClientConfig | null {
    const clientId = this.get('client_id');
    const clientSecret = this.get('client_secret');
    const tenantId = this.get('tenant_id');

    if (!clientId || !clientSecret || !tenantId) {
      return null;
    }

    const userAgent = this.get('user_agent');
    return userAgent ? { clientId, clientSecret, tenantId, userAgent } : { clientId, clientSecret, tenantId };
  }
}

function isConfigKey(key: string): key is ConfigKey {
  return Object.hasOwn(ENV_KEYS, key);
}
