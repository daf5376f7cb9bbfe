/**
 * Credentials and options handed to the Graph client
 */
export interface GraphClientConfig {
  clientId: string;
  clientSecret: string;
  tenantId: string;
  userAgent?: string;
}

/**
 * Config file layout (`~/.config/graph-collector/config.json`)
 */
export interface AppConfig {
  client_id?: string;
  client_secret?: string;
  tenant_id?: string;
  user_agent?: string;
}

export type ConfigKey = keyof AppConfig;
