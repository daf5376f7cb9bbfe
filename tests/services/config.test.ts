import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { ConfigError, ConfigService } from '../../src/services/config.js';
import { createApiClient } from '../../src/lib/api-client.js';
import { GraphApiClient } from '../../src/services/api.js';
import fs from 'node:fs';
import path from 'node:path';
import os from 'node:os';

describe('ConfigService', () => {
  let testConfigDir: string;
  let testConfigPath: string;

  const writeConfig = (content: unknown): void => {
    fs.mkdirSync(testConfigDir, { recursive: true });
    fs.writeFileSync(testConfigPath, typeof content === 'string' ? content : JSON.stringify(content));
  };

  beforeEach(() => {
    // Temporary directory per test
    testConfigDir = fs.mkdtempSync(path.join(os.tmpdir(), 'graph-collector-test-'));
    testConfigPath = path.join(testConfigDir, 'config.json');
  });

  afterEach(() => {
    fs.rmSync(testConfigDir, { recursive: true, force: true });
    vi.unstubAllEnvs();
    vi.restoreAllMocks();
  });

  describe('load', () => {
    it('should treat a missing file as an empty config', () => {
      const configService = new ConfigService(testConfigPath, {});

      expect(configService.get('client_id')).toBeUndefined();
      expect(configService.getCredentials()).toBeNull();
      expect(configService.getMissingKeys()).toEqual(['client_id', 'client_secret', 'tenant_id']);
    });

    it('should read credentials from the file', () => {
      writeConfig({ client_id: 'test-client-id', client_secret: 'test-secret', tenant_id: 'tenant-1' });

      const configService = new ConfigService(testConfigPath, {});

      expect(configService.hasCredentials()).toBe(true);
      expect(configService.getCredentials()).toEqual({
        clientId: 'test-client-id',
        clientSecret: 'test-secret',
        tenantId: 'tenant-1',
      });
    });

    it('should include the user agent when configured', () => {
      writeConfig({
        client_id: 'test-client-id',
        client_secret: 'test-secret',
        tenant_id: 'tenant-1',
        user_agent: 'collector/1.0',
      });

      expect(new ConfigService(testConfigPath, {}).getCredentials()).toEqual({
        clientId: 'test-client-id',
        clientSecret: 'test-secret',
        tenantId: 'tenant-1',
        userAgent: 'collector/1.0',
      });
    });

    it('should ignore unknown keys', () => {
      writeConfig({ client_id: 'test-client-id', extra: 42 });

      expect(new ConfigService(testConfigPath, {}).get('client_id')).toBe('test-client-id');
    });

    it('should reject malformed JSON', () => {
      writeConfig('{ not json');

      expect(() => new ConfigService(testConfigPath, {})).toThrow(ConfigError);
    });

    it('should reject a file that is not an object', () => {
      writeConfig(['client_id']);

      expect(() => new ConfigService(testConfigPath, {})).toThrow(
        `Config file ${testConfigPath} must contain a JSON object`
      );
    });

    it('should reject a non-string value', () => {
      writeConfig({ client_id: 12345 });

      expect(() => new ConfigService(testConfigPath, {})).toThrow('Config key "client_id" must be a string');
    });
  });

  describe('environment overrides', () => {
    it('should prefer environment variables over the file', () => {
      writeConfig({ client_id: 'file-id', client_secret: 'file-secret', tenant_id: 'file-tenant' });

      const configService = new ConfigService(testConfigPath, {
        GRAPH_CLIENT_ID: 'env-id',
        GRAPH_TENANT_ID: 'env-tenant',
      });

      expect(configService.getCredentials()).toEqual({
        clientId: 'env-id',
        clientSecret: 'file-secret',
        tenantId: 'env-tenant',
      });
    });

    it('should ignore empty environment variables', () => {
      writeConfig({ client_secret: 'file-secret' });

      const configService = new ConfigService(testConfigPath, { GRAPH_CLIENT_SECRET: '' });

      expect(configService.get('client_secret')).toBe('file-secret');
    });

    it('should work from the environment alone', () => {
      const configService = new ConfigService(testConfigPath, {
        GRAPH_CLIENT_ID: 'env-id',
        GRAPH_CLIENT_SECRET: 'test-secret',
        GRAPH_TENANT_ID: 'env-tenant',
        GRAPH_USER_AGENT: 'collector/2.0',
      });

      expect(configService.getCredentials()).toEqual({
        clientId: 'env-id',
        clientSecret: 'test-secret',
        tenantId: 'env-tenant',
        userAgent: 'collector/2.0',
      });
    });
  });

  it('should report the config path', () => {
    expect(new ConfigService(testConfigPath, {}).getConfigPath()).toBe(testConfigPath);
  });
});

describe('createApiClient', () => {
  let testConfigDir: string;

  beforeEach(() => {
    testConfigDir = fs.mkdtempSync(path.join(os.tmpdir(), 'graph-collector-test-'));
    vi.stubEnv('GRAPH_CLIENT_ID', '');
    vi.stubEnv('GRAPH_CLIENT_SECRET', '');
    vi.stubEnv('GRAPH_TENANT_ID', '');
    vi.stubEnv('GRAPH_USER_AGENT', '');
  });

  afterEach(() => {
    fs.rmSync(testConfigDir, { recursive: true, force: true });
    vi.unstubAllEnvs();
  });

  it('should name every missing credential', () => {
    const configPath = path.join(testConfigDir, 'config.json');
    vi.stubEnv('GRAPH_CLIENT_ID', 'env-id');

    expect(() => createApiClient(configPath)).toThrow(
      'Missing Graph credentials: GRAPH_CLIENT_SECRET (client_secret), GRAPH_TENANT_ID (tenant_id). ' +
        `Set the environment variables or add the keys to ${configPath}`
    );
  });

  it('should build a client from the environment', () => {
    vi.stubEnv('GRAPH_CLIENT_ID', 'env-id');
    vi.stubEnv('GRAPH_CLIENT_SECRET', 'test-secret');
    vi.stubEnv('GRAPH_TENANT_ID', 'env-tenant');

    const client = createApiClient(path.join(testConfigDir, 'config.json'));

    expect(client).toBeInstanceOf(GraphApiClient);
    expect(client.getTenantId()).toBe('env-tenant');
    client.close();
  });
});
