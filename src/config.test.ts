/**
 * Tests for Configuration
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { ConfigurationError } from './errors.js';

// Store original env
const originalEnv = process.env;

// Mock dotenv
vi.mock('dotenv', () => ({
  config: vi.fn(),
}));

const validEnv = {
  CTP_AUTH_URL: 'https://auth.test.local',
  CTP_API_URL: 'https://api.test.local',
  CTP_PROJECT_KEY: 'test-project',
  CTP_CLIENT_ID: 'test-client-id',
  CTP_CLIENT_SECRET: 'test-secret',
};

describe('Configuration', () => {
  beforeEach(() => {
    // Reset modules before each test
    vi.resetModules();
    // Create a fresh copy of process.env
    process.env = { ...originalEnv };
  });

  afterEach(() => {
    // Restore original env
    process.env = originalEnv;
    vi.clearAllMocks();
  });

  describe('loadConfig', () => {
    it('should load the .env file on import', async () => {
      const dotenv = await import('dotenv');
      await import('./config.js');

      expect(dotenv.config).toHaveBeenCalledTimes(1);
    });

    it('should read values from process.env by default', async () => {
      Object.assign(process.env, validEnv);
      delete process.env.CTP_USER_AGENT;
      delete process.env.CTP_TIMEOUT_MS;

      const { loadConfig } = await import('./config.js');
      const config = loadConfig();

      expect(config.client).toEqual({
        authUrl: 'https://auth.test.local',
        apiUrl: 'https://api.test.local',
        projectKey: 'test-project',
        clientId: 'test-client-id',
        clientSecret: 'test-secret',
        userAgent: undefined,
        timeoutMs: undefined,
      });
    });

    it('should default the output folder to ./dynamic', async () => {
      const { loadConfig } = await import('./config.js');

      expect(loadConfig(validEnv).outputDir).toBe('./dynamic');
    });

    it('should read optional settings', async () => {
      const { loadConfig } = await import('./config.js');
      const config = loadConfig({
        ...validEnv,
        CTP_OUTPUT_DIR: '/tmp/snapshots',
        CTP_TIMEOUT_MS: '5000',
        CTP_USER_AGENT: 'shipping-tutorial',
      });

      expect(config.outputDir).toBe('/tmp/snapshots');
      expect(config.client.timeoutMs).toBe(5000);
      expect(config.client.userAgent).toBe('shipping-tutorial');
    });

    it('should strip trailing slashes from URLs', async () => {
      const { loadConfig } = await import('./config.js');
      const config = loadConfig({
        ...validEnv,
        CTP_AUTH_URL: 'https://auth.test.local/',
        CTP_API_URL: 'https://api.test.local//',
      });

      expect(config.client.authUrl).toBe('https://auth.test.local');
      expect(config.client.apiUrl).toBe('https://api.test.local');
    });

    it('should throw when a required variable is missing', async () => {
      const { loadConfig } = await import('./config.js');
      const { CTP_CLIENT_SECRET: _secret, ...env } = validEnv;

      expect(() => loadConfig(env)).toThrow('Invalid configuration: CTP_CLIENT_SECRET is required');
    });

    it('should name every missing variable', async () => {
      const { loadConfig } = await import('./config.js');

      let error: unknown;
      try {
        loadConfig({ CTP_AUTH_URL: 'https://auth.test.local' });
      } catch (e) {
        error = e;
      }

      expect(error).toBeInstanceOf(ConfigurationError);
      expect((error as ConfigurationError).variables).toEqual([
        'CTP_API_URL',
        'CTP_PROJECT_KEY',
        'CTP_CLIENT_ID',
        'CTP_CLIENT_SECRET',
      ]);
    });

    it('should treat blank values as missing', async () => {
      const { loadConfig } = await import('./config.js');

      expect(() => loadConfig({ ...validEnv, CTP_PROJECT_KEY: '   ' })).toThrow(
        'Invalid configuration: CTP_PROJECT_KEY is required'
      );
    });

    it('should reject a malformed URL', async () => {
      const { loadConfig } = await import('./config.js');

      expect(() => loadConfig({ ...validEnv, CTP_API_URL: 'api.test.local' })).toThrow(
        'Invalid configuration: CTP_API_URL must be a URL'
      );
    });

    it('should reject a non-positive timeout', async () => {
      const { loadConfig } = await import('./config.js');

      expect(() => loadConfig({ ...validEnv, CTP_TIMEOUT_MS: '0' })).toThrow(
        'Invalid configuration: CTP_TIMEOUT_MS must be positive'
      );
    });
  });
});
