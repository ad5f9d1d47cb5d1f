import { describe, it, expect } from 'vitest';
import { ConfigurationError, DEFAULT_DAEMON_CONFIG } from '@idlestop/shared';
import { loadConfig } from '../config.js';

describe('loadConfig', () => {
  it('should return the defaults for an empty environment', () => {
    const config = loadConfig({});

    expect(config).toEqual(DEFAULT_DAEMON_CONFIG);
    expect(config.idle.shutdownTimeMs).toBe(300000);
    expect(config.nats).toBeUndefined();
  });

  it('should not share nested objects with the defaults', () => {
    const config = loadConfig({});
    config.api.port = 1;
    expect(DEFAULT_DAEMON_CONFIG.api.port).toBe(3000);
  });

  it('should read SHUTDOWN_TIME in seconds', () => {
    expect(loadConfig({ SHUTDOWN_TIME: '10' }).idle.shutdownTimeMs).toBe(10000);
  });

  it('should fail on a malformed SHUTDOWN_TIME', () => {
    expect(() => loadConfig({ SHUTDOWN_TIME: '10m' })).toThrow(ConfigurationError);
  });

  it('should read API settings', () => {
    const config = loadConfig({
      API_ENABLED: 'false',
      NATS_URL: 'nats://localhost:4222',
      API_PORT: '8081',
      API_HOST: '127.0.0.1',
      API_TOKENS: 'test-token-a, test-token-b',
      API_CORS_ORIGINS: 'http://localhost:5173',
    });

    expect(config.api).toEqual({
      enabled: false,
      port: 8081,
      host: '127.0.0.1',
      authTokens: ['test-token-a', 'test-token-b'],
      corsOrigins: ['http://localhost:5173'],
    });
  });

  it('should enable NATS only when NATS_URL is set', () => {
    const config = loadConfig({ NATS_URL: 'nats://localhost:4222', IDLESTOP_NAMESPACE: 'bots' });

    expect(config.namespace).toBe('bots');
    expect(config.nats).toEqual({
      url: 'nats://localhost:4222',
      name: 'idlestop-daemon',
      reconnect: { maxAttempts: 10, delayMs: 1000 },
      credentials: undefined,
    });
  });

  it('should fail on an empty SHUTDOWN_TIME', () => {
    expect(() => loadConfig({ SHUTDOWN_TIME: '' })).toThrow(
      'SHUTDOWN_TIME: expected an integer, got ""',
    );
  });

  it('should accept a zero SHUTDOWN_TIME', () => {
    expect(loadConfig({ SHUTDOWN_TIME: '0' }).idle.shutdownTimeMs).toBe(0);
  });

  it('should fail fast without an activity source', () => {
    expect(() => loadConfig({ API_ENABLED: 'false' })).toThrow(
      'API_ENABLED: no activity source: enable the REST API or set NATS_URL',
    );
  });

  it('should fail fast on an unusable NATS_URL', () => {
    expect(() => loadConfig({ NATS_URL: 'http://localhost:4222' })).toThrow(
      'NATS_URL: unsupported scheme "http:"',
    );
  });

  it('should fail fast on NATS credentials without a NATS URL', () => {
    expect(() => loadConfig({ NATS_CREDENTIALS: '/etc/idlestop/test.creds' })).toThrow(
      'NATS_CREDENTIALS: set without NATS_URL',
    );
  });

  it('should read NATS_CREDENTIALS alongside NATS_URL', () => {
    const config = loadConfig({
      NATS_URL: 'nats://localhost:4222',
      NATS_CREDENTIALS: '/etc/idlestop/test.creds',
    });
    expect(config.nats?.credentials).toBe('/etc/idlestop/test.creds');
  });

  it('should read ARM_ON_START', () => {
    expect(loadConfig({ ARM_ON_START: '0' }).idle.armOnStart).toBe(false);
  });
});
