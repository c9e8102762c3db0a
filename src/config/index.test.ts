import { afterAll, beforeEach, describe, expect, it, vi } from 'vitest';

describe('config validation', () => {
  const originalEnv = { ...process.env };

  beforeEach(() => {
    process.env = { ...originalEnv };
    process.env.JWT_SECRET = 'test-jwt-secret-at-least-32-characters-long';
    delete process.env.PEER_DEPLOYMENTS;
    delete process.env.DB_NAMES;
    vi.resetModules();
  });

  afterAll(() => {
    process.env = originalEnv;
  });

  it('applies defaults', async () => {
    const { getConfig } = await import('./index.js');
    const config = getConfig();

    expect(config.PORT).toBe(4000);
    expect(config.DB_NAMES).toEqual(['asgs']);
    expect(config.DB_AUTO_COMMIT).toBe(false);
    expect(config.DB_CONNECT_RETRY_DELAY_MS).toBe(5000);
    expect(config.DB_CONNECT_MAX_ATTEMPTS).toBe(0);
    expect(config.CORS_ORIGINS).toEqual(['*']);
    expect(config.PEER_DEPLOYMENTS).toEqual([]);
  });

  it('rejects missing JWT_SECRET', async () => {
    delete process.env.JWT_SECRET;

    const { getConfig } = await import('./index.js');
    expect(() => getConfig()).toThrowError(/JWT_SECRET/);
  });

  it('rejects a JWT_SECRET shorter than 32 characters', async () => {
    process.env.JWT_SECRET = 'too-short';

    const { getConfig } = await import('./index.js');
    expect(() => getConfig()).toThrowError(/JWT_SECRET/);
  });

  it('rejects placeholder JWT secrets in production', async () => {
    process.env.NODE_ENV = 'production';
    process.env.JWT_SECRET = 'replace-with-a-long-random-jwt-secret';

    const { getConfig } = await import('./index.js');
    expect(() => getConfig()).toThrowError(/insecure JWT secret/i);
  });

  it('allows placeholder JWT secrets outside production', async () => {
    process.env.NODE_ENV = 'development';
    process.env.JWT_SECRET = 'replace-with-a-long-random-jwt-secret';

    const { getConfig } = await import('./index.js');
    expect(getConfig().JWT_SECRET).toBe('replace-with-a-long-random-jwt-secret');
  });

  it('parses database names and the auto-commit flag', async () => {
    process.env.DB_NAMES = 'asgs, apsviz ,';
    process.env.DB_AUTO_COMMIT = 'true';

    const { getConfig } = await import('./index.js');
    const config = getConfig();
    expect(config.DB_NAMES).toEqual(['asgs', 'apsviz']);
    expect(config.DB_AUTO_COMMIT).toBe(true);
  });

  it('parses peer deployments', async () => {
    process.env.PEER_DEPLOYMENTS = JSON.stringify([
      { name: 'prod', url: 'https://prod.example.com/settings', token: 'test-token' },
    ]);

    const { getConfig } = await import('./index.js');
    expect(getConfig().PEER_DEPLOYMENTS).toEqual([
      { name: 'prod', url: 'https://prod.example.com/settings', token: 'test-token' },
    ]);
  });

  it('rejects peer deployments that are not JSON', async () => {
    process.env.PEER_DEPLOYMENTS = 'prod=https://prod.example.com';

    const { getConfig } = await import('./index.js');
    expect(() => getConfig()).toThrowError('PEER_DEPLOYMENTS: must be a JSON array');
  });

  it('names the invalid field of a peer deployment', async () => {
    process.env.PEER_DEPLOYMENTS = JSON.stringify([{ name: 'prod', url: 'not a url', token: 'test-token' }]);

    const { getConfig } = await import('./index.js');
    expect(() => getConfig()).toThrowError('PEER_DEPLOYMENTS: [0.url] Invalid url');
  });

  it('rejects a peer that reuses the local deployment name', async () => {
    process.env.DEPLOYMENT_NAME = 'prod';
    process.env.PEER_DEPLOYMENTS = JSON.stringify([
      { name: 'prod', url: 'https://prod.example.com/settings', token: 'test-token' },
    ]);

    const { getConfig } = await import('./index.js');
    expect(() => getConfig()).toThrowError('duplicate deployment name "prod"');
  });

  it('caches the parsed config', async () => {
    const { getConfig } = await import('./index.js');
    expect(getConfig()).toBe(getConfig());
  });
});
