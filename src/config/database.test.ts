import { describe, expect, it } from 'vitest';
import { getDatabaseParams } from './database.js';

const SHARED = { DB_HOST: 'db.internal', DB_PORT: 5432 };

describe('getDatabaseParams', () => {
  it('reads the per-database variables', () => {
    expect(getDatabaseParams('asgs', SHARED, {
      ASGS_DB_HOST: 'asgs-db',
      ASGS_DB_PORT: '5433',
      ASGS_DB_DATABASE: 'asgs_settings',
      ASGS_DB_USERNAME: 'settings_test',
      ASGS_DB_PASSWORD: 'test-password',
    })).toEqual({
      host: 'asgs-db',
      port: 5433,
      database: 'asgs_settings',
      user: 'settings_test',
      password: 'test-password',
    });
  });

  it('falls back to the shared host and port and the handle name', () => {
    expect(getDatabaseParams('apsviz', SHARED, {
      APSVIZ_DB_USERNAME: 'settings_test',
      APSVIZ_DB_PASSWORD: 'test-password',
    })).toEqual({
      host: 'db.internal',
      port: 5432,
      database: 'apsviz',
      user: 'settings_test',
      password: 'test-password',
    });
  });

  it('maps handle names to upper-case variable prefixes', () => {
    const params = getDatabaseParams('asgs-dev', SHARED, {
      ASGS_DEV_DB_USERNAME: 'settings_test',
      ASGS_DEV_DB_PASSWORD: 'test-password',
    });
    expect(params.user).toBe('settings_test');
  });

  it('names the missing variables', () => {
    expect(() => getDatabaseParams('asgs', SHARED, {})).toThrowError(
      'Invalid environment configuration:\n  ASGS_DB_USERNAME: Required\n  ASGS_DB_PASSWORD: Required',
    );
  });
});
