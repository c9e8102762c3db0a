import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import path from 'node:path';
import type { FastifyInstance } from 'fastify';
import { createRouteTestApp } from '../test/test-app.js';
import { logsRoutes } from './logs.js';

describe('log routes', () => {
  let app: FastifyInstance;
  let logPath: string;

  beforeAll(async () => {
    logPath = mkdtempSync(path.join(tmpdir(), 'settings-logs-'));
    writeFileSync(path.join(logPath, 'workflow-settings.log'), '{"level":30,"msg":"Server started"}\n');
    writeFileSync(path.join(logPath, 'settings.env'), 'DB_PASSWORD=test-password\n');

    app = await createRouteTestApp();
    await app.register(logsRoutes, { config: { LOG_PATH: logPath } });
    await app.ready();
  });

  afterAll(async () => {
    await app.close();
    rmSync(logPath, { recursive: true, force: true });
  });

  it('lists the log files with urls on the requesting host', async () => {
    const res = await app.inject({
      method: 'GET',
      url: '/get_log_file_list',
      headers: { host: 'settings.example.com:4000' },
    });

    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual({
      Response: {
        'workflow-settings.log_1': {
          file_name: 'workflow-settings.log',
          url: 'http://settings.example.com:4000/get_log_file/?log_file=workflow-settings.log',
          file_size: '36 bytes',
        },
      },
    });
  });

  it('streams a log file as an attachment', async () => {
    const res = await app.inject({ method: 'GET', url: '/get_log_file/?log_file=workflow-settings.log' });

    expect(res.statusCode).toBe(200);
    expect(res.headers['content-type']).toBe('text/plain; charset=utf-8');
    expect(res.headers['content-disposition']).toBe('attachment; filename="workflow-settings.log"');
    expect(res.body).toBe('{"level":30,"msg":"Server started"}\n');
  });

  it('returns 404 for a missing log file', async () => {
    const res = await app.inject({ method: 'GET', url: '/get_log_file/?log_file=other.log' });

    expect(res.statusCode).toBe(404);
    expect(res.json()).toEqual({ error: 'Log file other.log not found' });
  });

  it('returns 404 for a file that is not a log file', async () => {
    const res = await app.inject({ method: 'GET', url: '/get_log_file/?log_file=settings.env' });

    expect(res.statusCode).toBe(404);
    expect(res.json()).toEqual({ error: 'Log file settings.env not found' });
  });

  it('rejects a path outside the log directory', async () => {
    const res = await app.inject({ method: 'GET', url: '/get_log_file/?log_file=..%2F..%2Fetc%2Fpasswd' });

    expect(res.statusCode).toBe(400);
    expect(res.json()).toEqual({ error: 'Invalid log file path' });
  });

  it('requires the log_file parameter', async () => {
    const res = await app.inject({ method: 'GET', url: '/get_log_file/' });

    expect(res.statusCode).toBe(400);
  });
});
