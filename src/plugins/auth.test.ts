import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import Fastify, { type FastifyInstance } from 'fastify';
import { SignJWT, type JWTPayload } from 'jose';
import authPlugin, { authenticateBearerHeader } from './auth.js';

const SECRET = new TextEncoder().encode('test-jwt-secret-at-least-32-characters-long');

async function signToken(claims: JWTPayload, expiresIn: string | number = '1h', secret = SECRET): Promise<string> {
  return new SignJWT(claims)
    .setProtectedHeader({ alg: 'HS256' })
    .setIssuedAt()
    .setExpirationTime(expiresIn)
    .sign(secret);
}

describe('auth plugin', () => {
  let app: FastifyInstance;

  beforeEach(async () => {
    app = Fastify();
    await app.register(authPlugin);
    app.get('/protected', { preHandler: [app.authenticate] }, async (request) => ({ sub: request.user?.sub }));
    await app.ready();
  });

  afterEach(async () => {
    await app.close();
  });

  it('rejects a missing authorization header', async () => {
    const res = await app.inject({ method: 'GET', url: '/protected' });

    expect(res.statusCode).toBe(401);
    expect(res.json().error).toBe('Missing or invalid authorization header');
  });

  it('rejects a non-bearer scheme', async () => {
    const res = await app.inject({
      method: 'GET',
      url: '/protected',
      headers: { authorization: 'Basic dXNlcjpwYXNz' },
    });

    expect(res.statusCode).toBe(401);
    expect(res.json().error).toBe('Missing or invalid authorization header');
  });

  it('rejects a malformed token', async () => {
    const res = await app.inject({
      method: 'GET',
      url: '/protected',
      headers: { authorization: 'Bearer test-token' },
    });

    expect(res.statusCode).toBe(401);
    expect(res.json().error).toBe('Invalid or expired token');
  });

  it('rejects a token signed with another secret', async () => {
    const token = await signToken({ sub: 'operator' }, '1h', new TextEncoder().encode('another-test-secret-of-32-characters!'));
    const res = await app.inject({
      method: 'GET',
      url: '/protected',
      headers: { authorization: `Bearer ${token}` },
    });

    expect(res.statusCode).toBe(401);
    expect(res.json().error).toBe('Invalid or expired token');
  });

  it('rejects an expired token', async () => {
    const token = await signToken({ sub: 'operator' }, Math.floor(Date.now() / 1000) - 60);
    const res = await app.inject({
      method: 'GET',
      url: '/protected',
      headers: { authorization: `Bearer ${token}` },
    });

    expect(res.statusCode).toBe(401);
  });

  it('accepts a valid token and exposes the subject', async () => {
    const token = await signToken({ sub: 'operator' });
    const res = await app.inject({
      method: 'GET',
      url: '/protected',
      headers: { authorization: `Bearer ${token}` },
    });

    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual({ sub: 'operator' });
  });
});

describe('authenticateBearerHeader', () => {
  it('falls back to an anonymous subject', async () => {
    const token = await signToken({ scope: 'settings' });
    const user = await authenticateBearerHeader(`Bearer ${token}`);

    expect(user?.sub).toBe('anonymous');
    expect(user?.claims.scope).toBe('settings');
  });

  it('returns null without a header', async () => {
    expect(await authenticateBearerHeader(undefined)).toBeNull();
  });
});
