import { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import fp from 'fastify-plugin';
import type { JWTPayload } from 'jose';
import { verifyJwt } from '../utils/crypto.js';

interface AuthenticatedUser {
  sub: string;
  claims: JWTPayload;
}

export async function authenticateBearerHeader(authHeader?: string): Promise<AuthenticatedUser | null> {
  if (!authHeader?.startsWith('Bearer ')) {
    return null;
  }

  const payload = await verifyJwt(authHeader.slice(7));
  if (!payload) {
    return null;
  }

  return {
    sub: payload.sub ?? 'anonymous',
    claims: payload,
  };
}

async function authPlugin(fastify: FastifyInstance) {
  fastify.decorateRequest('user', undefined);

  fastify.decorate('authenticate', async function (
    request: FastifyRequest,
    reply: FastifyReply
  ) {
    const authHeader = request.headers.authorization;
    if (!authHeader?.startsWith('Bearer ')) {
      reply.code(401).send({ error: 'Missing or invalid authorization header' });
      return;
    }

    const user = await authenticateBearerHeader(authHeader);
    if (!user) {
      reply.code(401).send({ error: 'Invalid or expired token' });
      return;
    }

    request.user = user;
  });
}

export default fp(authPlugin, { name: 'auth' });

declare module 'fastify' {
  interface FastifyInstance {
    authenticate: (request: FastifyRequest, reply: FastifyReply) => Promise<void>;
  }
  interface FastifyRequest {
    user?: AuthenticatedUser;
  }
}
