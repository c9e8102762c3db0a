import { FastifyInstance } from 'fastify';
import fp from 'fastify-plugin';
import { v4 as uuidv4 } from 'uuid';

async function requestContextPlugin(fastify: FastifyInstance) {
  fastify.decorateRequest('requestId', '');

  fastify.addHook('onRequest', async (request, reply) => {
    const header = request.headers['x-request-id'];
    const requestId = typeof header === 'string' && header.length > 0 ? header : uuidv4();
    request.requestId = requestId;
    reply.header('X-Request-ID', requestId);
    request.log = request.log.child({ requestId });
  });
}

export default fp(requestContextPlugin, {
  name: 'request-context',
});

declare module 'fastify' {
  interface FastifyRequest {
    requestId: string;
  }
}
