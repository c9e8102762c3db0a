import { FastifyInstance } from 'fastify';
import fp from 'fastify-plugin';

async function securityHeadersPlugin(fastify: FastifyInstance) {
  fastify.addHook('onSend', async (request, reply, payload) => {
    reply.header('X-Content-Type-Options', 'nosniff');
    reply.header('Referrer-Policy', 'no-referrer');

    // Swagger UI serves its own scripts and styles
    if (!request.url.startsWith('/docs')) {
      reply.header('X-Frame-Options', 'DENY');
      reply.header('Content-Security-Policy', "default-src 'none'; frame-ancestors 'none'");
    }

    return payload;
  });
}

export default fp(securityHeadersPlugin, { name: 'security-headers' });
