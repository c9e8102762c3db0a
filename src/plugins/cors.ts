import { FastifyInstance } from 'fastify';
import fp from 'fastify-plugin';
import cors from '@fastify/cors';
import { getConfig } from '../config/index.js';

async function corsPlugin(fastify: FastifyInstance) {
  const origins = getConfig().CORS_ORIGINS;

  await fastify.register(cors, {
    origin: origins.includes('*') ? true : origins,
    credentials: true,
    methods: ['GET', 'PUT'],
    allowedHeaders: ['Content-Type', 'Authorization', 'X-Request-ID'],
  });
}

export default fp(corsPlugin, { name: 'cors' });
