import { FastifyInstance } from 'fastify';
import fp from 'fastify-plugin';
import swagger from '@fastify/swagger';
import swaggerUi from '@fastify/swagger-ui';
import {
  jsonSchemaTransform,
  serializerCompiler,
  validatorCompiler,
} from 'fastify-type-provider-zod';

export const APP_VERSION = '1.0.0';

async function swaggerPlugin(fastify: FastifyInstance) {
  // Set up Zod type provider compilers
  fastify.setValidatorCompiler(validatorCompiler);
  fastify.setSerializerCompiler(serializerCompiler);

  await fastify.register(swagger, {
    openapi: {
      info: {
        title: 'Workflow Settings API',
        description:
          'Job order, job image version and run status settings for the workflow supervisor. ' +
          'All routes except health checks expect a Bearer JWT.',
        version: APP_VERSION,
      },
      components: {
        securitySchemes: {
          bearerAuth: {
            type: 'http',
            scheme: 'bearer',
            bearerFormat: 'JWT',
          },
        },
      },
      tags: [
        { name: 'Health', description: 'Liveness and readiness probes' },
        { name: 'Job Order', description: 'Next-job pointers per workflow type' },
        { name: 'Job Definitions', description: 'Supervisor job definitions and image versions' },
        { name: 'Runs', description: 'Run history and run status flags' },
        { name: 'Logs', description: 'Service log files' },
      ],
    },
    transform: jsonSchemaTransform,
  });

  await fastify.register(swaggerUi, {
    routePrefix: '/docs',
    uiConfig: {
      docExpansion: 'list',
      deepLinking: true,
      persistAuthorization: true,
    },
  });
}

export default fp(swaggerPlugin, { name: 'swagger' });
