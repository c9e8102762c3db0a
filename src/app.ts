import Fastify, { type FastifyError } from 'fastify';
import type { EnvConfig } from './config/index.js';
import type { DbRegistry } from './db/db-registry.js';
import authPlugin from './plugins/auth.js';
import corsPlugin from './plugins/cors.js';
import requestContextPlugin from './plugins/request-context.js';
import securityHeadersPlugin from './plugins/security-headers.js';
import swaggerPlugin from './plugins/swagger.js';
import { healthRoutes } from './routes/health.js';
import { jobDefsRoutes } from './routes/job-defs.js';
import { jobOrderRoutes } from './routes/job-order.js';
import { logsRoutes } from './routes/logs.js';
import { runsRoutes } from './routes/runs.js';
import type { SettingsRepository } from './services/settings-repository.js';

export interface AppDeps {
  config: EnvConfig;
  registry: DbRegistry;
  repository: SettingsRepository;
}

export async function buildApp({ config, registry, repository }: AppDeps) {
  const isDev = process.env.NODE_ENV !== 'production' && process.env.NODE_ENV !== 'test';
  const app = Fastify({
    logger: {
      level: config.LOG_LEVEL,
      ...(isDev && {
        transport: {
          target: 'pino-pretty',
          options: {
            colorize: true,
            translateTime: 'HH:MM:ss',
            ignore: 'pid,hostname',
          },
        },
      }),
    },
  });

  // Core plugins
  await app.register(requestContextPlugin);
  await app.register(securityHeadersPlugin);
  await app.register(corsPlugin);
  await app.register(swaggerPlugin);
  await app.register(authPlugin);

  app.setErrorHandler((error: FastifyError, request, reply) => {
    if (error.validation) {
      return reply.code(400).send({ error: error.message });
    }

    const statusCode = error.statusCode ?? 500;
    if (statusCode >= 500) {
      request.log.error({ err: error }, 'Unhandled route error');
      return reply.code(statusCode).send({ error: 'Internal server error' });
    }
    return reply.code(statusCode).send({ error: error.message });
  });

  // Routes
  await app.register(healthRoutes, { registry });
  await app.register(jobOrderRoutes, { repository });
  await app.register(jobDefsRoutes, { repository, config });
  await app.register(runsRoutes, { repository });
  await app.register(logsRoutes, { config });

  return app;
}
