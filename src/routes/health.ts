import { FastifyInstance } from 'fastify';
import type { ZodTypeProvider } from 'fastify-type-provider-zod';
import type { DbRegistry } from '../db/db-registry.js';
import { HealthResponseSchema, ReadinessResponseSchema } from '../models/api-schemas.js';

type DependencyCheck = { status: 'healthy' | 'unhealthy'; error?: string };

export interface HealthRoutesOptions {
  registry: Pick<DbRegistry, 'healthCheck'>;
}

async function runChecks(
  registry: HealthRoutesOptions['registry'],
): Promise<{ checks: Record<string, DependencyCheck>; overallStatus: 'healthy' | 'unhealthy' }> {
  const checks: Record<string, DependencyCheck> = {};

  for (const [name, alive] of Object.entries(await registry.healthCheck())) {
    checks[name] = alive
      ? { status: 'healthy' }
      : { status: 'unhealthy', error: `Database ${name} did not answer the liveness query` };
  }

  const overallStatus = Object.values(checks).every((c) => c.status === 'healthy') ? 'healthy' : 'unhealthy';
  return { checks, overallStatus };
}

export async function healthRoutes(fastify: FastifyInstance, opts: HealthRoutesOptions) {
  const app = fastify.withTypeProvider<ZodTypeProvider>();

  // Liveness probe
  app.get('/health', {
    schema: {
      tags: ['Health'],
      summary: 'Liveness check',
      response: { 200: HealthResponseSchema },
    },
  }, async () => {
    return {
      status: 'ok',
      timestamp: new Date().toISOString(),
    };
  });

  // Readiness probe (public, redacted -- no error details)
  app.get('/health/ready', {
    schema: {
      tags: ['Health'],
      summary: 'Readiness check (public) - redacted database status',
      response: { 200: ReadinessResponseSchema },
    },
  }, async () => {
    const { checks, overallStatus } = await runChecks(opts.registry);

    const redacted: Record<string, { status: string }> = {};
    for (const [name, check] of Object.entries(checks)) {
      redacted[name] = { status: check.status };
    }

    return {
      status: overallStatus,
      checks: redacted,
      timestamp: new Date().toISOString(),
    };
  });

  // Readiness probe (authenticated, full detail)
  app.get('/health/ready/detail', {
    preHandler: fastify.authenticate,
    schema: {
      tags: ['Health'],
      summary: 'Readiness check (authenticated) - full diagnostic info',
      security: [{ bearerAuth: [] }],
    },
  }, async () => {
    const { checks, overallStatus } = await runChecks(opts.registry);

    return {
      status: overallStatus,
      checks,
      timestamp: new Date().toISOString(),
    };
  });
}
