import { FastifyInstance } from 'fastify';
import type { ZodTypeProvider } from 'fastify-type-provider-zod';
import { z } from 'zod';
import {
  ErrorResponseSchema,
  MessageResponseSchema,
  PayloadResponseSchema,
  RunListEntrySchema,
  RunListResponseSchema,
  RunParamsSchema,
  RunStatusParamsSchema,
  RunStatusResponseSchema,
} from '../models/api-schemas.js';
import type { SettingsRepository } from '../services/settings-repository.js';
import { createChildLogger } from '../utils/logger.js';

const log = createChildLogger('routes:runs');

export interface RunsRoutesOptions {
  repository: Pick<SettingsRepository, 'getRunList' | 'getRunProps' | 'updateRunStatus'>;
}

type RunListEntry = z.infer<typeof RunListEntrySchema>;
type RunWithFinalStatus = RunListEntry & { final_status: 'Error' | 'Success' };

/** Case-sensitive: only statuses containing "Error" count as failed runs. */
export function withFinalStatus(runs: RunListEntry[]): RunWithFinalStatus[] {
  return runs.map((run): RunWithFinalStatus => ({
    ...run,
    final_status: run.status?.includes('Error') ? 'Error' : 'Success',
  }));
}

const RunPropsSchema = z.record(z.string(), z.unknown());

function invalidInstanceId(instanceId: number): string {
  return `Error: The instance id ${instanceId} is invalid. An instance must be a non-zero positive integer.`;
}

export async function runsRoutes(fastify: FastifyInstance, opts: RunsRoutesOptions) {
  const app = fastify.withTypeProvider<ZodTypeProvider>();
  const { repository } = opts;

  app.get('/get_run_list', {
    schema: {
      tags: ['Runs'],
      summary: 'Get the most recent supervisor runs',
      security: [{ bearerAuth: [] }],
      response: {
        200: RunListResponseSchema,
        401: ErrorResponseSchema,
        500: ErrorResponseSchema,
      },
    },
    preHandler: [fastify.authenticate],
  }, async (request, reply) => {
    try {
      const payload = await repository.getRunList();
      const runs = z.array(RunListEntrySchema).parse(payload ?? []);
      return { Response: withFinalStatus(runs) };
    } catch (err) {
      log.error({ err, requestId: request.requestId }, 'Failed to get run list');
      return reply.code(500).send({ error: 'Exception detected trying to gather run data' });
    }
  });

  app.get('/instance_id/:instance_id/uid/:uid', {
    schema: {
      tags: ['Runs'],
      summary: 'Get the properties of a run',
      security: [{ bearerAuth: [] }],
      params: RunParamsSchema,
      response: {
        200: PayloadResponseSchema,
        400: ErrorResponseSchema,
        401: ErrorResponseSchema,
        404: ErrorResponseSchema,
        500: ErrorResponseSchema,
      },
    },
    preHandler: [fastify.authenticate],
  }, async (request, reply) => {
    const { instance_id: instanceId, uid } = request.params;
    if (instanceId <= 0) {
      return reply.code(400).send({ error: invalidInstanceId(instanceId) });
    }

    try {
      const props = await repository.getRunProps(instanceId, uid);
      if (props === null) {
        return reply.code(404).send({ error: `Run ${instanceId}/${uid} was not found` });
      }
      return { Response: props };
    } catch (err) {
      log.error({ err, instanceId, uid, requestId: request.requestId }, 'Failed to get run properties');
      return reply.code(500).send({ error: `Exception detected trying to get run ${instanceId}/${uid}` });
    }
  });

  app.get('/instance_id/:instance_id/uid/:uid/status', {
    schema: {
      tags: ['Runs'],
      summary: 'Get the supervisor status flag of a run',
      security: [{ bearerAuth: [] }],
      params: RunParamsSchema,
      response: {
        200: RunStatusResponseSchema,
        400: ErrorResponseSchema,
        401: ErrorResponseSchema,
        404: ErrorResponseSchema,
        500: ErrorResponseSchema,
      },
    },
    preHandler: [fastify.authenticate],
  }, async (request, reply) => {
    const { instance_id: instanceId, uid } = request.params;
    if (instanceId <= 0) {
      return reply.code(400).send({ error: invalidInstanceId(instanceId) });
    }

    try {
      const parsed = RunPropsSchema.safeParse(await repository.getRunProps(instanceId, uid));
      if (!parsed.success) {
        return reply.code(404).send({ error: `Run ${instanceId}/${uid} was not found` });
      }
      const status = parsed.data.supervisor_job_status;
      return {
        Response: {
          instance_id: instanceId,
          uid,
          status: typeof status === 'string' ? status : null,
        },
      };
    } catch (err) {
      log.error({ err, instanceId, uid, requestId: request.requestId }, 'Failed to get run status');
      return reply.code(500).send({ error: `Exception detected trying to get the status of run ${instanceId}/${uid}` });
    }
  });

  // ex: instance id 3057, uid 2021062406-namforecast, status "do not rerun"
  app.put('/instance_id/:instance_id/uid/:uid/status/:status', {
    schema: {
      tags: ['Runs'],
      summary: 'Set the supervisor status flag of a run',
      security: [{ bearerAuth: [] }],
      params: RunStatusParamsSchema,
      response: {
        200: MessageResponseSchema,
        400: ErrorResponseSchema,
        401: ErrorResponseSchema,
        500: ErrorResponseSchema,
      },
    },
    preHandler: [fastify.authenticate],
  }, async (request, reply) => {
    const { instance_id: instanceId, uid, status } = request.params;

    if (instanceId <= 0) {
      const message = invalidInstanceId(instanceId);
      log.error({ instanceId, requestId: request.requestId }, message);
      return reply.code(400).send({ error: message });
    }

    try {
      const updated = await repository.updateRunStatus(instanceId, uid, status);
      if (!updated) {
        return reply.code(500).send({ error: `Failed to update run ${instanceId}/${uid} to ${status}` });
      }
      return { Response: `The status of run ${instanceId}/${uid} has been set to ${status}` };
    } catch (err) {
      log.error({ err, instanceId, uid, status, requestId: request.requestId }, 'Failed to update run status');
      return reply.code(500).send({
        error: `Exception detected trying to update run ${instanceId}/${uid} to ${status}`,
      });
    }
  });
}
