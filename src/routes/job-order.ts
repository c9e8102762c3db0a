import { FastifyInstance } from 'fastify';
import type { ZodTypeProvider } from 'fastify-type-provider-zod';
import {
  ErrorResponseSchema,
  MessageResponseSchema,
  NextJobParamsSchema,
  PayloadResponseSchema,
  WorkflowTypeParamsSchema,
} from '../models/api-schemas.js';
import { JOB_TYPE_IDS, toJobName } from '../models/workflow.js';
import type { SettingsRepository } from '../services/settings-repository.js';
import { createChildLogger } from '../utils/logger.js';

const log = createChildLogger('routes:job-order');

export interface JobOrderRoutesOptions {
  repository: Pick<SettingsRepository, 'getJobOrder' | 'resetJobOrder' | 'updateNextJobForJob'>;
}

export async function jobOrderRoutes(fastify: FastifyInstance, opts: JobOrderRoutesOptions) {
  const app = fastify.withTypeProvider<ZodTypeProvider>();
  const { repository } = opts;

  app.get('/get_job_order/:workflow_type_name', {
    schema: {
      tags: ['Job Order'],
      summary: 'Get the job order of a workflow type',
      security: [{ bearerAuth: [] }],
      params: WorkflowTypeParamsSchema,
      response: {
        200: PayloadResponseSchema,
        400: ErrorResponseSchema,
        401: ErrorResponseSchema,
        500: ErrorResponseSchema,
      },
    },
    preHandler: [fastify.authenticate],
  }, async (request, reply) => {
    const { workflow_type_name: workflowType } = request.params;

    try {
      const order = await repository.getJobOrder(workflowType);
      return { Response: order };
    } catch (err) {
      log.error({ err, workflowType, requestId: request.requestId }, 'Failed to get job order');
      return reply.code(500).send({ error: `Exception detected trying to get the ${workflowType} job order` });
    }
  });

  app.put('/reset_job_order/:workflow_type_name', {
    schema: {
      tags: ['Job Order'],
      summary: 'Reset the job order of a workflow type to its default',
      security: [{ bearerAuth: [] }],
      params: WorkflowTypeParamsSchema,
      response: {
        200: MessageResponseSchema,
        400: ErrorResponseSchema,
        401: ErrorResponseSchema,
        500: ErrorResponseSchema,
      },
    },
    preHandler: [fastify.authenticate],
  }, async (request, reply) => {
    const { workflow_type_name: workflowType } = request.params;

    try {
      const reset = await repository.resetJobOrder(workflowType);
      if (!reset) {
        return reply.code(500).send({ error: `Failed to reset the ${workflowType} job order` });
      }
      return { Response: `The ${workflowType} job order has been reset to the default` };
    } catch (err) {
      log.error({ err, workflowType, requestId: request.requestId }, 'Failed to reset job order');
      return reply.code(500).send({ error: `Exception detected trying to reset the ${workflowType} job order` });
    }
  });

  app.put('/job_type_name/:job_type_name/next_job_type/:next_job_type_name/workflow_type_name/:workflow_type_name', {
    schema: {
      tags: ['Job Order'],
      summary: 'Point a job at the job type that runs after it',
      security: [{ bearerAuth: [] }],
      params: NextJobParamsSchema,
      response: {
        200: MessageResponseSchema,
        400: ErrorResponseSchema,
        401: ErrorResponseSchema,
        500: ErrorResponseSchema,
      },
    },
    preHandler: [fastify.authenticate],
  }, async (request, reply) => {
    const {
      job_type_name: jobType,
      next_job_type_name: nextJobType,
      workflow_type_name: workflowType,
    } = request.params;

    if (jobType === nextJobType) {
      return reply.code(400).send({
        error: `Error: The job type ${jobType} cannot be its own next job type`,
      });
    }

    try {
      const updated = await repository.updateNextJobForJob(toJobName(jobType), JOB_TYPE_IDS[nextJobType], workflowType);
      if (!updated) {
        return reply.code(500).send({ error: `Failed to update the next job type for ${jobType}` });
      }
      return {
        Response: `The ${workflowType} next job type for ${jobType} has been set to ${nextJobType}`,
      };
    } catch (err) {
      log.error({ err, jobType, nextJobType, workflowType, requestId: request.requestId }, 'Failed to update next job type');
      return reply.code(500).send({
        error: `Exception detected trying to update the next job type for ${jobType}`,
      });
    }
  });
}
