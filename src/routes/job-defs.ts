import { FastifyInstance } from 'fastify';
import type { ZodTypeProvider } from 'fastify-type-provider-zod';
import type { EnvConfig } from '../config/index.js';
import {
  ErrorResponseSchema,
  FreezeStatusResponseSchema,
  ImageVersionParamsSchema,
  ImageVersionsResponseSchema,
  MessageResponseSchema,
  PayloadResponseSchema,
} from '../models/api-schemas.js';
import { buildImageName, isValidImageVersion, toJobName } from '../models/workflow.js';
import { isImageFreezeActive } from '../services/freeze-mode.js';
import { compareImageVersions } from '../services/image-version-comparison.js';
import type { SettingsRepository } from '../services/settings-repository.js';
import { createChildLogger } from '../utils/logger.js';

const log = createChildLogger('routes:job-defs');

export interface JobDefsRoutesOptions {
  repository: Pick<SettingsRepository, 'getJobDefs' | 'getJobImageVersions' | 'updateJobImageVersion'>;
  config: Pick<
    EnvConfig,
    'FREEZE_FILE_PATH' | 'DEPLOYMENT_NAME' | 'PEER_DEPLOYMENTS' | 'PEER_REQUEST_TIMEOUT_MS' | 'PEER_CONCURRENCY'
  >;
}

export async function jobDefsRoutes(fastify: FastifyInstance, opts: JobDefsRoutesOptions) {
  const app = fastify.withTypeProvider<ZodTypeProvider>();
  const { repository, config } = opts;

  app.get('/get_job_defs', {
    schema: {
      tags: ['Job Definitions'],
      summary: 'Get the supervisor job definitions',
      security: [{ bearerAuth: [] }],
      response: {
        200: PayloadResponseSchema,
        401: ErrorResponseSchema,
        500: ErrorResponseSchema,
      },
    },
    preHandler: [fastify.authenticate],
  }, async (request, reply) => {
    try {
      return { Response: await repository.getJobDefs() };
    } catch (err) {
      log.error({ err, requestId: request.requestId }, 'Failed to get job definitions');
      return reply.code(500).send({ error: 'Exception detected trying to get the job definitions' });
    }
  });

  app.get('/get_job_image_versions', {
    schema: {
      tags: ['Job Definitions'],
      summary: 'Get the image of every job definition',
      security: [{ bearerAuth: [] }],
      response: {
        200: ImageVersionsResponseSchema,
        401: ErrorResponseSchema,
        500: ErrorResponseSchema,
      },
    },
    preHandler: [fastify.authenticate],
  }, async (request, reply) => {
    try {
      return { Response: await repository.getJobImageVersions() };
    } catch (err) {
      log.error({ err, requestId: request.requestId }, 'Failed to get job image versions');
      return reply.code(500).send({ error: 'Exception detected trying to get the job image versions' });
    }
  });

  app.get('/get_freeze_status', {
    schema: {
      tags: ['Job Definitions'],
      summary: 'Whether image version updates are frozen',
      security: [{ bearerAuth: [] }],
      response: { 200: FreezeStatusResponseSchema, 401: ErrorResponseSchema },
    },
    preHandler: [fastify.authenticate],
  }, async () => {
    return { Response: { frozen: isImageFreezeActive(config.FREEZE_FILE_PATH) } };
  });

  app.put('/image_repo/:image_repo/job_type_name/:job_type_name/image_version/:version', {
    schema: {
      tags: ['Job Definitions'],
      summary: 'Set the image version of a job type',
      description: 'The version label must match a tag pushed to the image repository.',
      security: [{ bearerAuth: [] }],
      params: ImageVersionParamsSchema,
      response: {
        200: MessageResponseSchema,
        400: ErrorResponseSchema,
        401: ErrorResponseSchema,
        500: ErrorResponseSchema,
      },
    },
    preHandler: [fastify.authenticate],
  }, async (request, reply) => {
    const { image_repo: imageRepo, job_type_name: jobType, version } = request.params;

    if (isImageFreezeActive(config.FREEZE_FILE_PATH)) {
      log.warn({ jobType, version, requestId: request.requestId }, 'Image version update rejected: freeze mode');
      return reply.code(400).send({ error: 'Error: Image version updates are frozen' });
    }

    if (!isValidImageVersion(version)) {
      return reply.code(400).send({
        error: `Error: The version ${version} is invalid. Please use a value in the form of v<int>.<int>.<int>`,
      });
    }

    const image = buildImageName(imageRepo, jobType, version);

    try {
      const updated = await repository.updateJobImageVersion(toJobName(jobType), image);
      if (!updated) {
        return reply.code(500).send({ error: `Failed to update the image version for job type ${jobType}` });
      }
      return { Response: `The image for job type ${jobType} has been set to ${image}` };
    } catch (err) {
      log.error({ err, jobType, version, requestId: request.requestId }, 'Failed to update image version');
      return reply.code(500).send({
        error: `Exception detected trying to update the image version. Job type ${jobType}, version: ${version}`,
      });
    }
  });

  app.get('/get_image_version_comparison', {
    schema: {
      tags: ['Job Definitions'],
      summary: 'Compare job image versions with the peer deployments',
      security: [{ bearerAuth: [] }],
      response: {
        200: PayloadResponseSchema,
        401: ErrorResponseSchema,
        500: ErrorResponseSchema,
      },
    },
    preHandler: [fastify.authenticate],
  }, async (request, reply) => {
    try {
      const local = await repository.getJobImageVersions();
      const comparison = await compareImageVersions(local, {
        localName: config.DEPLOYMENT_NAME,
        peers: config.PEER_DEPLOYMENTS,
        timeoutMs: config.PEER_REQUEST_TIMEOUT_MS,
        concurrency: config.PEER_CONCURRENCY,
      });
      return { Response: comparison };
    } catch (err) {
      log.error({ err, requestId: request.requestId }, 'Failed to compare image versions');
      return reply.code(500).send({ error: 'Exception detected trying to compare image versions' });
    }
  });
}
