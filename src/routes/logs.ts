import fs from 'node:fs';
import path from 'node:path';
import { FastifyInstance } from 'fastify';
import type { ZodTypeProvider } from 'fastify-type-provider-zod';
import type { EnvConfig } from '../config/index.js';
import { ErrorResponseSchema, LogFileListResponseSchema, LogFileQuerySchema } from '../models/api-schemas.js';
import { InvalidLogFilePathError, listLogFiles, resolveLogFile } from '../services/log-files.js';
import { createChildLogger } from '../utils/logger.js';

const log = createChildLogger('routes:logs');

export interface LogsRoutesOptions {
  config: Pick<EnvConfig, 'LOG_PATH'>;
}

export async function logsRoutes(fastify: FastifyInstance, opts: LogsRoutesOptions) {
  const app = fastify.withTypeProvider<ZodTypeProvider>();
  const logPath = opts.config.LOG_PATH;

  app.get('/get_log_file_list', {
    schema: {
      tags: ['Logs'],
      summary: 'List the log files of this service',
      security: [{ bearerAuth: [] }],
      response: {
        200: LogFileListResponseSchema,
        401: ErrorResponseSchema,
        500: ErrorResponseSchema,
      },
    },
    preHandler: [fastify.authenticate],
  }, async (request, reply) => {
    const baseUrl = `${request.protocol}://${request.host}`;

    try {
      return { Response: await listLogFiles(logPath, baseUrl) };
    } catch (err) {
      log.error({ err, logPath, requestId: request.requestId }, 'Failed to list log files');
      return reply.code(500).send({ error: 'Exception detected trying to get the log file list' });
    }
  });

  app.get('/get_log_file/', {
    schema: {
      tags: ['Logs'],
      summary: 'Download a log file',
      description: 'Sends the file as text/plain. 400 when the path leaves the log directory, 404 when the file is missing or is not a log file.',
      security: [{ bearerAuth: [] }],
      querystring: LogFileQuerySchema,
    },
    preHandler: [fastify.authenticate],
  }, async (request, reply) => {
    const { log_file: logFile } = request.query;

    let filePath: string | null;
    try {
      filePath = await resolveLogFile(logPath, logFile);
    } catch (err) {
      if (err instanceof InvalidLogFilePathError) {
        log.warn({ logFile, requestId: request.requestId }, 'Rejected log file path outside the log directory');
        return reply.code(400).send({ error: 'Invalid log file path' });
      }
      log.error({ err, logFile, requestId: request.requestId }, 'Failed to resolve log file');
      return reply.code(500).send({ error: `Exception detected trying to get log file ${logFile}` });
    }

    if (!filePath) {
      return reply.code(404).send({ error: `Log file ${logFile} not found` });
    }

    const stream = fs.createReadStream(filePath);
    reply.header('Content-Type', 'text/plain; charset=utf-8');
    reply.header('Content-Disposition', `attachment; filename="${path.basename(filePath)}"`);
    return reply.send(stream);
  });
}
