// POST /upload route -- multipart file upload into the configured backend.
//
// Flow: multipart "file" field -> storage.upload(stream, filename, dir) ->
// the returned local copy (if the backend produces one) is measured and
// released before responding.

import type { FastifyPluginCallback } from 'fastify';
import fp from 'fastify-plugin';
import { z } from 'zod';

// Import for type augmentation -- adds request.file() to FastifyRequest
import '@fastify/multipart';

import { UploadInvalidError } from '../errors/index.js';
import { joinObjectPath, withLocalFile } from '../storage/index.js';

import { errorResponses } from './schemas.js';

interface UploadQuery {
  dir: string;
}

const uploadRoutes: FastifyPluginCallback = (fastify, _options, done) => {
  const { maxFileSize } = fastify.config.upload;

  fastify.post<{ Querystring: UploadQuery }>(
    '/upload',
    {
      schema: {
        description: 'Upload a file (multipart/form-data, field "file") into a directory',
        tags: ['Objects'],
        querystring: z.object({
          dir: z.string().default('').describe('Target directory; empty for the top level'),
        }),
        response: {
          201: z.object({
            path: z.string(),
            /** Absent on backends that do not produce a local copy (memory) */
            size: z.number().optional(),
          }),
          ...errorResponses,
        },
      },
      config: {
        rateLimit: {
          max: fastify.config.rateLimit.sensitive,
          timeWindow: fastify.config.rateLimit.windowMs,
        },
      },
    },
    async (request, reply) => {
      const data = await request.file({ limits: { fileSize: maxFileSize } });
      if (!data) {
        throw new UploadInvalidError('send a multipart/form-data request with a "file" field');
      }

      const { dir } = request.query;
      const path = joinObjectPath(dir, data.filename);
      // Over maxFileSize the file stream errors (413) and upload() rejects
      // without replacing any object already stored at `path`
      const local = await fastify.storage.upload(data.file, data.filename, dir);

      const size = local
        ? await withLocalFile(local, async (file) => (await file.handle.stat()).size)
        : undefined;

      request.log.info({ path, size }, 'File stored successfully');

      return reply.status(201).send({ path, ...(size !== undefined && { size }) });
    }
  );

  done();
};

export const uploadRoutesPlugin = fp(uploadRoutes, {
  name: 'upload-routes',
  fastify: '5.x',
});
