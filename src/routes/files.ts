// Object routes -- read, write, delete, existence and URL lookup by path.
//
// Paths are taken verbatim from the wildcard segment, so "/files/docs/a.txt"
// addresses the object "docs/a.txt". Storage errors propagate to the
// error-handler plugin, which maps their statusCode (404, 400, 501, ...).

import type { FastifyPluginCallback } from 'fastify';
import fp from 'fastify-plugin';
import { z } from 'zod';

import { type ObjectParams, ObjectParamsSchema, errorResponses } from './schemas.js';

const fileRoutes: FastifyPluginCallback = (fastify, _options, done) => {
  fastify.get<{ Params: ObjectParams }>(
    '/files/*',
    {
      schema: {
        description: 'Read an object (application/octet-stream)',
        tags: ['Objects'],
        params: ObjectParamsSchema,
      },
    },
    async (request, reply) => {
      const stream = await fastify.storage.read(request.params['*']);
      return reply.status(200).header('Content-Type', 'application/octet-stream').send(stream);
    }
  );

  fastify.put<{ Params: ObjectParams; Body: Buffer }>(
    '/files/*',
    {
      schema: {
        description: 'Create or overwrite an object from the raw request body',
        tags: ['Objects'],
        params: ObjectParamsSchema,
        response: {
          200: z.object({ path: z.string(), size: z.number() }),
          ...errorResponses,
        },
      },
      bodyLimit: fastify.config.upload.maxFileSize,
    },
    async (request, reply) => {
      const path = request.params['*'];
      const body = Buffer.isBuffer(request.body) ? request.body : Buffer.alloc(0);
      await fastify.storage.write(path, body);
      return reply.status(200).send({ path, size: body.length });
    }
  );

  fastify.delete<{ Params: ObjectParams }>(
    '/files/*',
    {
      schema: {
        description: 'Delete an object',
        tags: ['Objects'],
        params: ObjectParamsSchema,
      },
    },
    async (request, reply) => {
      await fastify.storage.delete(request.params['*']);
      return reply.status(204).send();
    }
  );

  fastify.get<{ Params: ObjectParams }>(
    '/exists/*',
    {
      schema: {
        description: 'Check whether an object exists',
        tags: ['Objects'],
        params: ObjectParamsSchema,
        response: {
          200: z.object({ path: z.string(), exists: z.boolean() }),
          ...errorResponses,
        },
      },
    },
    async (request, reply) => {
      const path = request.params['*'];
      const exists = await fastify.storage.exists(path);
      return reply.status(200).send({ path, exists });
    }
  );

  fastify.get<{ Params: ObjectParams }>(
    '/url/*',
    {
      schema: {
        description: 'Backend-specific locator for an object (not always dereferenceable)',
        tags: ['Objects'],
        params: ObjectParamsSchema,
        response: {
          200: z.object({ path: z.string(), url: z.string() }),
          ...errorResponses,
        },
      },
    },
    async (request, reply) => {
      const path = request.params['*'];
      const url = await fastify.storage.getUrl(path);
      return reply.status(200).send({ path, url });
    }
  );

  done();
};

export const fileRoutesPlugin = fp(fileRoutes, {
  name: 'file-routes',
  fastify: '5.x',
});
