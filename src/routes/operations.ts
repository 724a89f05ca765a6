// Multi-path operations -- rename, copy, and directory creation.

import type { FastifyPluginCallback } from 'fastify';
import fp from 'fastify-plugin';
import { z } from 'zod';

import { errorResponses } from './schemas.js';

const TransferBodySchema = z.object({
  from: z.string().min(1).describe('Existing object path'),
  to: z.string().min(1).describe('Destination object path'),
});

type TransferBody = z.infer<typeof TransferBodySchema>;

const TransferResponseSchema = z.object({ from: z.string(), to: z.string() });

interface DirectoryBody {
  path: string;
}

const operationRoutes: FastifyPluginCallback = (fastify, _options, done) => {
  fastify.post<{ Body: TransferBody }>(
    '/rename',
    {
      schema: {
        description:
          'Move an object. On object stores a failed delete after the copy returns ' +
          'STORAGE_PARTIAL_FAILURE and the object exists at both paths.',
        tags: ['Operations'],
        body: TransferBodySchema,
        response: { 200: TransferResponseSchema, ...errorResponses },
      },
    },
    async (request, reply) => {
      const { from, to } = request.body;
      await fastify.storage.rename(from, to);
      request.log.info({ from, to }, 'Object renamed');
      return reply.status(200).send({ from, to });
    }
  );

  fastify.post<{ Body: TransferBody }>(
    '/copy',
    {
      schema: {
        description: 'Duplicate an object; the copy is independent of the source',
        tags: ['Operations'],
        body: TransferBodySchema,
        response: { 200: TransferResponseSchema, ...errorResponses },
      },
    },
    async (request, reply) => {
      const { from, to } = request.body;
      await fastify.storage.copy(from, to);
      return reply.status(200).send({ from, to });
    }
  );

  fastify.post<{ Body: DirectoryBody }>(
    '/directories',
    {
      schema: {
        description: "Ensure a directory exists (path must end with '/'); idempotent",
        tags: ['Operations'],
        body: z.object({ path: z.string().min(1) }),
        response: { 201: z.object({ path: z.string() }), ...errorResponses },
      },
    },
    async (request, reply) => {
      const { path } = request.body;
      await fastify.storage.createDirectory(path);
      return reply.status(201).send({ path });
    }
  );

  done();
};

export const operationRoutesPlugin = fp(operationRoutes, {
  name: 'operation-routes',
  fastify: '5.x',
});
