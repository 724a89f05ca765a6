import type { FastifyPluginCallback, FastifyRequest } from 'fastify';
import fp from 'fastify-plugin';

interface RequestLoggerOptions {
  isDev: boolean;
}

/** Object path from wildcard routes (/files/*, /exists/*, /url/*). */
function objectPathOf(request: FastifyRequest): string | undefined {
  const { params } = request;
  if (typeof params === 'object' && params !== null && '*' in params) {
    const path = params['*'];
    return typeof path === 'string' ? path : undefined;
  }
  return undefined;
}

const requestLogger: FastifyPluginCallback<RequestLoggerOptions> = (fastify, options, done) => {
  const { isDev } = options;

  fastify.addHook('onRequest', async (request) => {
    const logData: Record<string, unknown> = {
      method: request.method,
      url: request.url,
      contentLength: request.headers['content-length'],
    };

    // Request bodies are object contents; headers only, and only in dev
    if (isDev) {
      logData.userAgent = request.headers['user-agent'];
      logData.contentType = request.headers['content-type'];
    }

    request.log.info(logData, 'Incoming request');
  });

  fastify.addHook('onResponse', async (request, reply) => {
    const logData: Record<string, unknown> = {
      method: request.method,
      url: request.url,
      statusCode: reply.statusCode,
      responseTime: reply.elapsedTime,
      driver: fastify.storage.driver(),
      objectPath: objectPathOf(request),
    };

    if (reply.statusCode >= 500) {
      request.log.error(logData, 'Request completed with server error');
    } else if (reply.statusCode >= 400) {
      request.log.warn(logData, 'Request completed with client error');
    } else {
      request.log.info(logData, 'Request completed');
    }
  });

  done();
};

export const requestLoggerPlugin = fp(requestLogger, {
  name: 'request-logger',
  fastify: '5.x',
});
