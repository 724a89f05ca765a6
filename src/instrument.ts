import * as Sentry from '@sentry/node';
import type { FastifyBaseLogger } from 'fastify';

import type { Config } from './config/index.js';

// Only initialize if a DSN is configured, so local runs need no Sentry project
export function initSentry(sentry: Config['sentry'], logger: FastifyBaseLogger): void {
  if (!sentry) {
    logger.info('Sentry DSN not configured, error tracking disabled');
    return;
  }

  Sentry.init({
    dsn: sentry.dsn,
    environment: sentry.environment,
    tracesSampleRate: sentry.tracesSampleRate,
    integrations: [Sentry.onUnhandledRejectionIntegration()],
  });

  logger.info({ environment: sentry.environment }, 'Sentry initialized');
}

// Re-export Sentry for use in error handler
export { Sentry };
