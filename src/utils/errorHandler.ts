/**
 * Process-level error handling
 */

import * as Sentry from "@sentry/node";
import { toError } from '../lib/errors.js';
import { createLogger } from './logger.js';

const logger = createLogger('errorHandler');

// Time given to log sinks and Sentry before exiting on a crash
const SHUTDOWN_DELAY_MS = 1000;

/**
 * Set up global error handlers for uncaught exceptions and unhandled rejections
 */
export function setupGlobalErrorHandlers(): void {
  process.on('uncaughtException', (error) => {
    const crashId = Math.random().toString(36).substring(7);

    logger.error('Uncaught exception detected', {
      crashId,
      message: error.message,
      name: error.name,
      stack: error.stack,
      uptime: process.uptime()
    });

    Sentry.captureException(error, {
      tags: {
        type: 'uncaughtException',
        crashId
      },
      extra: {
        uptime: process.uptime(),
        pid: process.pid
      }
    });

    setTimeout(() => {
      process.exit(1);
    }, SHUTDOWN_DELAY_MS);
  });

  process.on('unhandledRejection', (reason) => {
    const rejectionId = Math.random().toString(36).substring(7);
    const err = toError(reason);

    logger.error('Unhandled promise rejection detected', {
      rejectionId,
      message: err.message,
      reason: String(reason),
      stack: err.stack
    });

    Sentry.captureException(err, {
      tags: {
        type: 'unhandledRejection',
        rejectionId
      }
    });
  });

  logger.debug('Global error handlers set up', {
    handlersRegistered: ['uncaughtException', 'unhandledRejection']
  });
}
