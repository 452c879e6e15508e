import * as Sentry from '@sentry/node';
import logger from './utils/logger';

// Initialize Sentry for error tracking
export function initSentry(dsn: string | undefined = process.env.SENTRY_DSN): boolean {
  if (!dsn) {
    logger.warn('Sentry DSN not found. Skipping Sentry initialization.');
    return false;
  }

  Sentry.init({
    dsn,
    environment: process.env.NODE_ENV || 'development',
    release: process.env.SENTRY_RELEASE || 'agent-workflow-engine@unknown',
    tracesSampleRate: process.env.NODE_ENV === 'production' ? 0.1 : 1.0,
    integrations: [new Sentry.Integrations.Http({ tracing: true })],

    beforeSend(event) {
      logger.info('Sending error to Sentry', {
        eventId: event.event_id,
        level: event.level,
      });

      // Remove sensitive data from event
      if (event.request) {
        delete event.request.cookies;
        delete event.request.headers?.authorization;
        delete event.request.headers?.cookie;
      }

      return event;
    },

    ignoreErrors: ['Non-Error promise rejection captured'],
  });

  logger.info('Sentry initialized successfully', {
    environment: process.env.NODE_ENV,
    release: process.env.SENTRY_RELEASE,
  });
  return true;
}

export { Sentry };
