import * as Sentry from '@sentry/node';

// Error reporting is opt-in: without a DSN every Sentry call is a no-op
if (process.env.SENTRY_DSN) {
  Sentry.init({
    dsn: process.env.SENTRY_DSN,
    environment: process.env.NODE_ENV || 'development',
    tracesSampleRate: 0,
  });
}

export { Sentry };
