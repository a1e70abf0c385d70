import 'dotenv/config';
import * as Sentry from '@sentry/node';
import { loadConfig } from './config.js';
import { sentryOptions } from './sentry.js';

// Error reporting is off unless a DSN is configured
try {
  const options = sentryOptions(loadConfig());
  if (options) Sentry.init(options);
} catch (error) {
  // main() fails on the same configuration and reports it
  console.warn('[Host] Error reporting disabled:', error instanceof Error ? error.message : error);
}

// Capture unhandled rejections
process.on('unhandledRejection', (reason) => {
  Sentry.captureException(reason);
});

// Capture uncaught exceptions
process.on('uncaughtException', (error) => {
  Sentry.captureException(error);
});

export { Sentry };
