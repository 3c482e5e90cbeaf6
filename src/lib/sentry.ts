import * as Sentry from '@sentry/aws-serverless';

import { isStepError } from './errors.js';

if (!process.env.SENTRY_DSN) {
  throw new Error('Missing SENTRY_DSN');
}

if (!process.env.SENTRY_RELEASE) {
  throw new Error('Missing SENTRY_RELEASE');
}

if (!process.env.THUMBNAILER_ENV) {
  throw new Error('Missing THUMBNAILER_ENV');
}

Sentry.init({
  dsn: process.env.SENTRY_DSN,
  environment: process.env.THUMBNAILER_ENV,
  release: process.env.SENTRY_RELEASE,
  tracesSampleRate: 1.0,
  beforeSend: (event, hint) => {
    if (isStepError(hint?.originalException)) {
      // Ignore StepErrors as they are expected
      return null;
    }

    return event;
  },
});
