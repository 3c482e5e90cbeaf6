import * as Sentry from '@sentry/aws-serverless';

import './lib/sentry.js';

import { loadConfig } from './lib/config.js';
import { createRecordStore } from './lib/dynamodb.js';
import { truncate } from './lib/events.js';
import { type BatchResult, createPipeline } from './lib/pipeline.js';
import { createObjectStore } from './lib/s3.js';

const config = loadConfig(process.env);

// Clients live for the lifetime of the container and are shared by every invocation
const pipeline = createPipeline(config, {
  objectStore: createObjectStore(),
  recordStore: createRecordStore(),
  reportError: (err, context) => {
    Sentry.captureException(err, { extra: context });
  },
});

// Records are validated one at a time, malformed ones come back as skipped
export const processUploads = async (event: unknown): Promise<BatchResult> => {
  console.debug('S3 event:', truncate(JSON.stringify(event, null, 2)));

  return pipeline.process(event);
};

export const handler = Sentry.wrapHandler(processUploads);
