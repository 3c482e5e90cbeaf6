import { v4 as uuidv4 } from 'uuid';

import { type MetadataRecord, buildRecord } from '../models/metadata.js';
import type { Config } from './config.js';
import type { RecordStore } from './dynamodb.js';
import { errorMessage, errorName, type FailureKind, StepError } from './errors.js';
import { deriveThumbnailKey, normaliseKey, type ParsedRecord, parseUploadEvent, type UploadEvent } from './events.js';
import { decodeImage, renderThumbnail } from './image.js';
import type { ObjectStore } from './s3.js';

export type SkipReason = 'malformed-event' | 'undecodable-key' | 'not-an-object' | 'thumbnail-object';

export type EventOutcome =
  | {
      status: 'success';
      index: number;
      objectKey: string;
      thumbnailKey: string;
      width: number;
      height: number;
      record: MetadataRecord;
    }
  | {
      // Thumbnail written, metadata write failed. Left in place for a redelivery to finish.
      status: 'partial-success';
      reason: 'metadata-error';
      index: number;
      objectKey: string;
      thumbnailKey: string;
      message: string;
    }
  | {
      status: 'failed';
      reason: Exclude<FailureKind, 'metadata-error'>;
      index: number;
      objectKey: string;
      message: string;
    }
  | {
      status: 'skipped';
      reason: SkipReason;
      index: number;
      objectKey?: string;
      detail: string;
    };

export type BatchSummary = {
  success: number;
  partialSuccess: number;
  failed: number;
  skipped: number;
};

export type BatchResult = {
  batchId: string;
  outcomes: EventOutcome[];
  summary: BatchSummary;
};

export type Logger = Pick<Console, 'debug' | 'log' | 'warn' | 'error'>;

export type PipelineDeps = {
  objectStore: ObjectStore;
  recordStore: RecordStore;
  logger?: Logger;
  clock?: () => Date;
  // Called with every per-record failure before it becomes an outcome, classified or not
  reportError?: (err: unknown, context: Record<string, string | number>) => void;
};

export type Pipeline = {
  process(raw: unknown): Promise<BatchResult>;
};

export const summarise = (outcomes: EventOutcome[]): BatchSummary => {
  const summary: BatchSummary = { success: 0, partialSuccess: 0, failed: 0, skipped: 0 };
  for (const outcome of outcomes) {
    switch (outcome.status) {
      case 'success':
        summary.success += 1;
        break;
      case 'partial-success':
        summary.partialSuccess += 1;
        break;
      case 'failed':
        summary.failed += 1;
        break;
      case 'skipped':
        summary.skipped += 1;
        break;
    }
  }

  return summary;
};

export const createPipeline = (config: Config, deps: PipelineDeps): Pipeline => {
  const { objectStore, recordStore, logger = console, clock = () => new Date(), reportError } = deps;

  const attempt = async <T>(kind: FailureKind, objectKey: string, run: () => Promise<T>): Promise<T> => {
    try {
      return await run();
    } catch (err) {
      throw StepError.wrap(kind, objectKey, err);
    }
  };

  const ingest = async (event: UploadEvent, objectKey: string): Promise<EventOutcome> => {
    const { index } = event;
    const bucket = event.sourceLocation.container;

    // Only consulted for errors raised outside an attempt()
    let stage: Exclude<FailureKind, 'metadata-error'> = 'source-unavailable';

    try {
      const source = await attempt('source-unavailable', objectKey, async () => {
        if (config.verifyUploads && !(await objectStore.exists(bucket, objectKey))) {
          throw new StepError('source-unavailable', `s3://${bucket}/${objectKey} does not exist`, objectKey, { bucket });
        }

        return objectStore.get(bucket, objectKey);
      });
      logger.debug(`[${index}] Downloaded ${source.bytes.byteLength} bytes (declared ${source.sizeBytes})`);

      stage = 'decode-error';
      const thumbnail = await attempt('decode-error', objectKey, async () => {
        const image = await decodeImage(source.bytes);
        logger.debug(`[${index}] Decoded ${image.format} ${image.width}x${image.height} ${image.colorMode}`);

        return renderThumbnail(image, { maxDimension: config.maxDimension, quality: config.quality });
      });
      logger.debug(`[${index}] Rendered ${thumbnail.width}x${thumbnail.height} thumbnail (${thumbnail.bytes.byteLength} bytes)`);

      stage = 'destination-unavailable';
      const thumbnailKey = deriveThumbnailKey(objectKey, config.thumbnailPrefix);
      await attempt('destination-unavailable', objectKey, async () => {
        await objectStore.put(config.thumbnailBucket, thumbnailKey, thumbnail.bytes, thumbnail.contentType);

        if (config.verifyUploads && !(await objectStore.exists(config.thumbnailBucket, thumbnailKey))) {
          throw new StepError('destination-unavailable', `s3://${config.thumbnailBucket}/${thumbnailKey} missing after upload`, objectKey, {
            thumbnailKey,
          });
        }
      });

      let record: MetadataRecord;
      try {
        record = await attempt('metadata-error', objectKey, async () => {
          const built = buildRecord(objectKey, source.sizeBytes, source.lastModified, clock(), thumbnailKey);
          await recordStore.upsert(config.tableName, built);

          return built;
        });
      } catch (err) {
        reportError?.(err, { objectKey, kind: 'metadata-error' });
        logger.error(`[${index}] Thumbnail stored but metadata write failed for ${objectKey}: ${errorName(err)}: ${errorMessage(err)}`);

        return {
          status: 'partial-success',
          reason: 'metadata-error',
          index,
          objectKey,
          thumbnailKey,
          message: errorMessage(err),
        };
      }

      logger.log(`[${index}] s3://${bucket}/${objectKey} -> s3://${config.thumbnailBucket}/${thumbnailKey}`);

      return {
        status: 'success',
        index,
        objectKey,
        thumbnailKey,
        width: thumbnail.width,
        height: thumbnail.height,
        record,
      };
    } catch (err) {
      // StepErrors are dropped by the error reporter, anything unclassified is kept
      const failure = err instanceof StepError ? err : StepError.wrap(stage, objectKey, err);
      reportError?.(err, { objectKey: failure.objectKey, kind: failure.kind });
      logger.error(`[${index}] ${failure.kind} for ${failure.objectKey}: ${errorName(failure.cause ?? failure)}: ${failure.message}`, failure.data);

      return {
        status: 'failed',
        reason: failure.kind === 'metadata-error' ? stage : failure.kind,
        index,
        objectKey: failure.objectKey,
        message: failure.message,
      };
    }
  };

  const processRecord = async (record: ParsedRecord): Promise<EventOutcome> => {
    if (record.kind === 'malformed') {
      logger.warn(`[${record.index}] Skipping record that is not an S3 notification: ${record.detail}`);

      return { status: 'skipped', reason: 'malformed-event', index: record.index, detail: record.detail };
    }

    const { event } = record;
    const rawKey = event.sourceLocation.objectKey;

    let objectKey: string;
    try {
      objectKey = normaliseKey(rawKey);
    } catch (err) {
      logger.warn(`[${event.index}] Skipping undecodable key ${rawKey}`);

      return { status: 'skipped', reason: 'undecodable-key', index: event.index, objectKey: rawKey, detail: errorMessage(err) };
    }

    if (objectKey.endsWith('/')) {
      logger.warn(`[${event.index}] Skipping folder placeholder ${objectKey}`);

      return { status: 'skipped', reason: 'not-an-object', index: event.index, objectKey, detail: 'Key is a folder placeholder' };
    }

    const isOwnOutput =
      event.sourceLocation.container === config.thumbnailBucket &&
      objectKey.startsWith(config.thumbnailPrefix);
    if (isOwnOutput) {
      logger.warn(`[${event.index}] Skipping ${objectKey} as it is already a thumbnail`);

      return { status: 'skipped', reason: 'thumbnail-object', index: event.index, objectKey, detail: 'Key is under the thumbnail prefix' };
    }

    return ingest(event, objectKey);
  };

  return {
    process: async (raw) => {
      const batchId = uuidv4();
      const records = parseUploadEvent(raw);
      logger.log(`Batch ${batchId}: ${records.length} record(s)`);

      // One at a time, in delivery order
      const outcomes: EventOutcome[] = [];
      for (const record of records) {
        outcomes.push(await processRecord(record));
      }

      const summary = summarise(outcomes);
      logger.log(`Batch ${batchId} finished:`, JSON.stringify(summary));

      return { batchId, outcomes, summary };
    },
  };
};
