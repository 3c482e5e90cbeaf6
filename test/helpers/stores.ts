import type { RecordStore } from '../../src/lib/dynamodb.js';
import type { ObjectStore, StoredObject } from '../../src/lib/s3.js';
import { type MetadataItem, type MetadataRecord, toItem } from '../../src/models/metadata.js';

type MemoryObject = StoredObject & { contentType: string };

const namedError = (name: string, message: string) => {
  const error = new Error(message);
  error.name = name;

  return error;
};

export class MemoryObjectStore implements ObjectStore {
  readonly objects = new Map<string, MemoryObject>();

  readonly deniedBuckets = new Set<string>();

  readonly calls: string[] = [];

  seed(bucket: string, key: string, bytes: Uint8Array, options: { lastModified?: Date; sizeBytes?: number } = {}) {
    this.objects.set(`${bucket}/${key}`, {
      bytes,
      sizeBytes: options.sizeBytes ?? bytes.byteLength,
      lastModified: options.lastModified ?? new Date('2026-01-01T00:00:00.000Z'),
      contentType: 'application/octet-stream',
    });
  }

  object(bucket: string, key: string) {
    return this.objects.get(`${bucket}/${key}`);
  }

  async get(bucket: string, key: string): Promise<StoredObject> {
    this.calls.push(`get ${bucket}/${key}`);
    const object = this.objects.get(`${bucket}/${key}`);
    if (!object) {
      throw namedError('NoSuchKey', 'The specified key does not exist.');
    }

    return { bytes: object.bytes, sizeBytes: object.sizeBytes, lastModified: object.lastModified };
  }

  async exists(bucket: string, key: string): Promise<boolean> {
    this.calls.push(`exists ${bucket}/${key}`);

    return this.objects.has(`${bucket}/${key}`);
  }

  async put(bucket: string, key: string, body: Uint8Array, contentType: string): Promise<void> {
    this.calls.push(`put ${bucket}/${key}`);
    if (this.deniedBuckets.has(bucket)) {
      throw namedError('AccessDenied', 'Access Denied');
    }

    this.objects.set(`${bucket}/${key}`, {
      bytes: body,
      sizeBytes: body.byteLength,
      lastModified: new Date('2026-01-02T00:00:00.000Z'),
      contentType,
    });
  }
}

export class MemoryRecordStore implements RecordStore {
  readonly items = new Map<string, MetadataItem>();

  failures = 0;

  async upsert(table: string, record: MetadataRecord): Promise<void> {
    if (this.failures > 0) {
      this.failures -= 1;
      throw namedError('ProvisionedThroughputExceededException', 'Rate of requests exceeds the allowed throughput.');
    }

    this.items.set(`${table}/${record.imageName}`, toItem(record));
  }

  item(table: string, imageName: string) {
    return this.items.get(`${table}/${imageName}`);
  }
}

export const silentLogger = {
  debug: () => undefined,
  log: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};
