import { GetObjectCommand, HeadObjectCommand, PutObjectCommand, S3Client } from '@aws-sdk/client-s3';

export type StoredObject = {
  bytes: Uint8Array;
  sizeBytes: number;
  lastModified: Date;
};

export interface ObjectStore {
  get(bucket: string, key: string): Promise<StoredObject>;
  exists(bucket: string, key: string): Promise<boolean>;
  put(bucket: string, key: string, body: Uint8Array, contentType: string): Promise<void>;
}

export const isNotFound = (err: unknown) => err instanceof Error && (err.name === 'NotFound' || err.name === 'NoSuchKey');

export const createObjectStore = (s3: S3Client = new S3Client({})): ObjectStore => ({
  get: async (bucket, key) => {
    console.debug(`GET s3://${bucket}/${key}`);
    const response = await s3.send(
      new GetObjectCommand({
        Bucket: bucket,
        Key: key,
      }),
    );

    const bytes = await response.Body?.transformToByteArray();
    if (!bytes) {
      throw new Error(`s3://${bucket}/${key} returned no body`);
    }

    if (!response.LastModified) {
      throw new Error(`s3://${bucket}/${key} has no LastModified`);
    }

    return {
      bytes,
      sizeBytes: response.ContentLength ?? bytes.byteLength,
      lastModified: response.LastModified,
    };
  },

  exists: async (bucket, key) => {
    console.debug(`HEAD s3://${bucket}/${key}`);
    try {
      await s3.send(
        new HeadObjectCommand({
          Bucket: bucket,
          Key: key,
        }),
      );

      return true;
    } catch (err) {
      if (isNotFound(err)) {
        return false;
      }

      throw err;
    }
  },

  put: async (bucket, key, body, contentType) => {
    console.debug(`PUT s3://${bucket}/${key} (${body.byteLength} bytes, ${contentType})`);
    await s3.send(
      new PutObjectCommand({
        Bucket: bucket,
        Key: key,
        Body: body,
        ContentType: contentType,
        ChecksumAlgorithm: 'SHA256',
      }),
    );
  },
});
