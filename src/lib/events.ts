import { z } from 'zod/v4';

const S3RecordSchema = z.object({
  s3: z.object({
    bucket: z.object({ name: z.string().min(1) }),
    object: z.object({
      key: z.string().min(1),
      size: z.number().nonnegative().optional(),
    }),
  }),
});

const EnvelopeSchema = z.object({
  Records: z.array(z.unknown()),
});

export type SourceLocation = {
  container: string;
  // Still percent-encoded as delivered by S3
  objectKey: string;
};

export type UploadEvent = {
  index: number;
  sourceLocation: SourceLocation;
  declaredSize?: number;
};

export type ParsedRecord = { kind: 'upload'; event: UploadEvent } | { kind: 'malformed'; index: number; detail: string };

/**
 * Splits an S3 notification into its records. Anything that is not shaped like a
 * notification yields an empty batch; a record missing the bucket name or object key
 * is reported as malformed without affecting its neighbours.
 */
export const parseUploadEvent = (raw: unknown): ParsedRecord[] => {
  const envelope = EnvelopeSchema.safeParse(raw);
  if (!envelope.success) {
    return [];
  }

  return envelope.data.Records.map((record, index): ParsedRecord => {
    const parsed = S3RecordSchema.safeParse(record);
    if (!parsed.success) {
      const detail = parsed.error.issues.map((issue) => `${issue.path.map(String).join('.')}: ${issue.message}`).join('; ');

      return { kind: 'malformed', index, detail };
    }

    const { bucket, object } = parsed.data.s3;

    return {
      kind: 'upload',
      event: {
        index,
        sourceLocation: { container: bucket.name, objectKey: object.key },
        declaredSize: object.size,
      },
    };
  });
};

// S3 encodes spaces as '+' on top of the usual percent escapes
export const normaliseKey = (rawKey: string) => decodeURIComponent(rawKey.replace(/\+/g, ' '));

export const deriveThumbnailKey = (objectKey: string, prefix: string) =>
  `${prefix}${objectKey.replace(/\s/g, '-')}.jpg`.replace(/\/{2,}/g, '/');

export const truncate = (text: string, limit = 1000) => (text.length > limit ? `${text.slice(0, limit)}...` : text);
