import { z } from 'zod/v4';

import { ConfigError } from './errors.js';

const flag = z
  .enum(['true', 'false', '1', '0'])
  .default('false')
  .transform((value) => value === 'true' || value === '1');

const EnvSchema = z.object({
  THUMBNAIL_BUCKET: z.string().min(1),
  DYNAMODB_TABLE: z.string().min(1),
  THUMBNAIL_PREFIX: z.string().min(1).default('thumbnails/'),
  THUMBNAIL_MAX_DIMENSION: z.coerce.number().int().positive().default(100),
  THUMBNAIL_QUALITY: z.coerce.number().int().min(1).max(100).default(85),
  VERIFY_UPLOADS: flag,
});

export type Config = {
  thumbnailBucket: string;
  tableName: string;
  thumbnailPrefix: string;
  maxDimension: number;
  quality: number;
  verifyUploads: boolean;
};

/**
 * Reads the process-wide settings once at cold start.
 *
 * Every missing or invalid variable is collected into a single {@link ConfigError}
 * so a misconfigured deployment fails before any record is looked at.
 */
export const loadConfig = (env: Record<string, string | undefined>): Config => {
  const result = EnvSchema.safeParse(env);
  if (!result.success) {
    const problems = result.error.issues.map((issue) => `${issue.path.map(String).join('.')}: ${issue.message}`);
    throw new ConfigError(problems);
  }

  const parsed = result.data;

  return {
    thumbnailBucket: parsed.THUMBNAIL_BUCKET,
    tableName: parsed.DYNAMODB_TABLE,
    thumbnailPrefix: parsed.THUMBNAIL_PREFIX,
    maxDimension: parsed.THUMBNAIL_MAX_DIMENSION,
    quality: parsed.THUMBNAIL_QUALITY,
    verifyUploads: parsed.VERIFY_UPLOADS,
  };
};
