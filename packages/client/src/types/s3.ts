import type { z } from 'zod';
import type { s3KeySchema } from '../schemas/s3.js';

/**
 * S3Key - current (and previous) S3 access key of a user
 */
export type S3Key = z.infer<typeof s3KeySchema>;

/**
 * Options for s3.createKey()
 */
export interface CreateS3KeyOptions {
  /**
   * Access zone, defaults to 'System'
   */
  zone?: string;
  /**
   * Minutes before the previous key expires; 0 expires it immediately
   */
  ttl?: number;
}
