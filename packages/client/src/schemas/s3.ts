import { z } from 'zod';

/**
 * S3 access key pair returned when a key is generated
 */
export const s3KeySchema = z.object({
  access_id: z.string(),
  secret_key: z.string(),
  secret_key_timestamp: z.number().int().optional(),
  old_key_expiry: z.number().int().optional(),
  old_key_timestamp: z.number().int().optional(),
  old_secret_key: z.string().optional(),
});

/**
 * Response of `POST <platform>/protocols/s3/keys/<user>`
 */
export const s3KeyResponseSchema = z.object({
  keys: s3KeySchema,
});
