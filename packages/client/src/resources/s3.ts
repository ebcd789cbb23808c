import { s3KeyResponseSchema } from '../schemas/s3.js';
import type { CreateS3KeyOptions, S3Key } from '../types/s3.js';
import { BaseResource, DEFAULT_ZONE } from './base.js';

/**
 * S3 protocol API resource
 */
export class S3Resource extends BaseResource {
  /**
   * Generate a new S3 secret for a user
   *
   * A new key is always forced. The previous key stays valid for `ttl`
   * minutes, or expires immediately when no ttl is given.
   */
  async createKey(
    name: string,
    options: CreateS3KeyOptions = {},
  ): Promise<S3Key> {
    const ttl = options.ttl ?? 0;
    const body =
      ttl > 0 ? JSON.stringify({ existing_key_expiry_time: ttl }) : undefined;

    const data = await this.session.send(
      'POST',
      this.platform('protocols', 's3', 'keys', name),
      {
        query: { force: 'true', zone: options.zone || DEFAULT_ZONE },
        body,
      },
    );

    return this.validate(data, s3KeyResponseSchema).keys;
  }
}
