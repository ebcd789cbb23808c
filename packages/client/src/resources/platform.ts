import { platformLatestSchema } from '../schemas/platform.js';
import { BaseResource } from './base.js';

export const PLATFORM_LATEST_PATH = 'platform/latest';

/**
 * Platform API metadata
 */
export class PlatformResource extends BaseResource {
  /**
   * Latest platform API version supported by the cluster, e.g. '16'
   */
  async latest(): Promise<string> {
    const data = await this.session.send('GET', PLATFORM_LATEST_PATH);
    return this.validate(data, platformLatestSchema).latest;
  }
}
