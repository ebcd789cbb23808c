import { accessZoneListSchema } from '../schemas/zone.js';
import type { AccessZone } from '../types/zone.js';
import { BaseResource } from './base.js';

/**
 * Access zones API resource
 */
export class ZonesResource extends BaseResource {
  /**
   * List every access zone on the cluster
   */
  async list(): Promise<AccessZone[]> {
    const data = await this.session.send('GET', this.platform('zones'));
    return this.validate(data, accessZoneListSchema).zones;
  }
}
