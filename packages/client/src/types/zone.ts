import type { z } from 'zod';
import type { accessZoneSchema } from '../schemas/zone.js';

/**
 * AccessZone - named authentication and namespace partition
 */
export type AccessZone = z.infer<typeof accessZoneSchema>;
