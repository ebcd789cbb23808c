import { z } from 'zod';
import { personaSchema } from './common.js';

/**
 * Access zone schema
 * Most fields vary between releases, only id and name are always present
 */
export const accessZoneSchema = z.object({
  id: z.string(),
  name: z.string(),
  zone_id: z.number().int().optional(),
  path: z.string().optional(),
  groupnet: z.string().optional(),
  system: z.boolean().optional(),
  alternate_system_provider: z.string().optional(),
  auth_providers: z.array(z.string()).optional(),
  cache_entry_expiry: z.number().int().optional(),
  home_directory_umask: z.number().int().optional(),
  ifs_restricted: z.array(personaSchema).optional(),
  map_untrusted: z.string().optional(),
  negative_cache_entry_expiry: z.number().int().optional(),
  netbios_name: z.string().optional(),
  skeleton_directory: z.string().optional(),
  system_provider: z.string().optional(),
  user_mapping_rules: z.array(z.string()).optional(),
});

/**
 * Response of `GET <platform>/zones`
 */
export const accessZoneListSchema = z.object({
  zones: z.array(accessZoneSchema),
});
