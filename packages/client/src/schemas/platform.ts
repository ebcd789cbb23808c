import { z } from 'zod';

/**
 * Response of `GET platform/latest`
 */
export const platformLatestSchema = z.object({
  latest: z.string().min(1),
});
