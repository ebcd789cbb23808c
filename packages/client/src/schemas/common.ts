import { z } from 'zod';

/**
 * Error entry returned by the cluster
 */
export const apiErrorEntrySchema = z.object({
  code: z.string().optional(),
  message: z.string().optional(),
  field: z.string().optional(),
});

/**
 * Error envelope: `{ "errors": [{ "code": ..., "message": ... }] }`
 */
export const errorEnvelopeSchema = z.object({
  errors: z.array(apiErrorEntrySchema),
});

/**
 * Persona reference (user, group or wellknown identity)
 */
export const personaSchema = z.object({
  id: z.string().optional(),
  name: z.string().optional(),
  type: z.string().optional(),
});
