import { z } from 'zod';
import { personaSchema } from './common.js';

/**
 * Local user schema
 */
export const userSchema = z.object({
  name: z.string(),
  email: z.string().optional(),
  enabled: z.boolean().optional(),
  expiry: z.number().int().nullable().optional(),
  home_directory: z.string().optional(),
  member_of: z.array(personaSchema).optional(),
  primary_group: personaSchema.optional(),
  shell: z.string().optional(),
  uid: personaSchema.optional(),
  sid: personaSchema.optional(),
});

/**
 * Response of the user list and user lookup endpoints
 */
export const userListSchema = z.object({
  users: z.array(userSchema),
});

/**
 * Input of users.create()
 */
export const createUserSchema = z.object({
  name: z.string().min(1),
  primaryGroup: z.string().min(1),
  homeDirectory: z.string().min(1).optional(),
  zone: z.string().min(1).optional(),
});

/**
 * Response of `POST <platform>/auth/users`
 */
export const createdUserSchema = z.object({
  id: z.string(),
});
