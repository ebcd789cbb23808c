import type { z } from 'zod';
import type { personaSchema } from '../schemas/common.js';
import type {
  createdUserSchema,
  createUserSchema,
  userSchema,
} from '../schemas/user.js';

/**
 * User - local user in an access zone
 */
export type User = z.infer<typeof userSchema>;

/**
 * Persona - reference to a user, group or well-known identity
 */
export type Persona = z.infer<typeof personaSchema>;

/**
 * CreateUser - input of users.create()
 * The zone defaults to 'System'
 */
export type CreateUser = z.infer<typeof createUserSchema>;

/**
 * CreatedUser - id assigned to a new user
 */
export type CreatedUser = z.infer<typeof createdUserSchema>;
