import { ApiError, NotFoundError, PapiError } from '../errors/index.js';
import {
  createdUserSchema,
  createUserSchema,
  userListSchema,
} from '../schemas/user.js';
import type { QueryParams } from '../types/common.js';
import type { CreatedUser, CreateUser, User } from '../types/user.js';
import { BaseResource, DEFAULT_ZONE } from './base.js';

/**
 * Error code returned when a user is already a member of a group
 */
export const MEMBER_CONFLICT_CODE = 'AEC_CONFLICT';

function zoneQuery(zone?: string): QueryParams {
  return zone ? { zone } : {};
}

/**
 * Local users and group membership API resource
 */
export class UsersResource extends BaseResource {
  /**
   * List the users of an access zone
   */
  async list(zone?: string): Promise<User[]> {
    const data = await this.session.send('GET', this.platform('auth', 'users'), {
      query: zoneQuery(zone),
    });
    return this.validate(data, userListSchema).users;
  }

  /**
   * Get a single user, including its group memberships
   * @throws {NotFoundError} if the cluster returns an empty user list
   */
  async get(name: string, zone?: string): Promise<User> {
    const data = await this.session.send(
      'GET',
      this.platform('auth', 'users', name),
      { query: { query_member_of: 'True', ...zoneQuery(zone) } },
    );

    const [user] = this.validate(data, userListSchema).users;
    if (!user) {
      throw new NotFoundError(`user ${name}`);
    }
    return user;
  }

  /**
   * Create an enabled local user
   */
  async create(input: CreateUser): Promise<CreatedUser> {
    const validatedInput = this.validate(input, createUserSchema);

    const body = {
      name: validatedInput.name,
      enabled: true,
      home_directory: validatedInput.homeDirectory,
      primary_group: { id: `GROUP:${validatedInput.primaryGroup}` },
    };

    const data = await this.session.send('POST', this.platform('auth', 'users'), {
      query: { force: 'True', zone: validatedInput.zone ?? DEFAULT_ZONE },
      body: JSON.stringify(body),
    });

    return this.validate(data, createdUserSchema);
  }

  /**
   * Delete a user
   */
  async delete(name: string, zone?: string): Promise<void> {
    await this.session.send('DELETE', this.platform('auth', 'users', name), {
      query: zoneQuery(zone),
    });
  }

  /**
   * Add a user to a supplementary group
   * @returns false if the user was already a member
   */
  async addToGroup(name: string, group: string, zone?: string): Promise<boolean> {
    try {
      await this.session.send(
        'POST',
        this.platform('auth', 'groups', group, 'members'),
        {
          query: zoneQuery(zone),
          body: JSON.stringify({ name, type: 'user' }),
        },
      );
      return true;
    } catch (error) {
      if (error instanceof ApiError && error.hasCode(MEMBER_CONFLICT_CODE)) {
        return false;
      }
      throw error;
    }
  }

  /**
   * Add a user to each of the given groups
   * Every group is attempted; failures are collected into one error
   * @throws {PapiError} naming how many groups could not be added
   */
  async setSupplementalGroups(
    name: string,
    groups: readonly string[],
    zone?: string,
  ): Promise<void> {
    const failed: string[] = [];

    for (const group of groups) {
      try {
        await this.addToGroup(name, group, zone);
      } catch (error) {
        const reason = error instanceof Error ? error.message : String(error);
        console.error(
          `[setSupplementalGroups] Unable to add user ${name} to group ${group} in zone ${zone ?? DEFAULT_ZONE}: ${reason}`,
        );
        failed.push(group);
      }
    }

    if (failed.length > 0) {
      throw new PapiError(
        `${failed.length} error(s) encountered adding user ${name} to groups: ${failed.join(', ')}`,
      );
    }
  }
}
