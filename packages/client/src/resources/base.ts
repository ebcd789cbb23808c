import type { ZodSchema } from 'zod';
import { ValidationError } from '../errors/index.js';
import type { PapiSession } from '../session.js';

/**
 * What a resource needs from the client that owns it
 */
export interface ResourceContext {
  readonly session: PapiSession;
  /**
   * Versioned platform path, e.g. 'platform/16'
   */
  readonly platformPath: string;
}

/**
 * Access zone used when a call does not name one
 */
export const DEFAULT_ZONE = 'System';

/**
 * Base resource class with path and validation helpers
 */
export abstract class BaseResource {
  protected readonly context: ResourceContext;

  constructor(context: ResourceContext) {
    this.context = context;
  }

  protected get session(): PapiSession {
    return this.context.session;
  }

  /**
   * Path segments below the current platform path
   */
  protected platform(...segments: string[]): string[] {
    return [this.context.platformPath, ...segments];
  }

  /**
   * Validate API response against Zod schema
   * @throws {ValidationError} if validation fails
   */
  protected validate<T>(data: unknown, schema: ZodSchema<T>): T {
    const result = schema.safeParse(data);

    if (!result.success) {
      throw new ValidationError('API response validation failed', result.error);
    }

    return result.data;
  }
}
