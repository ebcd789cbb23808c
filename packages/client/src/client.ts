import {
  type ConnectOptions,
  DEFAULT_PLATFORM_PATH,
  type SessionConfig,
} from './config.js';
import {
  PlatformResource,
  type ResourceContext,
  S3Resource,
  UsersResource,
  ZonesResource,
} from './resources/index.js';
import { PapiSession } from './session.js';

/**
 * Platform API client with typed resource calls
 *
 * @example
 * ```typescript
 * const client = new PapiClient();
 * await client.connect({
 *   endpoint: 'https://cluster.example.com:8080',
 *   user: 'api_user',
 *   password: 'secret',
 *   ignoreCert: true,
 * });
 *
 * for (const zone of await client.zones.list()) {
 *   const users = await client.users.list(zone.name);
 *   console.log(zone.name, users.map((user) => user.name));
 * }
 *
 * await client.disconnect();
 * ```
 */
export class PapiClient implements ResourceContext {
  /**
   * Underlying session, for calls not covered by a resource
   */
  public readonly session: PapiSession;

  private currentPlatformPath = DEFAULT_PLATFORM_PATH;

  /**
   * Platform API metadata
   */
  public readonly platform: PlatformResource;

  /**
   * Access zones API resource
   */
  public readonly zones: ZonesResource;

  /**
   * Users and group membership API resource
   */
  public readonly users: UsersResource;

  /**
   * S3 keys API resource
   */
  public readonly s3: S3Resource;

  /**
   * Create a disconnected client
   *
   * @param config - Session configuration; connect() may override its endpoint and credentials
   */
  constructor(config: SessionConfig = {}) {
    this.session = new PapiSession(config);

    this.platform = new PlatformResource(this);
    this.zones = new ZonesResource(this);
    this.users = new UsersResource(this);
    this.s3 = new S3Resource(this);
  }

  /**
   * Versioned platform path used by the resources, e.g. 'platform/16'
   */
  get platformPath(): string {
    return this.currentPlatformPath;
  }

  /**
   * Connect to a cluster and pin the latest platform API version
   * If the version lookup fails the previous platform path is kept
   */
  async connect(options: ConnectOptions): Promise<void> {
    // The old session lives on the old endpoint, so close it first
    try {
      await this.disconnect();
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      console.warn(`[connect] Failed to close the previous session: ${reason}`);
    }

    this.session.configure({
      endpoint: options.endpoint,
      user: options.user,
      password: options.password,
      ignoreCert: options.ignoreCert ?? false,
    });

    try {
      await this.session.connect();
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      console.error(
        `[connect] Unable to connect to ${options.endpoint}: ${reason}`,
      );
      throw error;
    }

    try {
      const latest = await this.platform.latest();
      this.currentPlatformPath = `platform/${latest}`;
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      console.warn(
        `[connect] Unable to get the latest platform API version, using ${this.currentPlatformPath}: ${reason}`,
      );
    }
  }

  /**
   * Close the session; safe to call repeatedly or before connect()
   */
  async disconnect(): Promise<void> {
    await this.session.disconnect();
  }
}
