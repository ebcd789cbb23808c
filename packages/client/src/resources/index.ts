export { BaseResource, DEFAULT_ZONE, type ResourceContext } from './base.js';
export { PLATFORM_LATEST_PATH, PlatformResource } from './platform.js';
export { S3Resource } from './s3.js';
export { MEMBER_CONFLICT_CODE, UsersResource } from './users.js';
export { ZonesResource } from './zones.js';
