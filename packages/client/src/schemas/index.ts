export * from './common.js';
export * from './platform.js';
export * from './s3.js';
export * from './user.js';
export * from './zone.js';
