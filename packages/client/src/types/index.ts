export type * from './common.js';
export type * from './s3.js';
export type * from './user.js';
export type * from './zone.js';
