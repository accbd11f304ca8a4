export const name = '@repodump/shared';

export * from './errors';
export * from './logger';
export * from './config/schema';
export * from './fs/path';
export * from './string-utils';
