export const name = '@repodump/core';

export * from './config/loader';
export * from './config/budget';
export * from './dump';
