export const name = '@repodump/repo';

export * from './matcher/patterns';
export * from './matcher/path-matcher';
export * from './tokens/estimator';
export * from './records';
export * from './scanner';
export * from './budget';
export * from './tree';
