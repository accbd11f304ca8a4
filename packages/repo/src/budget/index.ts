export * from './types';
export * from './enforcer';
