export * from './summary';
export * from './pipeline';
