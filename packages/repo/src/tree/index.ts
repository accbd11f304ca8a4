export * from './types';
export * from './aggregator';
