export * from './base';
export * from './helpers';
export * from './types';
