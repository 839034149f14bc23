export * from './common';
export * from './sync';
