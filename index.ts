export * from './core';
export * from './types';
export * from './utils';
