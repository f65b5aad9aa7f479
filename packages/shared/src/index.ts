// Shared package exports

export * from './constants';
export * from './schemas';
export * from './types';
