// Main entry point for @tunescope/shared

export * from './types';
export * from './utils/dedupe';
export * from './utils/errors';
export * from './utils/fetch';
export * from './utils/slug';
