// Centralized type exports for the application

export * from './json';
export * from './catalog';
