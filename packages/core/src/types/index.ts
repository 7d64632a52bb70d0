export * from './package.js';
export * from './tracking.js';
export * from './registration.js';
export * from './responses.js';
