export * from './build.js';
export * from './artifact.js';
export * from './manifest.js';
export * from './scenario.js';
