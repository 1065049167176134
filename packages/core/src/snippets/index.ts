export * from './types.js';
export * from './snippet.js';
export * from './errors.js';
export * from './formats.js';
export * from './path-resolver.js';
export * from './store.js';
export * from './list-controller.js';
