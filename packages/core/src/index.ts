/**
 * @snipdock/core
 *
 * Snippet library for the Snipdock desktop client:
 * - Snippet model and JSON file formats (native + legacy interchange)
 * - Snippet file path resolution
 * - Snippet store and list controller
 * - Application settings
 */

export * from './config.js';
export * from './snippets/index.js';
export * from './settings/index.js';
export * from './library.js';
export * from './utils/index.js';
