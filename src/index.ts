/**
 * manifest-reconciler library entrypoint
 *
 * The CLI lives in cli.ts; this module exposes the engine, value model and
 * store client for embedding.
 */

export * from './errors.js';
export * from './values/index.js';
export * from './morph/index.js';
export * from './reconcilers/manifest/index.js';
export * from './api/index.js';
export * from './schema/index.js';
export * from './config/index.js';
export * from './state/index.js';
