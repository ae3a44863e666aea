/**
 * @file wg/index.ts
 * @description Point d'entrée de la bibliothèque wgkeep
 */

export * from './types.js';
export * from './errors.js';
export * from './address.js';
export * from './conf.js';
export * from './lock.js';
export * from './store.js';
export * from './keys.js';
export * from './engine.js';
export * from './endpoint.js';
export * from './reconcile.js';
export * from './registry.js';
export * from './manager.js';
