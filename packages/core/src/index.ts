/**
 * @modelledger/core
 *
 * Model registry, version resolution and the ports the control plane depends on.
 */

export * from './ports/index.js';
export * from './registry/index.js';
export * from './storage-location.js';
export * from './git-metadata.js';
