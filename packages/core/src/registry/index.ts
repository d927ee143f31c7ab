export { ArtifactRegistry } from './artifact-registry.js';
export * from './registry-schema.js';
export { register, type RegisterVersionInput } from './registration.js';
export {
  resolve,
  resolveOrThrow,
  LATEST_SELECTOR,
  type Resolution,
  type ResolvedVersion,
  type UnresolvedVersion,
} from './resolution.js';
export { setLatest, type RollbackResult } from './rollback.js';
export { listAll, sortListing, type ListedVersion } from './listing.js';
