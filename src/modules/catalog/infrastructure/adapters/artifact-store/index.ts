export { artifactStoreFactory, createArtifactStore } from './artifact-store.provider';
export {
  DEFAULT_ARTIFACT_TTL_MS,
  generateArtifactToken,
  isWellFormedArtifactToken,
} from './artifact-token';
export { InMemoryArtifactStore } from './in-memory-artifact-store';
export {
  RedisArtifactStore,
  type RedisArtifactStoreOptions,
  type RedisClientFactory,
  type RedisCommandClient,
} from './redis-artifact-store.adapter';
