import type { FactoryProvider } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { createLogger } from '../../../../../common/utils/logger';
import type { ArtifactStorePort } from '../../../application/ports/artifact-store.port';
import type { ClockPort } from '../../../application/ports/clock.port';
import { ARTIFACT_STORE_PORT, CLOCK } from '../../../application/ports/tokens';
import { DEFAULT_ARTIFACT_TTL_MS } from './artifact-token';
import { InMemoryArtifactStore } from './in-memory-artifact-store';
import { RedisArtifactStore } from './redis-artifact-store.adapter';

const logger = createLogger('ArtifactStoreProvider');

export function createArtifactStore(configService: ConfigService, clock: ClockPort): ArtifactStorePort {
  const redisUrl = String(configService.get<string>('REDIS_URL') ?? '').trim();
  const ttlMs = configService.get<number>('ARTIFACT_TTL_MS') ?? DEFAULT_ARTIFACT_TTL_MS;

  if (redisUrl.length === 0) {
    logger.warn('artifact_store_in_memory', {
      event: 'artifact_store_in_memory',
      reason: 'missing_redis_url',
    });
    return new InMemoryArtifactStore(clock, ttlMs);
  }

  return new RedisArtifactStore({ redisUrl, ttlMs });
}

export const artifactStoreFactory: FactoryProvider<ArtifactStorePort> = {
  provide: ARTIFACT_STORE_PORT,
  useFactory: createArtifactStore,
  inject: [ConfigService, CLOCK],
};
