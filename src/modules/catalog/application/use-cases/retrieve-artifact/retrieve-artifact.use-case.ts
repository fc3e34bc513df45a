import { Inject, Injectable } from '@nestjs/common';
import { createLogger } from '../../../../../common/utils/logger';
import type { ArtifactStorePort } from '../../ports/artifact-store.port';
import type { MetricsPort } from '../../ports/metrics.port';
import { ARTIFACT_STORE_PORT, METRICS_PORT } from '../../ports/tokens';

@Injectable()
export class RetrieveArtifactUseCase {
  private readonly logger = createLogger(RetrieveArtifactUseCase.name);

  constructor(
    @Inject(ARTIFACT_STORE_PORT)
    private readonly artifactStore: ArtifactStorePort,
    @Inject(METRICS_PORT)
    private readonly metrics: MetricsPort,
  ) {}

  /** Redeems a handoff token. Returns null when it is unknown, expired or already used. */
  async execute(token: string): Promise<Buffer | null> {
    const content = await this.artifactStore.take(token);

    if (!content) {
      this.metrics.incrementArtifact('not_found');
      this.logger.artifact('artifact_not_found', {
        event: 'artifact_not_found',
        token_prefix: token.slice(0, 8),
      });
      return null;
    }

    this.metrics.incrementArtifact('retrieved');
    return content;
  }
}
