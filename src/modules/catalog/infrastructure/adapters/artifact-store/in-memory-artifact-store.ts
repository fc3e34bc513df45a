import { createLogger } from '../../../../../common/utils/logger';
import type { ArtifactStorePort } from '../../../application/ports/artifact-store.port';
import type { ClockPort } from '../../../application/ports/clock.port';
import { DEFAULT_ARTIFACT_TTL_MS, generateArtifactToken, isWellFormedArtifactToken } from './artifact-token';

interface ArtifactRecord {
  content: Buffer;
  expiresAt: number;
}

/**
 * Process-local handoff store. Only valid for a single instance; expired records
 * are swept lazily on every write.
 */
export class InMemoryArtifactStore implements ArtifactStorePort {
  private readonly logger = createLogger(InMemoryArtifactStore.name);
  private readonly records = new Map<string, ArtifactRecord>();

  constructor(
    private readonly clock: ClockPort,
    private readonly ttlMs: number = DEFAULT_ARTIFACT_TTL_MS,
    private readonly generateToken: () => string = generateArtifactToken,
  ) {}

  async put(content: Buffer): Promise<string> {
    const now = this.clock.now();
    this.sweep(now);

    let token = this.generateToken();
    while (this.records.has(token)) {
      token = this.generateToken();
    }

    this.records.set(token, { content, expiresAt: now + this.ttlMs });
    this.logger.artifact('artifact_stored', {
      event: 'artifact_stored',
      backend: 'memory',
      bytes: content.length,
    });
    return token;
  }

  async take(token: string): Promise<Buffer | null> {
    if (!isWellFormedArtifactToken(token)) {
      return null;
    }

    const record = this.records.get(token);
    this.records.delete(token);

    if (!record || record.expiresAt <= this.clock.now()) {
      return null;
    }

    return record.content;
  }

  get size(): number {
    return this.records.size;
  }

  private sweep(now: number): void {
    for (const [token, record] of this.records.entries()) {
      if (record.expiresAt <= now) {
        this.records.delete(token);
      }
    }
  }
}
