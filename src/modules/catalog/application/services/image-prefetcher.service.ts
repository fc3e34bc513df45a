import { Inject, Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import pLimit from 'p-limit';
import { createLogger } from '../../../../common/utils/logger';
import type { ResolvedImage } from '../../domain/images';
import { ImageResolver } from './image-resolver.service';

const DEFAULT_PREFETCH_CONCURRENCY = 10;

/**
 * Resolves every distinct, non-empty thumbnail URL of a render job once, at most
 * `IMAGE_PREFETCH_CONCURRENCY` at a time. The returned map is only handed back after every
 * resolution settled. A URL for which not even the placeholder could be built is left out.
 */
@Injectable()
export class ImagePrefetcher {
  private readonly logger = createLogger(ImagePrefetcher.name);
  private readonly concurrency: number;

  constructor(
    @Inject(ImageResolver)
    private readonly resolver: Pick<ImageResolver, 'resolve'>,
    configService: ConfigService,
  ) {
    this.concurrency = Math.max(
      1,
      configService.get<number>('IMAGE_PREFETCH_CONCURRENCY') ?? DEFAULT_PREFETCH_CONCURRENCY,
    );
  }

  async prefetch(urls: Iterable<string>): Promise<Map<string, ResolvedImage>> {
    const unique = [...new Set(urls)].filter((url) => url.trim().length > 0);
    const startedAt = Date.now();
    const limit = pLimit(this.concurrency);

    const entries = await Promise.all(
      unique.map((url) =>
        limit(async (): Promise<[string, ResolvedImage | null]> => [url, await this.resolveSafely(url)]),
      ),
    );

    const images = new Map<string, ResolvedImage>();
    for (const [url, image] of entries) {
      if (image) {
        images.set(url, image);
      }
    }

    this.logger.performance('image_prefetch', startedAt, {
      event: 'image_prefetch',
      urls: unique.length,
      concurrency: this.concurrency,
      unresolved: unique.length - images.size,
    });

    return images;
  }

  private async resolveSafely(url: string): Promise<ResolvedImage | null> {
    try {
      return await this.resolver.resolve(url);
    } catch (error: unknown) {
      this.logger.error(
        'image_prefetch_failed',
        error instanceof Error ? error : undefined,
        { event: 'image_prefetch_failed', url },
      );
      return this.placeholderFor(url);
    }
  }

  private async placeholderFor(url: string): Promise<ResolvedImage | null> {
    try {
      const placeholder = await this.resolver.resolve('');
      return { ...placeholder, sourceUrl: url };
    } catch (error: unknown) {
      this.logger.warn('image_placeholder_unavailable', {
        event: 'image_placeholder_unavailable',
        url,
        error_type: error instanceof Error ? error.name : 'UnknownError',
      });
      return null;
    }
  }
}
