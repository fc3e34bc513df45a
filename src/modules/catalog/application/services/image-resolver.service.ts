import { Inject, Injectable } from '@nestjs/common';
import { createLogger } from '../../../../common/utils/logger';
import {
  deriveOptimizedImageUrl,
  OPTIMIZED_IMAGE_HEIGHT,
  OPTIMIZED_IMAGE_WIDTH,
  type DecodedImage,
  type ImageOrigin,
  type ResolvedImage,
} from '../../domain/images';
import type { ImageDecoderPort } from '../ports/image-decoder.port';
import type { ImageOriginPort } from '../ports/image-origin.port';
import type { MetricsPort } from '../ports/metrics.port';
import { IMAGE_DECODER_PORT, IMAGE_ORIGIN_PORT, METRICS_PORT } from '../ports/tokens';

/**
 * Fetches a thumbnail as drawable JPEG: optimized variant first, then the source URL,
 * then a white placeholder at the optimized geometry. Only rejects when the placeholder
 * itself cannot be built.
 */
@Injectable()
export class ImageResolver {
  private readonly logger = createLogger(ImageResolver.name);
  private placeholderPromise?: Promise<DecodedImage>;

  constructor(
    @Inject(IMAGE_ORIGIN_PORT)
    private readonly origin: ImageOriginPort,
    @Inject(IMAGE_DECODER_PORT)
    private readonly decoder: ImageDecoderPort,
    @Inject(METRICS_PORT)
    private readonly metrics: MetricsPort,
  ) {}

  async resolve(url: string): Promise<ResolvedImage> {
    const attempts: Array<{ url: string; origin: ImageOrigin }> = [];
    if (url.trim().length > 0) {
      const optimizedUrl = deriveOptimizedImageUrl(url);
      attempts.push({ url: optimizedUrl, origin: 'optimized' });
      if (optimizedUrl !== url) {
        attempts.push({ url, origin: 'original' });
      }
    }

    for (const attempt of attempts) {
      try {
        const raw = await this.origin.fetch(attempt.url);
        const decoded = await this.decoder.decode(raw);
        this.metrics.incrementImageResolution(attempt.origin);
        return { sourceUrl: url, origin: attempt.origin, ...decoded };
      } catch (error: unknown) {
        this.logger.debug('image_attempt_failed', {
          event: 'image_attempt_failed',
          url: attempt.url,
          origin: attempt.origin,
          error_type: error instanceof Error ? error.name : 'UnknownError',
        });
      }
    }

    this.logger.warn('image_resolution_fallback', {
      event: 'image_resolution_fallback',
      url,
      attempts: attempts.length,
    });
    this.metrics.incrementImageResolution('placeholder');
    const placeholder = await this.placeholder();
    return { sourceUrl: url, origin: 'placeholder', ...placeholder };
  }

  private placeholder(): Promise<DecodedImage> {
    if (!this.placeholderPromise) {
      this.placeholderPromise = this.decoder
        .placeholder(OPTIMIZED_IMAGE_WIDTH, OPTIMIZED_IMAGE_HEIGHT)
        .catch((error: unknown) => {
          this.placeholderPromise = undefined;
          throw error;
        });
    }

    return this.placeholderPromise;
  }
}
