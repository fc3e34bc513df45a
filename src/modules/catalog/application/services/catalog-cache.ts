import { createLogger } from '../../../../common/utils/logger';
import type { Product } from '../../domain/product';
import type { ClockPort } from '../ports/clock.port';
import type { MetricsPort } from '../ports/metrics.port';

export const DEFAULT_CATALOG_CACHE_TTL_MS = 300_000;

export interface CatalogSnapshot {
  products: readonly Product[];
  /** Epoch milliseconds at which the source read completed. */
  fetchedAt: number;
}

export interface CatalogCacheOptions {
  fetchAll: () => Promise<Product[]>;
  clock: ClockPort;
  ttlMs?: number;
  metrics?: Pick<MetricsPort, 'incrementCatalogCache' | 'incrementCatalogSourceFailure'>;
}

/**
 * Time-boxed cache of the full product list.
 *
 * Misses are single-flight: callers arriving while a fetch is running share its promise,
 * success or failure. Failures are not cached and not retried here. `invalidate()` drops
 * both the entry and the in-flight fetch; a fetch that settles after an invalidation still
 * answers its own waiters but is not stored. The next miss waits for that stale fetch to
 * settle before reading the source again, so at most one read is ever running.
 */
export class CatalogCache {
  private readonly logger = createLogger(CatalogCache.name);
  private readonly ttlMs: number;
  private entry: CatalogSnapshot | null = null;
  private inFlight: Promise<CatalogSnapshot> | null = null;
  private staleFetch: Promise<void> | null = null;
  private generation = 0;

  constructor(private readonly options: CatalogCacheOptions) {
    this.ttlMs = options.ttlMs ?? DEFAULT_CATALOG_CACHE_TTL_MS;
  }

  async get(): Promise<readonly Product[]> {
    const snapshot = await this.getSnapshot();
    return snapshot.products;
  }

  getSnapshot(): Promise<CatalogSnapshot> {
    const now = this.options.clock.now();

    if (this.entry && now - this.entry.fetchedAt < this.ttlMs) {
      this.options.metrics?.incrementCatalogCache('hit');
      return Promise.resolve(this.entry);
    }

    if (this.inFlight) {
      this.options.metrics?.incrementCatalogCache('shared');
      return this.inFlight;
    }

    this.options.metrics?.incrementCatalogCache('miss');
    this.logger.cache('catalog_cache_miss', {
      event: 'catalog_cache_miss',
      had_entry: this.entry !== null,
    });

    const pending = this.startLoad(this.generation);
    this.inFlight = pending;
    return pending;
  }

  invalidate(): void {
    this.generation += 1;
    this.entry = null;
    if (this.inFlight) {
      this.staleFetch = this.inFlight.then(
        () => undefined,
        () => undefined,
      );
    }
    this.inFlight = null;
    this.logger.cache('catalog_cache_invalidated', {
      event: 'catalog_cache_invalidated',
      generation: this.generation,
    });
  }

  private startLoad(generation: number): Promise<CatalogSnapshot> {
    const stale = this.staleFetch;
    if (!stale) {
      return this.load(generation);
    }

    return stale.then(() => {
      if (this.staleFetch === stale) {
        this.staleFetch = null;
      }
      return this.load(generation);
    });
  }

  private async load(generation: number): Promise<CatalogSnapshot> {
    try {
      const products = await this.options.fetchAll();
      const snapshot: CatalogSnapshot = { products, fetchedAt: this.options.clock.now() };

      if (generation === this.generation) {
        this.entry = snapshot;
      }

      this.logger.cache('catalog_cache_filled', {
        event: 'catalog_cache_filled',
        products: products.length,
        stored: generation === this.generation,
      });
      return snapshot;
    } catch (error: unknown) {
      this.options.metrics?.incrementCatalogSourceFailure();
      this.logger.warn('catalog_source_failed', {
        event: 'catalog_source_failed',
        error_type: error instanceof Error ? error.name : 'UnknownError',
      });
      throw error;
    } finally {
      if (generation === this.generation) {
        this.inFlight = null;
      }
    }
  }
}
