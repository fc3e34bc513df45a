import { CatalogCache } from '@/modules/catalog/application/services/catalog-cache';
import { CatalogSourceError } from '@/modules/catalog/domain/errors';
import type { Product } from '@/modules/catalog/domain/product';
import { createMetricsMock, FakeClock, flushPromises } from '../../../fixtures/catalog/fakes';
import { buildProduct } from '../../../fixtures/catalog/products';

interface Deferred<T> {
  promise: Promise<T>;
  resolve: (value: T) => void;
  reject: (reason: unknown) => void;
}

function deferred<T>(): Deferred<T> {
  let resolve: (value: T) => void = () => undefined;
  let reject: (reason: unknown) => void = () => undefined;
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}

describe('CatalogCache', () => {
  const products = [buildProduct(), buildProduct()];

  function setup(fetchAll: () => Promise<Product[]>) {
    const clock = new FakeClock();
    const metrics = createMetricsMock();
    const fetchMock = jest.fn(fetchAll);
    const cache = new CatalogCache({ fetchAll: fetchMock, clock, ttlMs: 300_000, metrics });
    return { cache, clock, metrics, fetchMock };
  }

  it('serves reads inside the ttl from memory', async () => {
    const { cache, clock, metrics, fetchMock } = setup(async () => products);

    await expect(cache.get()).resolves.toBe(products);
    clock.advance(299_999);
    await expect(cache.get()).resolves.toBe(products);

    expect(fetchMock).toHaveBeenCalledTimes(1);
    expect(metrics.incrementCatalogCache.mock.calls).toEqual([['miss'], ['hit']]);
  });

  it('refetches once the ttl has elapsed', async () => {
    const { cache, clock, fetchMock } = setup(async () => products);

    await cache.get();
    clock.advance(300_000);
    await cache.get();

    expect(fetchMock).toHaveBeenCalledTimes(2);
  });

  it('reports the completion time of the fetch', async () => {
    const { cache, clock } = setup(async () => products);
    const startedAt = clock.now();

    const snapshot = await cache.getSnapshot();

    expect(snapshot.fetchedAt).toBe(startedAt);
  });

  it('shares one fetch between concurrent callers', async () => {
    const pending = deferred<Product[]>();
    const { cache, metrics, fetchMock } = setup(() => pending.promise);

    const reads = Promise.all([cache.get(), cache.get(), cache.get()]);
    pending.resolve(products);

    await expect(reads).resolves.toEqual([products, products, products]);
    expect(fetchMock).toHaveBeenCalledTimes(1);
    expect(metrics.incrementCatalogCache.mock.calls).toEqual([['miss'], ['shared'], ['shared']]);
  });

  it('propagates a failure to every waiter without caching it', async () => {
    const pending = deferred<Product[]>();
    let calls = 0;
    const { cache, metrics } = setup(() => {
      calls += 1;
      return calls === 1 ? pending.promise : Promise.resolve(products);
    });

    const reads = Promise.allSettled([cache.get(), cache.get()]);
    pending.reject(new CatalogSourceError('db down'));

    const settled = await reads;
    expect(settled.map((result) => result.status)).toEqual(['rejected', 'rejected']);
    expect(metrics.incrementCatalogSourceFailure).toHaveBeenCalledTimes(1);

    await expect(cache.get()).resolves.toBe(products);
    expect(calls).toBe(2);
  });

  it('fails once the entry has expired and the refresh fails', async () => {
    let calls = 0;
    const { cache, clock } = setup(async () => {
      calls += 1;
      if (calls === 2) {
        throw new CatalogSourceError('db down');
      }
      return products;
    });

    await cache.get();
    clock.advance(300_000);

    await expect(cache.get()).rejects.toThrow('db down');
  });

  it('forces a fresh fetch after invalidate', async () => {
    const { cache, fetchMock } = setup(async () => products);

    await cache.get();
    cache.invalidate();
    await cache.get();

    expect(fetchMock).toHaveBeenCalledTimes(2);
  });

  it('does not store a fetch that settles after invalidate', async () => {
    const stale = deferred<Product[]>();
    const fresh = [buildProduct({ sku: 'FRESH' })];
    let calls = 0;
    const { cache } = setup(() => {
      calls += 1;
      return calls === 1 ? stale.promise : Promise.resolve(fresh);
    });

    const staleRead = cache.get();
    cache.invalidate();
    stale.resolve(products);

    await expect(staleRead).resolves.toBe(products);
    await expect(cache.get()).resolves.toBe(fresh);
    await expect(cache.get()).resolves.toBe(fresh);
    expect(calls).toBe(2);
  });

  async function expectOneReadAtATime(settle: (stale: Deferred<Product[]>) => void) {
    const stale = deferred<Product[]>();
    const fresh = [buildProduct({ sku: 'FRESH' })];
    let calls = 0;
    const { cache } = setup(() => {
      calls += 1;
      return calls === 1 ? stale.promise : Promise.resolve(fresh);
    });

    const staleRead = cache.get().catch(() => null);
    cache.invalidate();
    const freshRead = cache.get();
    const sharedRead = cache.get();
    await flushPromises();

    expect(calls).toBe(1);

    settle(stale);

    await staleRead;
    await expect(freshRead).resolves.toBe(fresh);
    await expect(sharedRead).resolves.toBe(fresh);
    expect(calls).toBe(2);
  }

  it('starts the refetch after invalidate only once the stale fetch resolved', async () => {
    await expectOneReadAtATime((stale) => stale.resolve(products));
  });

  it('starts the refetch after invalidate only once the stale fetch failed', async () => {
    await expectOneReadAtATime((stale) => stale.reject(new CatalogSourceError('db down')));
  });
});
