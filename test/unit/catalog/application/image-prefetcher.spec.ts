import { ImagePrefetcher } from '@/modules/catalog/application/services/image-prefetcher.service';
import type { ImageResolver } from '@/modules/catalog/application/services/image-resolver.service';
import type { ResolvedImage } from '@/modules/catalog/domain/images';
import { createConfigService } from '../../../fixtures/catalog/fakes';

function image(url: string, origin: ResolvedImage['origin'] = 'optimized'): ResolvedImage {
  return { sourceUrl: url, origin, data: Buffer.from(url), width: 10, height: 15 };
}

function setup(resolve: (url: string) => Promise<ResolvedImage>, concurrency = 10) {
  const resolver: jest.Mocked<Pick<ImageResolver, 'resolve'>> = { resolve: jest.fn(resolve) };
  const prefetcher = new ImagePrefetcher(
    resolver,
    createConfigService({ IMAGE_PREFETCH_CONCURRENCY: concurrency }),
  );
  return { prefetcher, resolver };
}

describe('ImagePrefetcher', () => {
  it('resolves each distinct URL once', async () => {
    const { prefetcher, resolver } = setup(async (url) => image(url));

    const images = await prefetcher.prefetch(['u1', 'u2', 'u2', 'u1']);

    expect(resolver.resolve).toHaveBeenCalledTimes(2);
    expect([...images.keys()]).toEqual(['u1', 'u2']);
    expect(images.get('u2')).toEqual(image('u2'));
  });

  it('ignores empty URLs', async () => {
    const { prefetcher, resolver } = setup(async (url) => image(url));

    const images = await prefetcher.prefetch(['', '  ', 'u1']);

    expect(resolver.resolve.mock.calls).toEqual([['u1']]);
    expect(images.size).toBe(1);
  });

  it('never runs more resolutions at once than configured', async () => {
    let active = 0;
    let peak = 0;
    const { prefetcher } = setup(async (url) => {
      active += 1;
      peak = Math.max(peak, active);
      await new Promise((resolve) => setImmediate(resolve));
      active -= 1;
      return image(url);
    }, 2);

    const images = await prefetcher.prefetch(['a', 'b', 'c', 'd', 'e']);

    expect(images.size).toBe(5);
    expect(peak).toBe(2);
  });

  it('degrades an unexpected rejection to the placeholder', async () => {
    const { prefetcher } = setup(async (url) => {
      if (url === 'broken') {
        throw new Error('unexpected');
      }
      return image('', 'placeholder');
    });

    const images = await prefetcher.prefetch(['broken']);

    expect(images.get('broken')).toEqual({
      ...image('', 'placeholder'),
      sourceUrl: 'broken',
    });
  });

  it('leaves a URL out when not even the placeholder can be built', async () => {
    const { prefetcher, resolver } = setup(async (url) => {
      if (url === 'broken' || url === '') {
        throw new Error('placeholder unavailable');
      }
      return image(url);
    });

    const images = await prefetcher.prefetch(['broken', 'u1']);

    expect([...images.keys()]).toEqual(['u1']);
    expect(resolver.resolve).toHaveBeenCalledTimes(3);
    expect(resolver.resolve).toHaveBeenCalledWith('');
  });
});
