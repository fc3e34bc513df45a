import {
  buildCorsOriginHandler,
  normalizeOrigin,
  resolveCorsMode,
} from '@/common/http/cors-policy';

describe('cors-policy', () => {
  it('normalizes origins removing trailing slash and lowercasing host', () => {
    expect(normalizeOrigin('http://127.0.0.1:5173/')).toBe('http://127.0.0.1:5173');
    expect(normalizeOrigin('https://Tienda.Example')).toBe('https://tienda.example');
  });

  it('uses permissive mode outside production', () => {
    expect(resolveCorsMode({ NODE_ENV: 'development' })).toBe('development_permissive');
    expect(resolveCorsMode({ NODE_ENV: 'test' })).toBe('development_permissive');
  });

  it('rejects non-allowlisted origins in production', () => {
    const originHandler = buildCorsOriginHandler({
      NODE_ENV: 'production',
      ALLOWED_ORIGINS: ['https://tienda.example'],
    });

    const callback = jest.fn<void, [Error | null, boolean?]>();
    originHandler('https://evil.example', callback);

    expect(callback).toHaveBeenCalledTimes(1);
    expect(callback.mock.calls[0]?.[0]).toBeInstanceOf(Error);
    expect(callback.mock.calls[0]?.[1]).toBeUndefined();
  });

  it('allows allowlisted origins and requests without origin in production', () => {
    const originHandler = buildCorsOriginHandler({
      NODE_ENV: 'production',
      ALLOWED_ORIGINS: ['https://tienda.example/'],
    });

    const callback = jest.fn<void, [Error | null, boolean?]>();
    originHandler('https://TIENDA.example', callback);
    originHandler(undefined, callback);

    expect(callback.mock.calls).toEqual([
      [null, true],
      [null, true],
    ]);
  });
});
