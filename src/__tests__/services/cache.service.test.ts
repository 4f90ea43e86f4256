import { CacheService } from '../../services/cache.service';

describe('CacheService', () => {
  let now: number;
  let cache: CacheService<string>;

  beforeEach(() => {
    now = 1_000_000;
    cache = new CacheService<string>('test:', 60, () => now);
  });

  it('should return null for a missing key', () => {
    expect(cache.get('missing')).toBeNull();
  });

  it('should return a stored value until its TTL passes', () => {
    cache.set('a', 'alpha');
    now += 59_999;
    expect(cache.get('a')).toBe('alpha');
    now += 1;
    expect(cache.get('a')).toBeNull();
  });

  it('should honor a per-entry TTL', () => {
    cache.set('a', 'alpha', 5);
    now += 5_000;
    expect(cache.get('a')).toBeNull();
  });

  describe('getOrLoad', () => {
    it('should load once and serve the cached value afterwards', async () => {
      const loader = jest.fn().mockResolvedValue('loaded');

      await expect(cache.getOrLoad('k', loader)).resolves.toBe('loaded');
      await expect(cache.getOrLoad('k', loader)).resolves.toBe('loaded');

      expect(loader).toHaveBeenCalledTimes(1);
    });

    it('should share one in-flight load between concurrent callers', async () => {
      let resolveLoad: (value: string) => void = () => undefined;
      const loader = jest.fn(
        () =>
          new Promise<string>((resolve) => {
            resolveLoad = resolve;
          })
      );

      const first = cache.getOrLoad('k', loader);
      const second = cache.getOrLoad('k', loader);
      resolveLoad('shared');

      await expect(Promise.all([first, second])).resolves.toEqual(['shared', 'shared']);
      expect(loader).toHaveBeenCalledTimes(1);
    });

    it('should not cache a failed load', async () => {
      const loader = jest
        .fn<Promise<string>, []>()
        .mockRejectedValueOnce(new Error('boom'))
        .mockResolvedValueOnce('second try');

      await expect(cache.getOrLoad('k', loader)).rejects.toThrow('boom');
      await expect(cache.getOrLoad('k', loader)).resolves.toBe('second try');
      expect(loader).toHaveBeenCalledTimes(2);
    });

    it('should reload after the entry expires', async () => {
      const loader = jest.fn<Promise<string>, []>().mockResolvedValueOnce('old').mockResolvedValueOnce('new');

      await cache.getOrLoad('k', loader);
      now += 60_000;

      await expect(cache.getOrLoad('k', loader)).resolves.toBe('new');
    });
  });
});
