import { TtlCache } from './ttl-cache';

describe('TtlCache', () => {
  let cache: TtlCache<string>;
  let now: number;

  beforeEach(() => {
    now = 1_000_000;
    jest.spyOn(Date, 'now').mockImplementation(() => now);
    cache = new TtlCache<string>(60 * 1000);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('should serve a value until the TTL has passed', () => {
    cache.set('daily', 'a');

    now += 59 * 1000;
    expect(cache.get('daily')).toBe('a');

    now += 1000;
    expect(cache.get('daily')).toBeUndefined();
  });

  it('should compute once for concurrent misses', async () => {
    let resolve: (value: string) => void = () => undefined;
    const compute = jest.fn(() => new Promise<string>((r) => (resolve = r)));

    const first = cache.getOrCompute('weekly', compute);
    const second = cache.getOrCompute('weekly', compute);
    resolve('series');

    expect(await first).toBe('series');
    expect(await second).toBe('series');
    expect(compute).toHaveBeenCalledTimes(1);
    expect(cache.get('weekly')).toBe('series');
  });

  it('should not cache a failed computation', async () => {
    await expect(
      cache.getOrCompute('monthly', () => Promise.reject(new Error('boom'))),
    ).rejects.toThrow('boom');

    expect(await cache.getOrCompute('monthly', async () => 'retry')).toBe('retry');
  });

  it('should evict only entries older than the given age', () => {
    cache.set('old', 'a');
    now += 90 * 1000;
    cache.set('new', 'b');
    now += 40 * 1000;

    expect(cache.evictOlderThan(120 * 1000)).toEqual(['a']);
    expect(cache.size).toBe(1);
  });
});
