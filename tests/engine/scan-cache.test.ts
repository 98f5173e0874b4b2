import { describe, it, expect, beforeEach } from 'vitest';
import { DEFAULT_TTLS, ScanCache } from '../../src/engine/scan-cache.js';
import { FakeClock } from '../helpers/fakes.js';

describe('ScanCache', () => {
  let clock: FakeClock;
  let cache: ScanCache;
  let scans: number;

  const scan = async () => {
    scans++;
    return { hostname: `pi-${scans}` };
  };

  beforeEach(() => {
    clock = new FakeClock();
    cache = new ScanCache({ clock, ttls: { system: 30_000 } });
    scans = 0;
  });

  it('TTL 内の 2 回目の呼び出しはスキャンしない', async () => {
    expect(await cache.getOrScan('system', scan)).toEqual({ hostname: 'pi-1' });
    clock.advance(29_999);
    expect(await cache.getOrScan('system', scan)).toEqual({ hostname: 'pi-1' });
    expect(scans).toBe(1);
    expect(cache.stats()).toEqual({ hits: 1, misses: 1, entries: 1 });
  });

  it('TTL ちょうどで期限切れになり再スキャンする', async () => {
    await cache.getOrScan('system', scan);
    clock.advance(30_000);
    expect(cache.isFresh('system')).toBe(false);
    expect(await cache.getOrScan('system', scan)).toEqual({ hostname: 'pi-2' });
    expect(scans).toBe(2);
  });

  it('TTL 0 のカテゴリはキャッシュしない', async () => {
    const noCache = new ScanCache({ clock, ttls: { services: 0 } });
    await noCache.getOrScan('services', scan);
    await noCache.getOrScan('services', scan);
    expect(scans).toBe(2);
  });

  it('失敗したスキャンはエントリを残さない', async () => {
    await expect(
      cache.getOrScan('system', async () => {
        throw new Error('ssh down');
      }),
    ).rejects.toThrow('ssh down');
    expect(cache.peek('system')).toBeUndefined();
    expect(await cache.getOrScan('system', scan)).toEqual({ hostname: 'pi-1' });
  });

  it('同時の呼び出しは 1 回のスキャンを共有する', async () => {
    const [a, b] = await Promise.all([cache.getOrScan('system', scan), cache.getOrScan('system', scan)]);
    expect(a).toEqual(b);
    expect(scans).toBe(1);
  });

  it('invalidate はカテゴリ単位または全体でエントリを消す', async () => {
    await cache.getOrScan('system', scan);
    await cache.getOrScan('hardware', scan);
    cache.invalidate('system');
    expect(cache.isFresh('system')).toBe(false);
    expect(cache.isFresh('hardware')).toBe(true);
    cache.invalidate();
    expect(cache.stats().entries).toBe(0);
  });

  it('status はカテゴリごとの TTL と残り時間を返す', async () => {
    await cache.getOrScan('system', scan);
    clock.advance(10_000);
    const status = cache.status();
    expect(status).toHaveLength(6);
    expect(status[0]).toEqual({
      category: 'system',
      ttlMs: 30_000,
      cached: true,
      capturedAt: '2026-03-01T12:00:00.000Z',
      expiresInMs: 20_000,
    });
    expect(status[1]).toEqual({ category: 'hardware', ttlMs: DEFAULT_TTLS.hardware, cached: false });
  });
});
