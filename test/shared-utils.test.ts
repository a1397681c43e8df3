import { describe, it, expect, vi, afterEach } from 'vitest';
import { addDays, dateRange, daysBetween, fromUnixSeconds } from '../src/shared/utils/dates';
import { average, roundTo } from '../src/shared/utils/numbers';
import { createSeededRandom } from '../src/shared/utils/seeded-random';
import { TtlCache } from '../src/shared/utils/ttl-cache';
import { Logger, LogLevel, parseLogLevel } from '../src/shared/utils/logger';
import { PredictionError } from '../src/shared/utils/errors';

describe('dates', () => {
  it('does calendar arithmetic across month and leap boundaries', () => {
    expect(addDays('2024-02-28', 1)).toBe('2024-02-29');
    expect(addDays('2024-03-01', -1)).toBe('2024-02-29');
    expect(daysBetween('2024-05-01', '2024-06-30')).toBe(60);
    expect(daysBetween('2024-06-30', '2024-05-01')).toBe(-60);
  });

  it('lists an inclusive range and nothing for an inverted one', () => {
    expect(dateRange('2024-06-28', '2024-07-01')).toEqual(['2024-06-28', '2024-06-29', '2024-06-30', '2024-07-01']);
    expect(dateRange('2024-06-30', '2024-06-29')).toEqual([]);
  });

  it('converts unix seconds to a UTC calendar date', () => {
    expect(fromUnixSeconds(1719748800)).toBe('2024-06-30');
  });

  it('rejects malformed dates', () => {
    expect(() => addDays('2024-13-45', 1)).toThrow('Invalid calendar date: 2024-13-45');
  });
});

describe('numbers', () => {
  it('rounds half away from zero', () => {
    expect(roundTo(1.005, 2)).toBe(1.01);
    expect(roundTo(-1.005, 2)).toBe(-1.01);
    expect(roundTo(2.345, 1)).toBe(2.3);
  });

  it('averages', () => {
    expect(average([])).toBeNull();
    expect(average([2, 4, 9])).toBe(5);
  });
});

describe('createSeededRandom', () => {
  it('repeats the same sequence for the same seed', () => {
    const first = createSeededRandom(1234);
    const second = createSeededRandom('1234');
    const a = [first(), first(), first()];

    expect([second(), second(), second()]).toEqual(a);
    for (const value of a) {
      expect(value).toBeGreaterThanOrEqual(0);
      expect(value).toBeLessThan(1);
    }
  });

  it('diverges for different seeds', () => {
    expect(createSeededRandom(1234)()).not.toBe(createSeededRandom(4321)());
  });
});

describe('TtlCache', () => {
  it('expires entries after the ttl', () => {
    let now = 0;
    const cache = new TtlCache<string>({ ttlMs: 1000, now: () => now });
    cache.set('k', 'v');

    now = 999;
    expect(cache.get('k')).toBe('v');
    now = 1000;
    expect(cache.get('k')).toBeNull();
    expect(cache.size).toBe(0);
  });

  it('does not store null or uncacheable results', async () => {
    const cache = new TtlCache<number[]>({ ttlMs: 1000 });
    const compute = vi.fn(async (): Promise<number[] | null> => []);

    await cache.getOrCompute('empty', compute, values => values.length > 0);
    await cache.getOrCompute('empty', compute, values => values.length > 0);
    expect(compute).toHaveBeenCalledTimes(2);

    await cache.getOrCompute('none', async () => null);
    expect(cache.size).toBe(0);
  });

  it('serves a stored value without recomputing', async () => {
    const cache = new TtlCache<number>({ ttlMs: 1000 });
    const compute = vi.fn(async () => 42);

    expect(await cache.getOrCompute('answer', compute)).toBe(42);
    expect(await cache.getOrCompute('answer', compute)).toBe(42);
    expect(compute).toHaveBeenCalledTimes(1);
  });

  it('clears by prefix', () => {
    const cache = new TtlCache<number>({ ttlMs: 1000 });
    cache.set('current:farm-1', 1);
    cache.set('current:farm-2', 2);
    cache.set('forecast:farm-1:3', 3);

    expect(cache.clear('current:')).toBe(2);
    expect(cache.size).toBe(1);
  });

  it('stores nothing when the ttl is zero', () => {
    const cache = new TtlCache<number>({ ttlMs: 0 });
    cache.set('k', 1);
    expect(cache.get('k')).toBeNull();
  });
});

describe('Logger', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('parses levels case-insensitively with a fallback', () => {
    expect(parseLogLevel('warn')).toBe(LogLevel.WARN);
    expect(parseLogLevel('verbose', LogLevel.ERROR)).toBe(LogLevel.ERROR);
  });

  it('writes errors as JSON with merged child context', () => {
    const write = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const logger = new Logger({ service: 'test' }, LogLevel.ERROR).child({ component: 'Lookup' });

    logger.error('Lookup failed', new PredictionError('Failed to execute prediction model', new Error('bad input')), { farmId: 'farm-1' });

    expect(write).toHaveBeenCalledTimes(1);
    const entry = JSON.parse(String(write.mock.calls[0][0]));
    expect(entry.level).toBe('ERROR');
    expect(entry.message).toBe('Lookup failed');
    expect(entry.context).toEqual({ service: 'test', component: 'Lookup' });
    expect(entry.data.farmId).toBe('farm-1');
    expect(entry.data.error.name).toBe('PredictionError');
    expect(entry.data.error.message).toBe('Failed to execute prediction model: bad input');
    expect(entry.data.error.cause.message).toBe('bad input');
  });
});
