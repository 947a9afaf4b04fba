import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { globToRegExp } from '../cacheStore.js';
import { courseCacheKey, ratingCacheKey } from '../keys.js';
import { MemoryStore } from '../memoryStore.js';

const NOW = new Date('2025-08-01T12:00:00Z').getTime();

describe('MemoryStore', () => {
  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(NOW);
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('returns what was stored until it expires', async () => {
    const store = new MemoryStore();
    const entry = { value: { title: 'Calculus I' }, expiresAt: NOW + 60_000 };

    expect(await store.set('courses:202508:MATH', entry)).toBe(true);
    expect(await store.get('courses:202508:MATH')).toEqual(entry);

    vi.setSystemTime(NOW + 60_000);
    expect(await store.get('courses:202508:MATH')).toBeNull();
    expect(store.size()).toBe(0);
  });

  it('refuses an already expired entry', async () => {
    const store = new MemoryStore();
    expect(await store.set('stale', { value: 1, expiresAt: NOW - 1 })).toBe(false);
    expect(await store.get('stale')).toBeNull();
  });

  it('evicts the least recently used key at capacity', async () => {
    const store = new MemoryStore(2);
    const entry = (value: number) => ({ value, expiresAt: NOW + 1_000 });

    await store.set('a', entry(1));
    await store.set('b', entry(2));
    await store.get('a');
    await store.set('c', entry(3));

    expect(await store.get('b')).toBeNull();
    expect((await store.get('a'))?.value).toBe(1);
    expect((await store.get('c'))?.value).toBe(3);
  });

  it('answers getMany with the keys it holds', async () => {
    const store = new MemoryStore();
    await store.set('x', { value: 'x', expiresAt: NOW + 1_000 });

    const found = await store.getMany(['x', 'y']);
    expect([...found.keys()]).toEqual(['x']);
  });

  it('deletes by glob pattern', async () => {
    const store = new MemoryStore();
    const entry = { value: [], expiresAt: NOW + 1_000 };
    await store.set('courses:202508:CSC', entry);
    await store.set('courses:202508:MATH', entry);
    await store.set('courses:202601:CSC', entry);
    await store.set('instructor:jane_smith', entry);

    expect(await store.deletePattern('courses:202508:*')).toBe(2);
    expect(store.size()).toBe(2);
    expect(await store.delete('instructor:jane_smith')).toBe(true);
    expect(await store.delete('instructor:jane_smith')).toBe(false);
  });
});

describe('globToRegExp', () => {
  it('supports star, question mark and classes', () => {
    expect(globToRegExp('courses:*').test('courses:202508:CSC')).toBe(true);
    expect(globToRegExp('instructor:?ane_smith').test('instructor:jane_smith')).toBe(true);
    expect(globToRegExp('courses:2025[01]8:*').test('courses:202508:CSC')).toBe(true);
    expect(globToRegExp('courses:2025[^0]8:*').test('courses:202508:CSC')).toBe(false);
  });

  it('treats regex characters literally', () => {
    expect(globToRegExp('a.b').test('axb')).toBe(false);
    expect(globToRegExp('a\\*b').test('a*b')).toBe(true);
    expect(globToRegExp('a\\*b').test('aXb')).toBe(false);
  });
});

describe('cache keys', () => {
  it('normalizes subject and instructor names', () => {
    expect(courseCacheKey('202508', ' csc ')).toBe('courses:202508:CSC');
    expect(ratingCacheKey('test-school', '  Jane   SMITH ')).toBe('instructor:test-school:jane_smith');
    expect(ratingCacheKey('other-school', 'Jane Smith')).not.toBe(ratingCacheKey('test-school', 'Jane Smith'));
  });
});
