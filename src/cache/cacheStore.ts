/**
 * Cache tier contract
 *
 * Each tier (in-process, networked) implements this independently. Tiers
 * never throw: a failing backend answers like an empty one.
 */

export interface CacheEntry {
  value: unknown;
  expiresAt: number; // epoch ms
}

export interface CacheStore {
  readonly name: string;
  get(key: string): Promise<CacheEntry | null>;
  set(key: string, entry: CacheEntry): Promise<boolean>;
  getMany(keys: string[]): Promise<Map<string, CacheEntry>>;
  delete(key: string): Promise<boolean>;
  deletePattern(pattern: string): Promise<number>;
}

export function isExpired(entry: CacheEntry, now: number = Date.now()): boolean {
  return now >= entry.expiresAt;
}

export function isCacheEntry(value: unknown): value is CacheEntry {
  return (
    typeof value === 'object' &&
    value !== null &&
    'value' in value &&
    'expiresAt' in value &&
    typeof value.expiresAt === 'number'
  );
}

/**
 * Convert a key-value-store glob ("courses:2025*", "instructor:?mith") into a RegExp.
 * Supports *, ?, [...] classes and backslash escapes.
 */
export function globToRegExp(pattern: string): RegExp {
  let source = '';
  for (let i = 0; i < pattern.length; i++) {
    const char = pattern[i];
    if (char === '\\' && i + 1 < pattern.length) {
      source += escapeRegExp(pattern[++i]);
    } else if (char === '*') {
      source += '.*';
    } else if (char === '?') {
      source += '.';
    } else if (char === '[') {
      const close = pattern.indexOf(']', i + 1);
      if (close === -1) {
        source += '\\[';
        continue;
      }
      let body = pattern.slice(i + 1, close);
      if (body.startsWith('^')) body = '^' + body.slice(1).replace(/[\\\]]/g, '\\$&');
      else body = body.replace(/[\\\]^]/g, '\\$&');
      source += `[${body}]`;
      i = close;
    } else {
      source += escapeRegExp(char);
    }
  }
  return new RegExp(`^${source}$`);
}

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\/]/g, '\\$&');
}
