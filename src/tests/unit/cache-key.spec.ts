import { describe, expect, it } from 'vitest';

import { cacheEntryFileName, deriveCacheKey, sha256Hex } from '../../cache/cache-key.js';
import { stableStringify } from '../../cache/stable-stringify.js';

describe('stableStringify', () => {
  it('sorts object keys at every depth and keeps array order', () => {
    const value = { b: 1, a: { d: [{ z: 1, y: 2 }], c: 2 } };
    expect(stableStringify(value)).toBe('{"a":{"c":2,"d":[{"y":2,"z":1}]},"b":1}');
  });

  it('drops undefined members', () => {
    expect(stableStringify({ a: 'x', b: undefined })).toBe('{"a":"x"}');
  });

  it('renders a bare undefined as null', () => {
    expect(stableStringify(undefined)).toBe('null');
  });
});

describe('deriveCacheKey', () => {
  it('is a lowercase 64-character hex digest', () => {
    expect(deriveCacheKey('resolve_library_id', { libraryName: 'react', query: 'hooks' })).toMatch(/^[0-9a-f]{64}$/);
  });

  it('hashes the tool name and the canonical arguments', () => {
    const key = deriveCacheKey('query_docs', { query: 'routing', libraryId: '/vercel/next.js' });
    expect(key).toBe(sha256Hex('query_docs\n{"libraryId":"/vercel/next.js","query":"routing"}'));
  });

  it('ignores argument insertion order', () => {
    const first = deriveCacheKey('query_docs', { libraryId: '/facebook/react', query: 'hooks' });
    const second = deriveCacheKey('query_docs', { query: 'hooks', libraryId: '/facebook/react' });
    expect(first).toBe(second);
  });

  it('ignores insertion order inside nested objects', () => {
    const first = deriveCacheKey('query_docs', { filter: { lang: 'ts', version: '18' }, query: 'hooks' });
    const second = deriveCacheKey('query_docs', { query: 'hooks', filter: { version: '18', lang: 'ts' } });
    expect(first).toBe(second);
  });

  it('changes when an argument value changes', () => {
    const first = deriveCacheKey('query_docs', { libraryId: '/facebook/react', query: 'hooks' });
    const second = deriveCacheKey('query_docs', { libraryId: '/facebook/react', query: 'Hooks' });
    expect(first).not.toBe(second);
  });

  it('changes with the tool name for identical arguments', () => {
    const args = { query: 'hooks' };
    expect(deriveCacheKey('query_docs', args)).not.toBe(deriveCacheKey('resolve_library_id', args));
  });

  it('treats an absent member like an undefined one', () => {
    expect(deriveCacheKey('query_docs', { query: 'hooks', apiKey: undefined }))
      .toBe(deriveCacheKey('query_docs', { query: 'hooks' }));
  });
});

describe('cacheEntryFileName', () => {
  it('joins tool name and key', () => {
    const key = deriveCacheKey('query_docs', { query: 'hooks' });
    expect(cacheEntryFileName('query_docs', key)).toBe(`query_docs_${key}.json`);
  });

  it('rejects tool names that could leave the cache directory', () => {
    expect(() => cacheEntryFileName('../escape', 'abc123')).toThrow("invalid tool name for cache entry: '../escape'");
  });

  it('rejects keys that are not hex', () => {
    expect(() => cacheEntryFileName('query_docs', 'not-hex')).toThrow("invalid cache key: 'not-hex'");
  });
});
