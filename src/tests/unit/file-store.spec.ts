import fs from 'node:fs';
import fsPromises from 'node:fs/promises';
import path from 'node:path';

import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import type { ToolResult } from '../../tool-result.js';

import { CacheIOError, CacheWriteRejectedError } from '../../cache/cache-errors.js';
import { deriveCacheKey } from '../../cache/cache-key.js';
import {
  cacheEntryPath,
  clearCacheEntries,
  readCacheEntry,
  writeCacheEntry,
} from '../../cache/file-store.js';
import { isPlainObject } from '../../utils.js';
import { FIXED_MTIME_MS, cleanupTempDir, makeTempDir, setMtime } from '../fixtures/test-support.js';

const TOOL = 'query_docs';
const TTL_MS = 60_000;

const sampleResult: ToolResult = {
  content: [
    { type: 'text', text: 'first part' },
    { type: 'text', text: 'second part\nwith a newline' },
  ],
  structuredContent: {
    codeSnippets: [{ codeTitle: 'Example', codeList: [{ language: 'ts', code: 'const a = 1;' }] }],
    nested: { deeper: [1, [2, 3], { flag: true, nothing: null }] },
  },
};

describe('file store', () => {
  let dir: string;
  let key: string;

  beforeEach(() => {
    dir = makeTempDir('file-store');
    key = deriveCacheKey(TOOL, { libraryId: '/facebook/react', query: 'hooks' });
  });

  afterEach(() => {
    vi.restoreAllMocks();
    cleanupTempDir(dir);
  });

  const writeRaw = (content: string): string => {
    const file = cacheEntryPath(dir, TOOL, key);
    fs.writeFileSync(file, content, 'utf8');
    setMtime(file, FIXED_MTIME_MS);
    return file;
  };

  describe('readCacheEntry / writeCacheEntry', () => {
    it('returns what was written', async () => {
      await writeCacheEntry(dir, TOOL, key, sampleResult);
      setMtime(cacheEntryPath(dir, TOOL, key), FIXED_MTIME_MS);
      const lookup = await readCacheEntry(dir, TOOL, key, TTL_MS, FIXED_MTIME_MS + 1000);
      expect(lookup).toEqual({ status: 'hit', value: sampleResult, ageMs: 1000 });
    });

    it('keeps absent optional fields absent', async () => {
      const plain: ToolResult = { content: [{ type: 'text', text: 'only text' }] };
      await writeCacheEntry(dir, TOOL, key, plain);
      setMtime(cacheEntryPath(dir, TOOL, key), FIXED_MTIME_MS);
      const lookup = await readCacheEntry(dir, TOOL, key, TTL_MS, FIXED_MTIME_MS + 1);
      expect(lookup.status).toBe('hit');
      if (lookup.status !== 'hit') return;
      expect(lookup.value).toStrictEqual(plain);
    });

    it('keeps an own __proto__ member of the structured part', async () => {
      const structured: unknown = JSON.parse('{"__proto__":{"polluted":true},"title":"React"}');
      if (!isPlainObject(structured)) throw new Error('expected an object');
      const result: ToolResult = { content: [{ type: 'text', text: 'body' }], structuredContent: structured };
      await writeCacheEntry(dir, TOOL, key, result);
      setMtime(cacheEntryPath(dir, TOOL, key), FIXED_MTIME_MS);

      const lookup = await readCacheEntry(dir, TOOL, key, TTL_MS, FIXED_MTIME_MS + 1);
      expect(lookup.status).toBe('hit');
      if (lookup.status !== 'hit') return;
      const cached = lookup.value.structuredContent;
      expect(cached !== undefined && Object.prototype.hasOwnProperty.call(cached, '__proto__')).toBe(true);
      expect(JSON.stringify(cached)).toBe('{"__proto__":{"polluted":true},"title":"React"}');
    });

    it('writes the entry under {toolName}_{key}.json with no temporary files left behind', async () => {
      await writeCacheEntry(dir, TOOL, key, sampleResult);
      expect(fs.readdirSync(dir)).toEqual([`${TOOL}_${key}.json`]);
      expect(JSON.parse(fs.readFileSync(path.join(dir, `${TOOL}_${key}.json`), 'utf8'))).toEqual(sampleResult);
    });

    it('creates a missing cache directory on write', async () => {
      const nested = path.join(dir, 'a', 'b');
      await writeCacheEntry(nested, TOOL, key, sampleResult);
      expect(fs.existsSync(cacheEntryPath(nested, TOOL, key))).toBe(true);
    });

    it('lets the last writer win', async () => {
      await writeCacheEntry(dir, TOOL, key, sampleResult);
      const replacement: ToolResult = { content: [{ type: 'text', text: 'replacement' }] };
      await writeCacheEntry(dir, TOOL, key, replacement);
      setMtime(cacheEntryPath(dir, TOOL, key), FIXED_MTIME_MS);
      const lookup = await readCacheEntry(dir, TOOL, key, TTL_MS, FIXED_MTIME_MS + 1);
      expect(lookup).toEqual({ status: 'hit', value: replacement, ageMs: 1 });
    });

    it('refuses to store error results', async () => {
      const failure: ToolResult = { content: [{ type: 'text', text: 'boom' }], isError: true };
      await expect(writeCacheEntry(dir, TOOL, key, failure)).rejects.toBeInstanceOf(CacheWriteRejectedError);
      expect(fs.readdirSync(dir)).toEqual([]);
    });

    it('reports write failures as CacheIOError', async () => {
      const notADirectory = path.join(dir, 'plain-file');
      fs.writeFileSync(notADirectory, 'x');
      const error = await writeCacheEntry(notADirectory, TOOL, key, sampleResult).catch((err: unknown) => err);
      expect(error).toBeInstanceOf(CacheIOError);
      if (!(error instanceof CacheIOError)) return;
      expect(error.operation).toBe('write');
      expect(error.path).toBe(cacheEntryPath(notADirectory, TOOL, key));
      expect(error.message.startsWith(`failed to write cache entry ${cacheEntryPath(notADirectory, TOOL, key)}: `)).toBe(true);
    });

    it('reports a failed rename and removes the temporary file', async () => {
      fs.mkdirSync(cacheEntryPath(dir, TOOL, key));
      await expect(writeCacheEntry(dir, TOOL, key, sampleResult)).rejects.toBeInstanceOf(CacheIOError);
      expect(fs.readdirSync(dir)).toEqual([`${TOOL}_${key}.json`]);
    });
  });

  describe('freshness', () => {
    beforeEach(() => {
      writeRaw(JSON.stringify(sampleResult));
    });

    it('is a hit just inside the TTL', async () => {
      const lookup = await readCacheEntry(dir, TOOL, key, TTL_MS, FIXED_MTIME_MS + TTL_MS - 1);
      expect(lookup.status).toBe('hit');
    });

    it('is stale once the age reaches the TTL', async () => {
      expect(await readCacheEntry(dir, TOOL, key, TTL_MS, FIXED_MTIME_MS + TTL_MS))
        .toEqual({ status: 'stale', ageMs: TTL_MS });
    });

    it('is stale past the TTL', async () => {
      expect(await readCacheEntry(dir, TOOL, key, TTL_MS, FIXED_MTIME_MS + TTL_MS + 1))
        .toEqual({ status: 'stale', ageMs: TTL_MS + 1 });
    });

    it('is always stale with a TTL of 0', async () => {
      expect(await readCacheEntry(dir, TOOL, key, 0, FIXED_MTIME_MS)).toEqual({ status: 'stale', ageMs: 0 });
    });

    it('treats an entry dated in the future as stale', async () => {
      expect(await readCacheEntry(dir, TOOL, key, TTL_MS, FIXED_MTIME_MS - 1000))
        .toEqual({ status: 'stale', ageMs: -1000 });
    });

    it('reports staleness before reading content', async () => {
      writeRaw('not json at all');
      expect(await readCacheEntry(dir, TOOL, key, TTL_MS, FIXED_MTIME_MS + TTL_MS)).toEqual({ status: 'stale', ageMs: TTL_MS });
    });
  });

  describe('misses', () => {
    it('is absent when no entry exists', async () => {
      expect(await readCacheEntry(dir, TOOL, key, TTL_MS)).toEqual({ status: 'miss', reason: 'absent' });
    });

    it('is disabled when the directory does not exist', async () => {
      const missing = path.join(dir, 'not-mounted');
      expect(await readCacheEntry(missing, TOOL, key, TTL_MS)).toEqual({ status: 'miss', reason: 'disabled' });
      expect(fs.existsSync(missing)).toBe(false);
    });

    it('is disabled when the path is a file', async () => {
      const file = path.join(dir, 'plain-file');
      fs.writeFileSync(file, 'x');
      expect(await readCacheEntry(file, TOOL, key, TTL_MS)).toEqual({ status: 'miss', reason: 'disabled' });
    });

    it('is absent for a tool name that cannot name an entry', async () => {
      expect(await readCacheEntry(dir, '../escape', key, TTL_MS)).toEqual({ status: 'miss', reason: 'absent' });
    });

    it('is absent when the entry path is a directory', async () => {
      fs.mkdirSync(cacheEntryPath(dir, TOOL, key));
      expect(await readCacheEntry(dir, TOOL, key, TTL_MS)).toEqual({ status: 'miss', reason: 'absent' });
    });

    it.each([
      ['an empty file', ''],
      ['truncated JSON', '{"content": ['],
      ['a JSON array', '[]'],
      ['an object of the wrong shape', '{"foo":1}'],
      ['a non-text content part', '{"content":[{"type":"image","data":"x"}]}'],
      ['a stored error result', '{"content":[{"type":"text","text":"boom"}],"isError":true}'],
    ])('is corrupt for %s', async (_label, content) => {
      writeRaw(content);
      expect(await readCacheEntry(dir, TOOL, key, TTL_MS, FIXED_MTIME_MS + 1)).toEqual({ status: 'miss', reason: 'corrupt' });
    });
  });

  describe('clearCacheEntries', () => {
    const seedEntries = async (count: number): Promise<void> => {
      for (let i = 0; i < count; i += 1) {
        await writeCacheEntry(dir, TOOL, deriveCacheKey(TOOL, { query: `q${String(i)}` }), sampleResult);
      }
    };

    it('removes every entry and reports the count', async () => {
      await seedEntries(3);
      expect(await clearCacheEntries(dir)).toEqual({ status: 'cleared', removed: 3 });
      expect(fs.readdirSync(dir)).toEqual([]);
    });

    it('leaves files that are not entries in place', async () => {
      await seedEntries(2);
      fs.writeFileSync(path.join(dir, 'notes.txt'), 'keep me');
      fs.writeFileSync(path.join(dir, '.query_docs_abc.json.1.x.tmp'), 'in flight');
      fs.mkdirSync(path.join(dir, 'folder.json'));
      expect(await clearCacheEntries(dir)).toEqual({ status: 'cleared', removed: 2 });
      expect(fs.readdirSync(dir).sort()).toEqual(['.query_docs_abc.json.1.x.tmp', 'folder.json', 'notes.txt']);
    });

    it('removes symlinked entries but not their targets', async () => {
      const outside = makeTempDir('file-store-target');
      try {
        const target = path.join(outside, 'target.json');
        fs.writeFileSync(target, JSON.stringify(sampleResult));
        fs.symlinkSync(target, path.join(dir, `${TOOL}_abc.json`));
        expect(await clearCacheEntries(dir)).toEqual({ status: 'cleared', removed: 1 });
        expect(fs.readdirSync(dir)).toEqual([]);
        expect(fs.existsSync(target)).toBe(true);
      } finally {
        cleanupTempDir(outside);
      }
    });

    it('reports zero for an empty directory', async () => {
      expect(await clearCacheEntries(dir)).toEqual({ status: 'cleared', removed: 0 });
    });

    it('is a no-op on a second run', async () => {
      await seedEntries(1);
      await clearCacheEntries(dir);
      expect(await clearCacheEntries(dir)).toEqual({ status: 'cleared', removed: 0 });
    });

    it('reports disabled when the directory does not exist', async () => {
      const missing = path.join(dir, 'not-mounted');
      expect(await clearCacheEntries(missing)).toEqual({ status: 'disabled' });
      expect(fs.existsSync(missing)).toBe(false);
    });

    it('makes later lookups miss', async () => {
      await writeCacheEntry(dir, TOOL, key, sampleResult);
      await clearCacheEntries(dir);
      expect(await readCacheEntry(dir, TOOL, key, TTL_MS)).toEqual({ status: 'miss', reason: 'absent' });
    });

    it('raises CacheIOError naming the entries it could not remove', async () => {
      await seedEntries(3);
      const realUnlink = fsPromises.unlink;
      let calls = 0;
      vi.spyOn(fsPromises, 'unlink').mockImplementation(async (target) => {
        calls += 1;
        if (calls === 1) {
          throw Object.assign(new Error(`EACCES: permission denied, unlink '${String(target)}'`), { code: 'EACCES' });
        }
        await realUnlink(target);
      });
      const error = await clearCacheEntries(dir).catch((err: unknown) => err);
      expect(error).toBeInstanceOf(CacheIOError);
      if (!(error instanceof CacheIOError)) return;
      expect(error.operation).toBe('clear');
      expect(error.code).toBe('EACCES');
      expect(error.removed).toBe(2);
      expect(error.failedPaths).toHaveLength(1);
      expect(error.message.startsWith('failed to remove 1 cache entries: ')).toBe(true);
      expect(fs.readdirSync(dir)).toHaveLength(1);
    });
  });
});
