import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdir, mkdtemp, readdir, readFile, rm, utimes, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { LockDirectory } from './locks.js';
import { DedupStore } from './dedup-store.js';

vi.mock('fs/promises', async (importOriginal) => {
  const actual = await importOriginal<typeof import('fs/promises')>();
  return { ...actual, readdir: vi.fn(actual.readdir) };
});

const SHA = 'c'.repeat(64);

describe('DedupStore', () => {
  let dir: string;
  let hashedDir: string;
  let locks: LockDirectory;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'objledger-dedup-'));
    hashedDir = join(dir, 'hashed-objects');
    await mkdir(hashedDir);
    locks = new LockDirectory(join(dir, '.locks'));
    await mkdir(locks.dir);
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  async function source(name: string, content = 'same bytes'): Promise<string> {
    const path = join(dir, name);
    await writeFile(path, content);
    return path;
  }

  it('keeps the extension of the first copy', async () => {
    const store = new DedupStore(hashedDir, locks);
    expect(await store.put(SHA, await source('image-0001.PNG'))).toBe('stored');
    // fresh instance so the in-memory cache is not consulted
    expect(await new DedupStore(hashedDir, locks).put(SHA, await source('image-0002.jpg'))).toBe('exists');

    expect(await readdir(hashedDir)).toEqual([`${SHA}.png`]);
    expect(await readFile(join(hashedDir, `${SHA}.png`), 'utf8')).toBe('same bytes');
  });

  it('stores objects without an extension under the bare hash', async () => {
    const store = new DedupStore(hashedDir, locks);
    await store.put(SHA, await source('stream-0007'));

    expect(await store.find(SHA)).toBe(join(hashedDir, SHA));
  });

  it('keeps a single blob under concurrent puts', async () => {
    const a = new DedupStore(hashedDir, locks);
    const b = new DedupStore(hashedDir, locks);
    const results = await Promise.all([
      a.put(SHA, await source('one.png')),
      b.put(SHA, await source('two.jpg')),
      a.put(SHA, await source('three.gif')),
    ]);

    expect(results.filter((r) => r === 'stored')).toHaveLength(1);
    const files = await readdir(hashedDir);
    expect(files).toHaveLength(1);
    expect(files[0].startsWith(SHA)).toBe(true);
  });

  it('finds a blob by its own name without listing the store', async () => {
    await new DedupStore(hashedDir, locks).put(SHA, await source('image-0001.png'));
    const store = new DedupStore(hashedDir, locks);
    vi.mocked(readdir).mockClear();

    expect(await store.find(SHA, '.png')).toBe(join(hashedDir, `${SHA}.png`));
    expect(await new DedupStore(hashedDir, locks).put(SHA, await source('image-0002.png'))).toBe('exists');
    expect(readdir).not.toHaveBeenCalled();
  });

  it('falls back to a listing for a copy stored under another extension', async () => {
    await new DedupStore(hashedDir, locks).put(SHA, await source('image-0001.png'));

    expect(await new DedupStore(hashedDir, locks).find(SHA, '.jpg')).toBe(join(hashedDir, `${SHA}.png`));
  });

  it('returns null for an unknown hash', async () => {
    expect(await new DedupStore(hashedDir, locks).find(SHA)).toBeNull();
  });

  it('sweeps only old temp files', async () => {
    const store = new DedupStore(hashedDir, locks);
    const old = join(hashedDir, `.tmp-${SHA}-0000aaaa`);
    const fresh = join(hashedDir, `.tmp-${SHA}-0000bbbb`);
    await writeFile(old, 'x');
    await writeFile(fresh, 'y');
    await writeFile(join(hashedDir, `${SHA}.bin`), 'z');
    const now = Date.now();
    const hourAgo = new Date(now - 3_600_000);
    await utimes(old, hourAgo, hourAgo);

    expect(await store.sweepStaleTemps(60_000, now)).toBe(1);
    expect((await readdir(hashedDir)).sort()).toEqual([`.tmp-${SHA}-0000bbbb`, `${SHA}.bin`]);
  });
});
