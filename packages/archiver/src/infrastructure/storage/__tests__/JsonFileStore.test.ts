import { mkdir, mkdtemp, readFile, readdir, rm, utimes, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { z } from 'zod';
import { JsonFileStore } from '../JsonFileStore.js';
import type { JsonFileStoreOptions } from '../JsonFileStore.js';

class StoreCorruptError extends Error {}

const counterSchema = z.object({ count: z.number().int() });
type Counter = z.infer<typeof counterSchema>;

describe('JsonFileStore', () => {
  let dir: string;
  let path: string;
  let store: JsonFileStore<Counter>;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'dvr-store-'));
    path = join(dir, 'nested', 'counter.json');
    store = new JsonFileStore({
      path,
      schema: counterSchema,
      empty: () => ({ count: 0 }),
      onCorrupt: (message) => new StoreCorruptError(message),
    });
  });

  function openStore(options: Partial<JsonFileStoreOptions<Counter>> = {}) {
    return new JsonFileStore({
      path,
      schema: counterSchema,
      empty: () => ({ count: 0 }),
      onCorrupt: (message) => new StoreCorruptError(message),
      ...options,
    });
  }

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('ファイルがなければ空の内容を返す', async () => {
    await expect(store.read()).resolves.toEqual({ count: 0 });
  });

  it('update は整形した JSON を書き込み、一時ファイルを残さない', async () => {
    const result = await store.update((data) => {
      data.count = 5;
      return 'done';
    });

    expect(result).toBe('done');
    expect(await readFile(path, 'utf-8')).toBe('{\n  "count": 5\n}\n');
    expect(await readdir(join(dir, 'nested'))).toEqual(['counter.json']);
  });

  it('並行した update は直列化され、更新が失われない', async () => {
    await Promise.all(
      Array.from({ length: 20 }, () =>
        store.update((data) => {
          data.count += 1;
        }),
      ),
    );

    await expect(store.read()).resolves.toEqual({ count: 20 });
  });

  it('mutate が失敗しても後続の update は続行できる', async () => {
    const failing = store.update(() => {
      throw new Error('mutation failed');
    });
    const next = store.update((data) => {
      data.count = 1;
    });

    await expect(failing).rejects.toThrow('mutation failed');
    await next;
    await expect(store.read()).resolves.toEqual({ count: 1 });
  });

  it('壊れた JSON は onCorrupt のエラーになり、ファイルは上書きされない', async () => {
    await store.update(() => undefined);
    await writeFile(path, '{"count": ');

    await expect(store.read()).rejects.toThrow(StoreCorruptError);
    await expect(
      store.update((data) => {
        data.count = 99;
      }),
    ).rejects.toThrow(/is not valid JSON/);
    expect(await readFile(path, 'utf-8')).toBe('{"count": ');
  });

  it('構造が違う JSON も破損として扱う', async () => {
    await store.update(() => undefined);
    await writeFile(path, JSON.stringify({ count: 'three' }));

    await expect(store.read()).rejects.toThrow(`${path} has an unexpected structure at count: Expected number, received string`);
  });

  it('同じファイルを開いた別インスタンスの update も失われない', async () => {
    const other = openStore();
    const increment = (target: JsonFileStore<Counter>) =>
      target.update(async (data) => {
        const before = data.count;
        await new Promise((resolve) => setTimeout(resolve, 1));
        data.count = before + 1;
      });

    await Promise.all(Array.from({ length: 10 }, (_, i) => increment(i % 2 === 0 ? store : other)));

    await expect(store.read()).resolves.toEqual({ count: 10 });
    expect(await readdir(join(dir, 'nested'))).toEqual(['counter.json']);
  });

  it('他のプロセスがロックを持っていればタイムアウトする', async () => {
    await mkdir(join(dir, 'nested'), { recursive: true });
    await writeFile(`${path}.lock`, '99999\n');
    const waiting = openStore({ lockTimeoutMs: 100 });

    await expect(
      waiting.update((data) => {
        data.count = 1;
      }),
    ).rejects.toThrow(`Timed out after 100ms waiting for lock ${path}.lock`);
    expect(await readFile(`${path}.lock`, 'utf-8')).toBe('99999\n');
  });

  it('古いロックファイルは取り除いて更新する', async () => {
    await mkdir(join(dir, 'nested'), { recursive: true });
    await writeFile(`${path}.lock`, '99999\n');
    const old = new Date(Date.now() - 60 * 60 * 1000);
    await utimes(`${path}.lock`, old, old);

    await store.update((data) => {
      data.count = 3;
    });

    await expect(store.read()).resolves.toEqual({ count: 3 });
    expect(await readdir(join(dir, 'nested'))).toEqual(['counter.json']);
  });
});
