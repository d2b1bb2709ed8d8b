import { mkdir, open, readFile, rename, rm, stat, writeFile } from 'fs/promises';
import { setTimeout as sleep } from 'timers/promises';
import { dirname } from 'path';
import type { z } from 'zod';

export interface JsonFileStoreOptions<T> {
  path: string;
  schema: z.ZodType<T, z.ZodTypeDef, unknown>;
  /** Content used when the file does not exist yet */
  empty: () => T;
  /** Builds the error thrown when the file cannot be parsed */
  onCorrupt: (message: string) => Error;
  /** How long update() waits for another process's lock (default 30s) */
  lockTimeoutMs?: number;
  /** A lock file older than this is treated as left behind by a crashed process (default 10min) */
  staleLockMs?: number;
}

const LOCK_RETRY_DELAY_MS = 50;

function hasCode(err: unknown, code: string): boolean {
  return err instanceof Error && 'code' in err && err.code === code;
}

/**
 * 1つの JSON ファイルに永続化されるスナップショット
 *
 * - 書き込みは一時ファイル + rename で原子的に置き換える
 * - update() はプロセス内で直列化され、さらに "<path>.lock" でプロセス間でも排他する
 * - 壊れたファイルは上書きせず onCorrupt のエラーを throw する
 */
export class JsonFileStore<T> {
  private queue: Promise<unknown> = Promise.resolve();

  constructor(private readonly options: JsonFileStoreOptions<T>) {}

  get path(): string {
    return this.options.path;
  }

  async read(): Promise<T> {
    const { path, schema, empty, onCorrupt } = this.options;

    let raw: string;
    try {
      raw = await readFile(path, 'utf-8');
    } catch (err) {
      if (err instanceof Error && 'code' in err && err.code === 'ENOENT') {
        return empty();
      }
      throw err;
    }

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      throw onCorrupt(`${path} is not valid JSON: ${message}`);
    }

    const parsed = schema.safeParse(json);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      const where = issue && issue.path.length > 0 ? ` at ${issue.path.join('.')}` : '';
      throw onCorrupt(`${path} has an unexpected structure${where}: ${issue?.message ?? 'invalid'}`);
    }
    return parsed.data;
  }

  /**
   * スナップショットを読み込み、mutate で変更して書き戻す
   */
  update<R>(mutate: (data: T) => R | Promise<R>): Promise<R> {
    const run = this.queue.then(() =>
      this.withFileLock(async () => {
        const data = await this.read();
        const result = await mutate(data);
        await this.write(data);
        return result;
      }),
    );
    // 失敗は呼び出し元に返し、後続の update は続行できるようにする
    this.queue = run.catch(() => undefined);
    return run;
  }

  private async withFileLock<R>(fn: () => Promise<R>): Promise<R> {
    const { path, lockTimeoutMs = 30_000, staleLockMs = 10 * 60 * 1000 } = this.options;
    const lockPath = `${path}.lock`;
    await mkdir(dirname(path), { recursive: true });

    const deadline = Date.now() + lockTimeoutMs;
    for (;;) {
      try {
        const handle = await open(lockPath, 'wx');
        await handle.writeFile(`${process.pid}\n`, 'utf-8');
        await handle.close();
        break;
      } catch (err) {
        if (!hasCode(err, 'EEXIST')) {
          throw err;
        }
      }

      if (await this.isStale(lockPath, staleLockMs)) {
        await rm(lockPath, { force: true });
        continue;
      }
      if (Date.now() >= deadline) {
        throw new Error(`Timed out after ${lockTimeoutMs}ms waiting for lock ${lockPath}`);
      }
      await sleep(LOCK_RETRY_DELAY_MS);
    }

    try {
      return await fn();
    } finally {
      await rm(lockPath, { force: true });
    }
  }

  private async isStale(lockPath: string, staleLockMs: number): Promise<boolean> {
    try {
      const info = await stat(lockPath);
      return Date.now() - info.mtimeMs > staleLockMs;
    } catch (err) {
      // 確認前に解放された
      if (hasCode(err, 'ENOENT')) {
        return false;
      }
      throw err;
    }
  }

  private async write(data: T): Promise<void> {
    const { path } = this.options;
    await mkdir(dirname(path), { recursive: true });
    const tempPath = `${path}.tmp-${process.pid}`;
    try {
      await writeFile(tempPath, `${JSON.stringify(data, null, 2)}\n`, 'utf-8');
      await rename(tempPath, path);
    } catch (err) {
      await rm(tempPath, { force: true });
      throw err;
    }
  }
}
