import { mkdtemp, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { LedgerCorruptError, UploadRecordEntity } from '@dvr-archiver/common-types';
import { JsonFileUploadLedgerRepository } from '../JsonFileUploadLedgerRepository.js';

const file = {
  identity: 'blake3:00ff',
  fileName: 'a.mp4',
  size: 10,
  mtimeMs: 1700000000000,
};

describe('JsonFileUploadLedgerRepository', () => {
  let dir: string;
  let path: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'dvr-ledger-'));
    path = join(dir, 'uploads.json');
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('identity をキーに保存・取得できる', async () => {
    const record = UploadRecordEntity.succeeded(file, 'remote-1', new Date('2024-05-01T10:00:00.000Z'));
    await new JsonFileUploadLedgerRepository(path).save(record);

    const repository = new JsonFileUploadLedgerRepository(path);

    expect((await repository.findByIdentity('blake3:00ff'))?.toDTO()).toEqual(record.toDTO());
    expect(await repository.findByIdentity('blake3:abcd')).toBeNull();
  });

  it('同じ identity の保存は1件に上書きされる', async () => {
    const repository = new JsonFileUploadLedgerRepository(path);
    const record = UploadRecordEntity.failed(file, 'HTTP 503');
    await repository.save(record);

    record.recordRetry({ remoteId: 'remote-2' });
    await repository.save(record);

    const all = await repository.findAll();
    expect(all).toHaveLength(1);
    expect(all[0]?.isSuccessful()).toBe(true);
  });

  it('success のレコードは失敗で上書きされない', async () => {
    const repository = new JsonFileUploadLedgerRepository(path);
    await repository.save(UploadRecordEntity.succeeded(file, 'remote-1'));

    await repository.save(UploadRecordEntity.failed(file, 'HTTP 503'));

    expect((await repository.findByIdentity('blake3:00ff'))?.toDTO()).toMatchObject({
      outcome: 'success',
      remoteId: 'remote-1',
    });
  });

  it('壊れた台帳は LedgerCorruptError', async () => {
    await writeFile(path, 'not json');

    await expect(new JsonFileUploadLedgerRepository(path).findAll()).rejects.toThrow(LedgerCorruptError);
  });
});
