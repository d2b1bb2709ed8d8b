import { describe, it, expect, beforeEach, afterAll } from 'vitest';
import type { Recording } from '@dvr-archiver/common-types';
import { CatalogCorruptError, CatalogEntryEntity } from '@dvr-archiver/common-types';
import { PostgresCatalogRepository } from '../PostgresCatalogRepository.js';
import { getTestPool, cleanDatabase, closeTestPool } from './db-test-helper.js';

const DEVICE = '10.0.0.5';
const SYNCED_AT = new Date('2024-03-02T10:00:00.000Z');

function recording(id: string, device = DEVICE): Recording {
  return {
    id,
    device,
    category: 'series',
    showTitle: 'Nature Hour',
    episodeTitle: 'Owls',
    airDate: '2024-03-01T20:00Z',
    duration: 3600,
    protected: false,
    episodeSeason: 1,
    episodeNumber: 2,
  };
}

describe('PostgresCatalogRepository', () => {
  const pool = getTestPool();
  const repository = new PostgresCatalogRepository(pool);

  beforeEach(async () => {
    await cleanDatabase(pool);
  });

  afterAll(async () => {
    await closeTestPool();
  });

  describe('save / findByRef', () => {
    it('エントリを保存して取得できる', async () => {
      const entry = CatalogEntryEntity.create(recording('/recordings/series/episodes/1'), SYNCED_AT);
      await repository.save(entry);

      const found = await repository.findByRef({ device: DEVICE, recordingId: '/recordings/series/episodes/1' });
      expect(found?.toDTO()).toEqual(entry.toDTO());
    });

    it('同じ参照で保存すると上書きされる（UPSERT）', async () => {
      const entry = CatalogEntryEntity.create(recording('/recordings/series/episodes/1'), SYNCED_AT);
      await repository.save(entry);

      entry.completeDownload('/data/Nature_Hour_-_Owls_-_S01E02.mp4', new Date('2024-03-03T00:00:00.000Z'));
      await repository.save(entry);

      const found = await repository.findByRef({ device: DEVICE, recordingId: '/recordings/series/episodes/1' });
      expect(found?.getDownloadStatus()).toBe('complete');
      expect(found?.getLocalPath()).toBe('/data/Nature_Hour_-_Owls_-_S01E02.mp4');
    });

    it('存在しない参照で取得するとnullを返す', async () => {
      expect(await repository.findByRef({ device: DEVICE, recordingId: '/recordings/series/episodes/9' })).toBeNull();
    });
  });

  describe('recordDeviceSync', () => {
    it('変更されたエントリと同期時刻をまとめて書き込む', async () => {
      const entries = [
        CatalogEntryEntity.create(recording('/recordings/series/episodes/2'), SYNCED_AT),
        CatalogEntryEntity.create(recording('/recordings/series/episodes/1'), SYNCED_AT),
      ];

      await repository.recordDeviceSync(DEVICE, entries, SYNCED_AT);

      expect(await repository.listDevices()).toEqual([DEVICE]);
      expect((await repository.findByDevice(DEVICE)).map((e) => e.getRecording().id)).toEqual([
        '/recordings/series/episodes/1',
        '/recordings/series/episodes/2',
      ]);
      expect(await repository.getDeviceStatus(DEVICE)).toEqual({
        lastSyncedAt: '2024-03-02T10:00:00.000Z',
        lastError: null,
      });
    });

    it('成功した同期は前回のエラーを消す', async () => {
      await repository.recordDeviceError(DEVICE, 'connect ECONNREFUSED');
      expect((await repository.getDeviceStatus(DEVICE))?.lastError).toBe('connect ECONNREFUSED');

      await repository.recordDeviceSync(DEVICE, [], SYNCED_AT);

      expect((await repository.getDeviceStatus(DEVICE))?.lastError).toBeNull();
    });
  });

  describe('findAll', () => {
    it('デバイス → Recording ID の順で返す', async () => {
      await repository.save(CatalogEntryEntity.create(recording('/recordings/series/episodes/3', '10.0.0.6'), SYNCED_AT));
      await repository.save(CatalogEntryEntity.create(recording('/recordings/series/episodes/4'), SYNCED_AT));

      const all = await repository.findAll();
      expect(all.map((e) => e.getRecording().device)).toEqual(['10.0.0.5', '10.0.0.6']);
    });

    it('壊れた行は CatalogCorruptError', async () => {
      await pool.query(`INSERT INTO catalog_devices (device) VALUES ($1)`, [DEVICE]);
      await pool.query(
        `INSERT INTO catalog_entries (device, recording_id, recording, last_synced_at) VALUES ($1, $2, $3, $4)`,
        [DEVICE, '/recordings/series/episodes/5', JSON.stringify({ id: 5 }), SYNCED_AT.toISOString()]
      );

      await expect(repository.findAll()).rejects.toThrow(CatalogCorruptError);
    });
  });

  it('未知のデバイスの状態はnull', async () => {
    expect(await repository.getDeviceStatus('10.0.0.99')).toBeNull();
  });
});
