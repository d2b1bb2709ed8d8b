import type pg from 'pg';
import type { CatalogEntry, DeviceAddress, DeviceCatalog, RecordingRef } from '@dvr-archiver/common-types';
import { CatalogCorruptError, CatalogEntryEntity } from '@dvr-archiver/common-types';
import type { ICatalogRepository } from '../../domain/repositories/ICatalogRepository.js';
import { catalogEntrySchema } from '../storage/snapshotSchemas.js';

interface CatalogEntryRow {
  device: string;
  recording_id: string;
  recording: unknown;
  last_synced_at: Date;
  stale: boolean;
  stale_since: Date | null;
  download_status: string;
  local_path: string | null;
  downloaded_at: Date | null;
}

interface CatalogDeviceRow {
  device: string;
  last_synced_at: Date | null;
  last_error: string | null;
}

const UPSERT_DEVICE = `INSERT INTO catalog_devices (device) VALUES ($1) ON CONFLICT (device) DO NOTHING`;

const UPSERT_ENTRY = `INSERT INTO catalog_entries
   (device, recording_id, recording, last_synced_at, stale, stale_since, download_status, local_path, downloaded_at)
   VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9)
   ON CONFLICT (device, recording_id) DO UPDATE SET
     recording = EXCLUDED.recording,
     last_synced_at = EXCLUDED.last_synced_at,
     stale = EXCLUDED.stale,
     stale_since = EXCLUDED.stale_since,
     download_status = EXCLUDED.download_status,
     local_path = EXCLUDED.local_path,
     downloaded_at = EXCLUDED.downloaded_at`;

/**
 * PostgreSQL Catalog Repository の実装
 *
 * CATALOG_BACKEND=postgres のとき JSON ファイルの代わりに使う
 */
export class PostgresCatalogRepository implements ICatalogRepository {
  constructor(private readonly pool: pg.Pool) {}

  async listDevices(): Promise<DeviceAddress[]> {
    const result = await this.pool.query<CatalogDeviceRow>('SELECT * FROM catalog_devices ORDER BY device');
    return result.rows.map((row) => row.device);
  }

  async findByDevice(device: DeviceAddress): Promise<CatalogEntryEntity[]> {
    const result = await this.pool.query<CatalogEntryRow>(
      'SELECT * FROM catalog_entries WHERE device = $1 ORDER BY recording_id',
      [device]
    );
    return result.rows.map((row) => CatalogEntryEntity.reconstitute(this.rowToDTO(row)));
  }

  async findAll(): Promise<CatalogEntryEntity[]> {
    const result = await this.pool.query<CatalogEntryRow>(
      'SELECT * FROM catalog_entries ORDER BY device, recording_id'
    );
    return result.rows.map((row) => CatalogEntryEntity.reconstitute(this.rowToDTO(row)));
  }

  async findByRef(ref: RecordingRef): Promise<CatalogEntryEntity | null> {
    const result = await this.pool.query<CatalogEntryRow>(
      'SELECT * FROM catalog_entries WHERE device = $1 AND recording_id = $2',
      [ref.device, ref.recordingId]
    );
    if (result.rows.length === 0) {
      return null;
    }
    return CatalogEntryEntity.reconstitute(this.rowToDTO(result.rows[0]));
  }

  async getDeviceStatus(device: DeviceAddress): Promise<Omit<DeviceCatalog, 'entries'> | null> {
    const result = await this.pool.query<CatalogDeviceRow>(
      'SELECT * FROM catalog_devices WHERE device = $1',
      [device]
    );
    if (result.rows.length === 0) {
      return null;
    }
    const row = result.rows[0];
    return {
      lastSyncedAt: row.last_synced_at ? row.last_synced_at.toISOString() : null,
      lastError: row.last_error,
    };
  }

  async save(entry: CatalogEntryEntity): Promise<void> {
    await this.withTransaction(async (client) => {
      await client.query(UPSERT_DEVICE, [entry.getRecording().device]);
      await this.upsertEntry(client, entry.toDTO());
    });
  }

  async recordDeviceSync(device: DeviceAddress, changed: CatalogEntryEntity[], syncedAt: Date): Promise<void> {
    await this.withTransaction(async (client) => {
      await client.query(UPSERT_DEVICE, [device]);
      // 同じデバイスの同期が並行しないよう行ロック
      await client.query('SELECT device FROM catalog_devices WHERE device = $1 FOR UPDATE', [device]);
      for (const entry of changed) {
        await this.upsertEntry(client, entry.toDTO());
      }
      await client.query(
        'UPDATE catalog_devices SET last_synced_at = $1, last_error = NULL WHERE device = $2',
        [syncedAt.toISOString(), device]
      );
    });
  }

  async recordDeviceError(device: DeviceAddress, message: string): Promise<void> {
    await this.pool.query(
      `INSERT INTO catalog_devices (device, last_error) VALUES ($1, $2)
       ON CONFLICT (device) DO UPDATE SET last_error = EXCLUDED.last_error`,
      [device, message]
    );
  }

  private async upsertEntry(client: pg.PoolClient, dto: CatalogEntry): Promise<void> {
    await client.query(UPSERT_ENTRY, [
      dto.recording.device,
      dto.recording.id,
      JSON.stringify(dto.recording),
      dto.lastSyncedAt,
      dto.stale,
      dto.staleSince,
      dto.downloadStatus,
      dto.localPath,
      dto.downloadedAt,
    ]);
  }

  private async withTransaction(fn: (client: pg.PoolClient) => Promise<void>): Promise<void> {
    const client = await this.pool.connect();
    try {
      await client.query('BEGIN');
      await fn(client);
      await client.query('COMMIT');
    } catch (err) {
      await client.query('ROLLBACK');
      throw err;
    } finally {
      client.release();
    }
  }

  private rowToDTO(row: CatalogEntryRow): CatalogEntry {
    const parsed = catalogEntrySchema.safeParse({
      recording: row.recording,
      lastSyncedAt: row.last_synced_at.toISOString(),
      stale: row.stale,
      staleSince: row.stale_since ? row.stale_since.toISOString() : null,
      downloadStatus: row.download_status,
      localPath: row.local_path,
      downloadedAt: row.downloaded_at ? row.downloaded_at.toISOString() : null,
    });
    if (!parsed.success) {
      throw new CatalogCorruptError(
        `catalog_entries row ${row.device}${row.recording_id} is invalid: ${parsed.error.issues[0]?.message ?? 'unknown'}`
      );
    }
    return parsed.data;
  }
}
