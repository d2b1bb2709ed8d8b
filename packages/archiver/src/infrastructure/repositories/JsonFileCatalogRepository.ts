import type {
  CatalogSnapshot,
  DeviceAddress,
  DeviceCatalog,
  RecordingRef,
} from '@dvr-archiver/common-types';
import {
  CatalogCorruptError,
  CatalogEntryEntity,
  emptyCatalog,
  emptyDeviceCatalog,
} from '@dvr-archiver/common-types';
import type { ICatalogRepository } from '../../domain/repositories/ICatalogRepository.js';
import { JsonFileStore } from '../storage/JsonFileStore.js';
import { catalogSnapshotSchema } from '../storage/snapshotSchemas.js';

function deviceOf(snapshot: CatalogSnapshot, device: DeviceAddress): DeviceCatalog {
  const existing = snapshot.devices[device];
  if (existing) {
    return existing;
  }
  const created = emptyDeviceCatalog();
  snapshot.devices[device] = created;
  return created;
}

/**
 * JSON ファイルに永続化する Catalog Repository（デフォルト）
 *
 * ファイル構造: { version: 1, devices: { [address]: { lastSyncedAt, lastError, entries } } }
 */
export class JsonFileCatalogRepository implements ICatalogRepository {
  private readonly store: JsonFileStore<CatalogSnapshot>;

  constructor(path: string) {
    this.store = new JsonFileStore({
      path,
      schema: catalogSnapshotSchema,
      empty: emptyCatalog,
      onCorrupt: (message) => new CatalogCorruptError(message),
    });
  }

  async listDevices(): Promise<DeviceAddress[]> {
    const snapshot = await this.store.read();
    return Object.keys(snapshot.devices).sort();
  }

  async findByDevice(device: DeviceAddress): Promise<CatalogEntryEntity[]> {
    const snapshot = await this.store.read();
    const entries = snapshot.devices[device]?.entries ?? {};
    return Object.values(entries).map((entry) => CatalogEntryEntity.reconstitute(entry));
  }

  async findAll(): Promise<CatalogEntryEntity[]> {
    const snapshot = await this.store.read();
    return Object.values(snapshot.devices).flatMap((deviceCatalog) =>
      Object.values(deviceCatalog.entries).map((entry) => CatalogEntryEntity.reconstitute(entry)),
    );
  }

  async findByRef(ref: RecordingRef): Promise<CatalogEntryEntity | null> {
    const snapshot = await this.store.read();
    const entry = snapshot.devices[ref.device]?.entries[ref.recordingId];
    return entry ? CatalogEntryEntity.reconstitute(entry) : null;
  }

  async getDeviceStatus(device: DeviceAddress): Promise<Omit<DeviceCatalog, 'entries'> | null> {
    const snapshot = await this.store.read();
    const deviceCatalog = snapshot.devices[device];
    return deviceCatalog ? { lastSyncedAt: deviceCatalog.lastSyncedAt, lastError: deviceCatalog.lastError } : null;
  }

  async save(entry: CatalogEntryEntity): Promise<void> {
    const dto = entry.toDTO();
    await this.store.update((snapshot) => {
      deviceOf(snapshot, dto.recording.device).entries[dto.recording.id] = dto;
    });
  }

  async recordDeviceSync(device: DeviceAddress, changed: CatalogEntryEntity[], syncedAt: Date): Promise<void> {
    await this.store.update((snapshot) => {
      const deviceCatalog = deviceOf(snapshot, device);
      for (const entry of changed) {
        const dto = entry.toDTO();
        deviceCatalog.entries[dto.recording.id] = dto;
      }
      deviceCatalog.lastSyncedAt = syncedAt.toISOString();
      deviceCatalog.lastError = null;
    });
  }

  async recordDeviceError(device: DeviceAddress, message: string): Promise<void> {
    await this.store.update((snapshot) => {
      deviceOf(snapshot, device).lastError = message;
    });
  }
}
