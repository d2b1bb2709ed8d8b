import type { CatalogEntry, DeviceAddress, DeviceCatalog, RecordingRef } from '@dvr-archiver/common-types';
import { CatalogEntryEntity } from '@dvr-archiver/common-types';
import type { ICatalogRepository } from '../../domain/repositories/ICatalogRepository.js';

interface DeviceState {
  lastSyncedAt: string | null;
  lastError: string | null;
  entries: Map<string, CatalogEntry>;
}

/**
 * In-Memory Catalog Repository の実装
 *
 * テスト用。DTO をコピーして保持するため、保存後のエンティティ変更は反映されない
 */
export class InMemoryCatalogRepository implements ICatalogRepository {
  private devices: Map<DeviceAddress, DeviceState> = new Map();

  async listDevices(): Promise<DeviceAddress[]> {
    return Array.from(this.devices.keys()).sort();
  }

  async findByDevice(device: DeviceAddress): Promise<CatalogEntryEntity[]> {
    const state = this.devices.get(device);
    if (!state) {
      return [];
    }
    return Array.from(state.entries.values()).map((entry) => CatalogEntryEntity.reconstitute(entry));
  }

  async findAll(): Promise<CatalogEntryEntity[]> {
    return Array.from(this.devices.values()).flatMap((state) =>
      Array.from(state.entries.values()).map((entry) => CatalogEntryEntity.reconstitute(entry)),
    );
  }

  async findByRef(ref: RecordingRef): Promise<CatalogEntryEntity | null> {
    const entry = this.devices.get(ref.device)?.entries.get(ref.recordingId);
    return entry ? CatalogEntryEntity.reconstitute(entry) : null;
  }

  async getDeviceStatus(device: DeviceAddress): Promise<Omit<DeviceCatalog, 'entries'> | null> {
    const state = this.devices.get(device);
    return state ? { lastSyncedAt: state.lastSyncedAt, lastError: state.lastError } : null;
  }

  async save(entry: CatalogEntryEntity): Promise<void> {
    const dto = entry.toDTO();
    this.stateOf(dto.recording.device).entries.set(dto.recording.id, dto);
  }

  async recordDeviceSync(device: DeviceAddress, changed: CatalogEntryEntity[], syncedAt: Date): Promise<void> {
    const state = this.stateOf(device);
    for (const entry of changed) {
      const dto = entry.toDTO();
      state.entries.set(dto.recording.id, dto);
    }
    state.lastSyncedAt = syncedAt.toISOString();
    state.lastError = null;
  }

  async recordDeviceError(device: DeviceAddress, message: string): Promise<void> {
    this.stateOf(device).lastError = message;
  }

  /**
   * テスト用: すべてのデータをクリア
   */
  clear(): void {
    this.devices.clear();
  }

  private stateOf(device: DeviceAddress): DeviceState {
    let state = this.devices.get(device);
    if (!state) {
      state = { lastSyncedAt: null, lastError: null, entries: new Map() };
      this.devices.set(device, state);
    }
    return state;
  }
}
