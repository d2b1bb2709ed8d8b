import type { CatalogEntryEntity, DeviceAddress, DeviceCatalog, RecordingRef } from '@dvr-archiver/common-types';

/**
 * Catalog Repository Interface
 *
 * CatalogEntry エンティティの永続化を抽象化
 * 書き込みはすべて単一ライター（read-modify-write の間は排他）
 * 実装: JsonFileCatalogRepository, PostgresCatalogRepository, InMemoryCatalogRepository
 *
 * 読み込み時にストアが壊れていれば CatalogCorruptError を throw する
 */
export interface ICatalogRepository {
  /**
   * カタログに存在するデバイス一覧
   */
  listDevices(): Promise<DeviceAddress[]>;

  /**
   * デバイスのエントリ一覧（stale を含む）
   */
  findByDevice(device: DeviceAddress): Promise<CatalogEntryEntity[]>;

  /**
   * すべてのエントリ
   */
  findAll(): Promise<CatalogEntryEntity[]>;

  findByRef(ref: RecordingRef): Promise<CatalogEntryEntity | null>;

  /**
   * デバイスの同期状態（エントリを除く）
   */
  getDeviceStatus(device: DeviceAddress): Promise<Omit<DeviceCatalog, 'entries'> | null>;

  /**
   * エントリを1件保存
   */
  save(entry: CatalogEntryEntity): Promise<void>;

  /**
   * 1デバイス分の同期結果をまとめて保存し、lastSyncedAt を更新、lastError をクリア
   */
  recordDeviceSync(device: DeviceAddress, changed: CatalogEntryEntity[], syncedAt: Date): Promise<void>;

  /**
   * デバイスの同期失敗を記録（エントリには触れない）
   */
  recordDeviceError(device: DeviceAddress, message: string): Promise<void>;
}
