import type { DeviceAddress, Recording, RecordingId } from './recording.js';

/**
 * ローカルのダウンロード状態
 * - absent: 未ダウンロード
 * - downloading: 取得中（中断された場合もこの状態のまま残ることがある）
 * - complete: ローカルファイルあり
 */
export type DownloadStatus = 'absent' | 'downloading' | 'complete';

/**
 * Catalog entry: Recording + local bookkeeping
 */
export interface CatalogEntry {
  recording: Recording;

  /** Last time this entry was observed or refreshed (ISO 8601) */
  lastSyncedAt: string;

  /** The device no longer reports this recording */
  stale: boolean;

  /** When the entry was first marked stale (ISO 8601) */
  staleSince: string | null;

  downloadStatus: DownloadStatus;

  /** Local file path once complete */
  localPath: string | null;

  /** Download completion timestamp (ISO 8601) */
  downloadedAt: string | null;
}

/**
 * 1デバイス分のカタログ
 */
export interface DeviceCatalog {
  /** Last successful listing (ISO 8601) */
  lastSyncedAt: string | null;

  /** Last sync error message, cleared on success */
  lastError: string | null;

  entries: Record<RecordingId, CatalogEntry>;
}

/**
 * 永続化されるカタログ全体
 */
export interface CatalogSnapshot {
  version: 1;
  devices: Record<DeviceAddress, DeviceCatalog>;
}

export function emptyCatalog(): CatalogSnapshot {
  return { version: 1, devices: {} };
}

export function emptyDeviceCatalog(): DeviceCatalog {
  return { lastSyncedAt: null, lastError: null, entries: {} };
}
