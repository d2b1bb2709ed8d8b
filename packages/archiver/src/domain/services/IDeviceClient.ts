import type { DeviceAddress, Recording, RecordingId, RecordingListing } from '@dvr-archiver/common-types';

/**
 * ストリーミング再生用マニフェスト
 */
export interface StreamManifest {
  /** HLS playlist URL */
  url: string;
  /** ISO 8601, if the device reports one */
  expiresAt: string | null;
}

/**
 * Device Client Interface
 *
 * デバイスへの読み取り専用アクセスを抽象化
 * 実装: TabloDeviceClient
 */
export interface IDeviceClient {
  /**
   * 軽量なリスティング呼び出し（Recording ID 一覧）
   */
  listRecordings(device: DeviceAddress): Promise<RecordingListing[]>;

  /**
   * 1件分の完全なメタデータを取得（重い呼び出し）
   */
  getRecording(device: DeviceAddress, recordingId: RecordingId): Promise<Recording>;

  /**
   * ストリーミングマニフェストの取得
   */
  getManifest(device: DeviceAddress, recordingId: RecordingId): Promise<StreamManifest>;
}
