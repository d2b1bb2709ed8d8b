import type { Recording, RecordingRef } from '../recording.js';
import type { CatalogEntry, DownloadStatus } from '../catalog.js';
import { InvalidStateTransitionError } from '../errors/DomainErrors.js';

/**
 * CatalogEntry ドメインエンティティ
 *
 * ビジネスルール:
 * - Recording の識別子（device + id）は一度作成されたら変わらない
 * - デバイスから消えたエントリは削除せず stale としてマークする
 * - ダウンロード状態は absent -> downloading -> complete の順に進む
 *   （失敗時は downloading -> absent に戻す）
 */
export class CatalogEntryEntity {
  private constructor(
    private recording: Recording,
    private lastSyncedAt: Date,
    private stale: boolean,
    private staleSince: Date | undefined,
    private downloadStatus: DownloadStatus,
    private localPath: string | undefined,
    private downloadedAt: Date | undefined
  ) {}

  /**
   * 初めて観測したRecordingからエントリを作成
   */
  static create(recording: Recording, now: Date = new Date()): CatalogEntryEntity {
    return new CatalogEntryEntity(recording, now, false, undefined, 'absent', undefined, undefined);
  }

  /**
   * 永続化されたデータからエントリを復元
   */
  static reconstitute(data: CatalogEntry): CatalogEntryEntity {
    return new CatalogEntryEntity(
      data.recording,
      new Date(data.lastSyncedAt),
      data.stale,
      data.staleSince ? new Date(data.staleSince) : undefined,
      data.downloadStatus,
      data.localPath ?? undefined,
      data.downloadedAt ? new Date(data.downloadedAt) : undefined
    );
  }

  /**
   * メタデータを更新（識別子は変更不可）
   */
  refresh(recording: Recording, now: Date = new Date()): void {
    this.assertSameIdentity(recording);
    this.recording = recording;
    this.lastSyncedAt = now;
  }

  /**
   * デバイスが報告しなくなったエントリを stale にする
   */
  markStale(now: Date = new Date()): void {
    if (this.stale) {
      return;
    }
    this.stale = true;
    this.staleSince = now;
  }

  /**
   * stale だったRecordingがデバイスに再出現した
   */
  revive(recording: Recording, now: Date = new Date()): void {
    this.refresh(recording, now);
    this.stale = false;
    this.staleSince = undefined;
  }

  /**
   * ビジネスルール: ダウンロード開始
   * complete からの再ダウンロード（上書き）も許可
   */
  startDownload(): void {
    if (this.downloadStatus === 'downloading') {
      throw new InvalidStateTransitionError(
        `Recording ${this.recording.id} on ${this.recording.device} is already downloading`
      );
    }
    this.downloadStatus = 'downloading';
  }

  /**
   * ビジネスルール: ダウンロード完了
   * 既存ファイルを再利用する場合は absent からも直接遷移できる
   */
  completeDownload(localPath: string, now: Date = new Date()): void {
    this.downloadStatus = 'complete';
    this.localPath = localPath;
    this.downloadedAt = now;
  }

  /**
   * ビジネスルール: ダウンロード失敗
   * downloading 状態からのみ absent に戻せる
   */
  resetDownload(): void {
    if (this.downloadStatus !== 'downloading') {
      throw new InvalidStateTransitionError(
        `Cannot reset download from state: ${this.downloadStatus}. Must be in 'downloading' state.`
      );
    }
    this.downloadStatus = 'absent';
  }

  isStale(): boolean {
    return this.stale;
  }

  isDownloaded(): boolean {
    return this.downloadStatus === 'complete';
  }

  // Getters
  getRecording(): Recording {
    return this.recording;
  }

  getRef(): RecordingRef {
    return { device: this.recording.device, recordingId: this.recording.id };
  }

  getDownloadStatus(): DownloadStatus {
    return this.downloadStatus;
  }

  getLocalPath(): string | undefined {
    return this.localPath;
  }

  getLastSyncedAt(): Date {
    return this.lastSyncedAt;
  }

  getStaleSince(): Date | undefined {
    return this.staleSince;
  }

  /**
   * DTOへの変換
   */
  toDTO(): CatalogEntry {
    return {
      recording: this.recording,
      lastSyncedAt: this.lastSyncedAt.toISOString(),
      stale: this.stale,
      staleSince: this.staleSince ? this.staleSince.toISOString() : null,
      downloadStatus: this.downloadStatus,
      localPath: this.localPath ?? null,
      downloadedAt: this.downloadedAt ? this.downloadedAt.toISOString() : null,
    };
  }

  private assertSameIdentity(recording: Recording): void {
    if (recording.id !== this.recording.id || recording.device !== this.recording.device) {
      throw new InvalidStateTransitionError(
        `Recording identity is immutable: ${this.recording.device}${this.recording.id} cannot become ${recording.device}${recording.id}`
      );
    }
  }
}
