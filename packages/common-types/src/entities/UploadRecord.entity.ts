import type { ContentIdentity, UploadRecord } from '../upload.js';
import { InvalidStateTransitionError } from '../errors/DomainErrors.js';

export interface UploadAttemptFile {
  identity: ContentIdentity;
  fileName: string;
  size: number;
  mtimeMs: number;
}

/**
 * UploadRecord ドメインエンティティ
 *
 * ビジネスルール:
 * - identity は変更不可
 * - success になったレコードは二度と上書きしない
 * - failed のレコードは再試行で outcome 関連のフィールドのみ更新する
 */
export class UploadRecordEntity {
  private constructor(private data: UploadRecord) {}

  static reconstitute(data: UploadRecord): UploadRecordEntity {
    return new UploadRecordEntity({ ...data });
  }

  static succeeded(file: UploadAttemptFile, remoteId: string, now: Date = new Date()): UploadRecordEntity {
    const timestamp = now.toISOString();
    return new UploadRecordEntity({
      ...file,
      outcome: 'success',
      remoteId,
      error: null,
      attempts: 1,
      firstAttemptAt: timestamp,
      uploadedAt: timestamp,
    });
  }

  static failed(file: UploadAttemptFile, error: string, now: Date = new Date()): UploadRecordEntity {
    return new UploadRecordEntity({
      ...file,
      outcome: 'failed',
      remoteId: null,
      error,
      attempts: 1,
      firstAttemptAt: now.toISOString(),
      uploadedAt: null,
    });
  }

  /**
   * 既存レコードに対する再試行結果を反映
   */
  recordRetry(result: { remoteId: string } | { error: string }, now: Date = new Date()): void {
    if (this.data.outcome === 'success') {
      throw new InvalidStateTransitionError(
        `Upload record ${this.data.identity} already succeeded; refusing to overwrite`
      );
    }
    this.data.attempts += 1;
    if ('remoteId' in result) {
      this.data.outcome = 'success';
      this.data.remoteId = result.remoteId;
      this.data.error = null;
      this.data.uploadedAt = now.toISOString();
    } else {
      this.data.outcome = 'failed';
      this.data.error = result.error;
    }
  }

  isSuccessful(): boolean {
    return this.data.outcome === 'success';
  }

  getIdentity(): ContentIdentity {
    return this.data.identity;
  }

  toDTO(): UploadRecord {
    return { ...this.data };
  }
}
