/**
 * ファイル内容の同一性キー
 *
 * - "blake3:<hex>"              : ファイル全体のBLAKE3ハッシュ（デフォルト）
 * - "size-mtime:<size>:<mtimeMs>": サイズと更新時刻の組
 */
export type ContentIdentity = string;

export type IdentityMode = 'blake3' | 'size-mtime';

export type UploadOutcome = 'success' | 'failed';

/**
 * Upload ledger record
 */
export interface UploadRecord {
  identity: ContentIdentity;

  /** File name relative to the uploaded directory */
  fileName: string;

  size: number;

  mtimeMs: number;

  outcome: UploadOutcome;

  /** Remote identifier assigned by the cloud target (success only) */
  remoteId: string | null;

  /** Last failure message (failed only) */
  error: string | null;

  attempts: number;

  /** ISO 8601 */
  firstAttemptAt: string;

  /** ISO 8601, set on success */
  uploadedAt: string | null;
}

/**
 * upload_if_needed の結果
 */
export type UploadDecision = 'uploaded' | 'skipped_duplicate' | 'failed';

export interface UploadLedgerSnapshot {
  version: 1;
  records: Record<ContentIdentity, UploadRecord>;
}

export function emptyLedger(): UploadLedgerSnapshot {
  return { version: 1, records: {} };
}
