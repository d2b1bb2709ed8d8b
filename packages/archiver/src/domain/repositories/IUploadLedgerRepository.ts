import type { ContentIdentity, UploadRecordEntity } from '@dvr-archiver/common-types';

/**
 * Upload Ledger Repository Interface
 *
 * identity ごとに最大1件。save は identity をキーにした原子的な upsert
 * 既に success のレコードは上書きしない
 * 実装: JsonFileUploadLedgerRepository, PostgresUploadLedgerRepository, InMemoryUploadLedgerRepository
 *
 * 読み込み時にストアが壊れていれば LedgerCorruptError を throw する
 */
export interface IUploadLedgerRepository {
  findByIdentity(identity: ContentIdentity): Promise<UploadRecordEntity | null>;

  findAll(): Promise<UploadRecordEntity[]>;

  save(record: UploadRecordEntity): Promise<void>;
}
