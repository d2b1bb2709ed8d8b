import type { ContentIdentity, UploadLedgerSnapshot } from '@dvr-archiver/common-types';
import { LedgerCorruptError, UploadRecordEntity, emptyLedger } from '@dvr-archiver/common-types';
import type { IUploadLedgerRepository } from '../../domain/repositories/IUploadLedgerRepository.js';
import { JsonFileStore } from '../storage/JsonFileStore.js';
import { uploadLedgerSnapshotSchema } from '../storage/snapshotSchemas.js';

/**
 * JSON ファイルに永続化する Upload Ledger（デフォルト）
 */
export class JsonFileUploadLedgerRepository implements IUploadLedgerRepository {
  private readonly store: JsonFileStore<UploadLedgerSnapshot>;

  constructor(path: string) {
    this.store = new JsonFileStore({
      path,
      schema: uploadLedgerSnapshotSchema,
      empty: emptyLedger,
      onCorrupt: (message) => new LedgerCorruptError(message),
    });
  }

  async findByIdentity(identity: ContentIdentity): Promise<UploadRecordEntity | null> {
    const snapshot = await this.store.read();
    const record = snapshot.records[identity];
    return record ? UploadRecordEntity.reconstitute(record) : null;
  }

  async findAll(): Promise<UploadRecordEntity[]> {
    const snapshot = await this.store.read();
    return Object.values(snapshot.records).map((record) => UploadRecordEntity.reconstitute(record));
  }

  async save(record: UploadRecordEntity): Promise<void> {
    const dto = record.toDTO();
    await this.store.update((snapshot) => {
      if (snapshot.records[dto.identity]?.outcome === 'success') {
        return;
      }
      snapshot.records[dto.identity] = dto;
    });
  }
}
