import type { ContentIdentity, UploadRecord } from '@dvr-archiver/common-types';
import { UploadRecordEntity } from '@dvr-archiver/common-types';
import type { IUploadLedgerRepository } from '../../domain/repositories/IUploadLedgerRepository.js';

/**
 * In-Memory Upload Ledger の実装（テスト用）
 */
export class InMemoryUploadLedgerRepository implements IUploadLedgerRepository {
  private records: Map<ContentIdentity, UploadRecord> = new Map();

  async findByIdentity(identity: ContentIdentity): Promise<UploadRecordEntity | null> {
    const data = this.records.get(identity);
    return data ? UploadRecordEntity.reconstitute(data) : null;
  }

  async findAll(): Promise<UploadRecordEntity[]> {
    return Array.from(this.records.values()).map((data) => UploadRecordEntity.reconstitute(data));
  }

  async save(record: UploadRecordEntity): Promise<void> {
    const dto = record.toDTO();
    if (this.records.get(dto.identity)?.outcome === 'success') {
      return;
    }
    this.records.set(dto.identity, dto);
  }

  clear(): void {
    this.records.clear();
  }
}
