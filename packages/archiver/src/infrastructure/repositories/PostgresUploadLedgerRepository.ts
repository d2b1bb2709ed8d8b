import type pg from 'pg';
import type { ContentIdentity, UploadRecord } from '@dvr-archiver/common-types';
import { LedgerCorruptError, UploadRecordEntity } from '@dvr-archiver/common-types';
import type { IUploadLedgerRepository } from '../../domain/repositories/IUploadLedgerRepository.js';
import { uploadRecordSchema } from '../storage/snapshotSchemas.js';

interface UploadRecordRow {
  identity: string;
  file_name: string;
  /** BIGINT is returned as a string by pg */
  size: string;
  mtime_ms: number;
  outcome: string;
  remote_id: string | null;
  error: string | null;
  attempts: number;
  first_attempt_at: Date;
  uploaded_at: Date | null;
}

/**
 * PostgreSQL Upload Ledger の実装
 *
 * identity を主キーにした upsert で1件ずつ原子的に書き込む
 */
export class PostgresUploadLedgerRepository implements IUploadLedgerRepository {
  constructor(private readonly pool: pg.Pool) {}

  async findByIdentity(identity: ContentIdentity): Promise<UploadRecordEntity | null> {
    const result = await this.pool.query<UploadRecordRow>(
      'SELECT * FROM upload_records WHERE identity = $1',
      [identity]
    );
    if (result.rows.length === 0) {
      return null;
    }
    return UploadRecordEntity.reconstitute(this.rowToDTO(result.rows[0]));
  }

  async findAll(): Promise<UploadRecordEntity[]> {
    const result = await this.pool.query<UploadRecordRow>(
      'SELECT * FROM upload_records ORDER BY first_attempt_at, identity'
    );
    return result.rows.map((row) => UploadRecordEntity.reconstitute(this.rowToDTO(row)));
  }

  async save(record: UploadRecordEntity): Promise<void> {
    const dto = record.toDTO();
    await this.pool.query(
      `INSERT INTO upload_records
         (identity, file_name, size, mtime_ms, outcome, remote_id, error, attempts, first_attempt_at, uploaded_at)
       VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10)
       ON CONFLICT (identity) DO UPDATE SET
         outcome = EXCLUDED.outcome,
         remote_id = EXCLUDED.remote_id,
         error = EXCLUDED.error,
         attempts = EXCLUDED.attempts,
         uploaded_at = EXCLUDED.uploaded_at
       WHERE upload_records.outcome <> 'success'`,
      [
        dto.identity,
        dto.fileName,
        dto.size,
        dto.mtimeMs,
        dto.outcome,
        dto.remoteId,
        dto.error,
        dto.attempts,
        dto.firstAttemptAt,
        dto.uploadedAt,
      ]
    );
  }

  private rowToDTO(row: UploadRecordRow): UploadRecord {
    const parsed = uploadRecordSchema.safeParse({
      identity: row.identity,
      fileName: row.file_name,
      size: Number(row.size),
      mtimeMs: row.mtime_ms,
      outcome: row.outcome,
      remoteId: row.remote_id,
      error: row.error,
      attempts: row.attempts,
      firstAttemptAt: row.first_attempt_at.toISOString(),
      uploadedAt: row.uploaded_at ? row.uploaded_at.toISOString() : null,
    });
    if (!parsed.success) {
      throw new LedgerCorruptError(
        `upload_records row ${row.identity} is invalid: ${parsed.error.issues[0]?.message ?? 'unknown'}`
      );
    }
    return parsed.data;
  }
}
