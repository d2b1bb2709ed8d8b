import pg from 'pg';

const { Pool } = pg;

let pool: pg.Pool | null = null;

/**
 * PostgreSQL コネクションプールを取得
 *
 * 設定の databaseUrl から接続し、シングルトンのPoolを返す
 */
export function getPool(databaseUrl: string | null): pg.Pool {
  if (!pool) {
    if (!databaseUrl) {
      throw new Error('DATABASE_URL is not set');
    }

    pool = new Pool({
      connectionString: databaseUrl,
      max: 10,
      idleTimeoutMillis: 30000,
      connectionTimeoutMillis: 5000,
    });

    pool.on('error', (err) => {
      console.error('❌ [PostgreSQL] Unexpected pool error:', err);
    });
  }

  return pool;
}

/**
 * PostgreSQL コネクションプールを閉じる
 */
export async function closePool(): Promise<void> {
  if (pool) {
    await pool.end();
    pool = null;
  }
}

const SCHEMA_STATEMENTS = [
  `CREATE TABLE IF NOT EXISTS catalog_devices (
     device TEXT PRIMARY KEY,
     last_synced_at TIMESTAMPTZ,
     last_error TEXT
   )`,
  `CREATE TABLE IF NOT EXISTS catalog_entries (
     device TEXT NOT NULL REFERENCES catalog_devices (device),
     recording_id TEXT NOT NULL,
     recording JSONB NOT NULL,
     last_synced_at TIMESTAMPTZ NOT NULL,
     stale BOOLEAN NOT NULL DEFAULT FALSE,
     stale_since TIMESTAMPTZ,
     download_status TEXT NOT NULL DEFAULT 'absent',
     local_path TEXT,
     downloaded_at TIMESTAMPTZ,
     PRIMARY KEY (device, recording_id)
   )`,
  `CREATE TABLE IF NOT EXISTS upload_records (
     identity TEXT PRIMARY KEY,
     file_name TEXT NOT NULL,
     size BIGINT NOT NULL,
     mtime_ms DOUBLE PRECISION NOT NULL,
     outcome TEXT NOT NULL,
     remote_id TEXT,
     error TEXT,
     attempts INTEGER NOT NULL,
     first_attempt_at TIMESTAMPTZ NOT NULL,
     uploaded_at TIMESTAMPTZ
   )`,
];

/**
 * カタログ / アップロード台帳のテーブルを作成（存在しなければ）
 */
export async function ensureSchema(p: pg.Pool): Promise<void> {
  for (const statement of SCHEMA_STATEMENTS) {
    await p.query(statement);
  }
}
