import { readFile } from 'fs/promises';
import { homedir } from 'os';
import { join } from 'path';
import { z } from 'zod';
import type { IdentityMode } from '@dvr-archiver/common-types';
import { InvalidInputError } from '@dvr-archiver/common-types';
import type { LogLevel } from '../../domain/services/Logger.js';

export type CatalogBackend = 'json' | 'postgres';
export type CloudBackend = 'putio' | 's3';

export const DEFAULT_CONFIG_FILE_NAME = '.dvrarchiverrc';

const logLevelSchema = z.enum(['debug', 'info', 'warn', 'error']);

/**
 * 設定ファイル / CLI フラグ共通の入力形式（すべて任意）
 */
export const settingsInputSchema = z
  .object({
    devices: z.array(z.string().trim().min(1)),
    catalogPath: z.string().min(1),
    ledgerPath: z.string().min(1),
    recordingsDir: z.string().min(1),
    catalogBackend: z.enum(['json', 'postgres']),
    databaseUrl: z.string().min(1),
    cloudBackend: z.enum(['putio', 's3']),
    putioToken: z.string().min(1),
    putioParentId: z.number().int().nonnegative(),
    s3Endpoint: z.string().min(1),
    s3Bucket: z.string().min(1),
    s3AccessKeyId: z.string().min(1),
    s3SecretAccessKey: z.string().min(1),
    s3Region: z.string().min(1),
    s3ForcePathStyle: z.boolean(),
    s3Prefix: z.string(),
    identityMode: z.enum(['blake3', 'size-mtime']),
    syncConcurrency: z.number().int().min(1),
    uploadConcurrency: z.number().int().min(1),
    matchThreshold: z.number().gt(0).max(1),
    logLevel: logLevelSchema,
  })
  .partial()
  .strict();

export type SettingsInput = z.infer<typeof settingsInputSchema>;

const envSchema = z.object({
  DVR_DEVICES: z
    .string()
    .transform((value) => value.split(',').map((d) => d.trim()).filter((d) => d.length > 0))
    .optional(),
  DVR_CATALOG_PATH: z.string().optional(),
  DVR_LEDGER_PATH: z.string().optional(),
  DVR_RECORDINGS_DIR: z.string().optional(),
  CATALOG_BACKEND: z.enum(['json', 'postgres']).optional(),
  DATABASE_URL: z.string().optional(),
  CLOUD_BACKEND: z.enum(['putio', 's3']).optional(),
  PUTIO_TOKEN: z.string().optional(),
  PUTIO_PARENT_ID: z.coerce.number().int().nonnegative().optional(),
  S3_ENDPOINT: z.string().optional(),
  S3_BUCKET: z.string().optional(),
  S3_ACCESS_KEY_ID: z.string().optional(),
  S3_SECRET_ACCESS_KEY: z.string().optional(),
  S3_REGION: z.string().optional(),
  S3_FORCE_PATH_STYLE: z
    .string()
    .transform((value) => value === 'true')
    .optional(),
  S3_PREFIX: z.string().optional(),
  IDENTITY_MODE: z.enum(['blake3', 'size-mtime']).optional(),
  SYNC_CONCURRENCY: z.coerce.number().int().min(1).optional(),
  UPLOAD_CONCURRENCY: z.coerce.number().int().min(1).optional(),
  MATCH_THRESHOLD: z.coerce.number().gt(0).max(1).optional(),
  LOG_LEVEL: logLevelSchema.optional(),
});

export interface PutioSettings {
  token: string | null;
  parentId: number | null;
}

export interface S3Settings {
  endpoint: string | null;
  bucket: string | null;
  accessKeyId: string | null;
  secretAccessKey: string | null;
  region: string;
  forcePathStyle: boolean;
  prefix: string;
}

/**
 * 解決済みの設定（1回の実行につき1つ、変更不可）
 */
export interface ArchiverSettings {
  readonly devices: readonly string[];
  readonly catalogPath: string;
  readonly ledgerPath: string;
  readonly recordingsDir: string;
  readonly catalogBackend: CatalogBackend;
  readonly databaseUrl: string | null;
  readonly cloudBackend: CloudBackend;
  readonly putio: Readonly<PutioSettings>;
  readonly s3: Readonly<S3Settings>;
  readonly identityMode: IdentityMode;
  readonly syncConcurrency: number;
  readonly uploadConcurrency: number;
  readonly matchThreshold: number;
  readonly logLevel: LogLevel;
}

export interface SettingsSources {
  flags?: SettingsInput;
  env?: Record<string, string | undefined>;
  file?: SettingsInput;
  /** Base for default paths */
  homeDir?: string;
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}

/**
 * 環境変数から SettingsInput を作る（空文字列は未設定とみなす）
 */
export function settingsFromEnv(env: Record<string, string | undefined>): SettingsInput {
  const present: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== '') {
      present[key] = value.trim();
    }
  }

  const parsed = envSchema.safeParse(present);
  if (!parsed.success) {
    throw new InvalidInputError(`Invalid environment: ${formatIssues(parsed.error)}`);
  }
  const e = parsed.data;

  return {
    devices: e.DVR_DEVICES,
    catalogPath: e.DVR_CATALOG_PATH,
    ledgerPath: e.DVR_LEDGER_PATH,
    recordingsDir: e.DVR_RECORDINGS_DIR,
    catalogBackend: e.CATALOG_BACKEND,
    databaseUrl: e.DATABASE_URL,
    cloudBackend: e.CLOUD_BACKEND,
    putioToken: e.PUTIO_TOKEN,
    putioParentId: e.PUTIO_PARENT_ID,
    s3Endpoint: e.S3_ENDPOINT,
    s3Bucket: e.S3_BUCKET,
    s3AccessKeyId: e.S3_ACCESS_KEY_ID,
    s3SecretAccessKey: e.S3_SECRET_ACCESS_KEY,
    s3Region: e.S3_REGION,
    s3ForcePathStyle: e.S3_FORCE_PATH_STYLE,
    s3Prefix: e.S3_PREFIX,
    identityMode: e.IDENTITY_MODE,
    syncConcurrency: e.SYNC_CONCURRENCY,
    uploadConcurrency: e.UPLOAD_CONCURRENCY,
    matchThreshold: e.MATCH_THRESHOLD,
    logLevel: e.LOG_LEVEL,
  };
}

/**
 * 設定を解決する（純粋関数）
 *
 * 優先順位: CLI フラグ > 環境変数 > 設定ファイル > デフォルト
 */
export function resolveSettings(sources: SettingsSources): ArchiverSettings {
  const flags = sources.flags ?? {};
  const env = settingsFromEnv(sources.env ?? {});
  const file = sources.file ?? {};
  const home = sources.homeDir ?? homedir();
  const dataDir = join(home, '.dvr-archiver');

  const pick = <K extends keyof SettingsInput>(key: K): SettingsInput[K] =>
    flags[key] ?? env[key] ?? file[key];

  const settings: ArchiverSettings = {
    devices: Object.freeze([...new Set(pick('devices') ?? [])]),
    catalogPath: pick('catalogPath') ?? join(dataDir, 'catalog.json'),
    ledgerPath: pick('ledgerPath') ?? join(dataDir, 'uploads.json'),
    recordingsDir: pick('recordingsDir') ?? join(home, 'dvr-recordings'),
    catalogBackend: pick('catalogBackend') ?? 'json',
    databaseUrl: pick('databaseUrl') ?? null,
    cloudBackend: pick('cloudBackend') ?? 'putio',
    putio: Object.freeze({
      token: pick('putioToken') ?? null,
      parentId: pick('putioParentId') ?? null,
    }),
    s3: Object.freeze({
      endpoint: pick('s3Endpoint') ?? null,
      bucket: pick('s3Bucket') ?? null,
      accessKeyId: pick('s3AccessKeyId') ?? null,
      secretAccessKey: pick('s3SecretAccessKey') ?? null,
      region: pick('s3Region') ?? 'auto',
      forcePathStyle: pick('s3ForcePathStyle') ?? false,
      prefix: pick('s3Prefix') ?? '',
    }),
    identityMode: pick('identityMode') ?? 'blake3',
    syncConcurrency: pick('syncConcurrency') ?? 2,
    uploadConcurrency: pick('uploadConcurrency') ?? 2,
    matchThreshold: pick('matchThreshold') ?? 0.8,
    logLevel: pick('logLevel') ?? 'info',
  };

  if (settings.catalogBackend === 'postgres' && !settings.databaseUrl) {
    throw new InvalidInputError('CATALOG_BACKEND=postgres requires DATABASE_URL');
  }

  return Object.freeze(settings);
}

/**
 * 設定ファイル（JSON）を読み込む
 *
 * required=false のとき、ファイルが存在しなければ空の設定を返す
 */
export async function loadSettingsFile(path: string, required: boolean): Promise<SettingsInput> {
  let raw: string;
  try {
    raw = await readFile(path, 'utf-8');
  } catch (err) {
    if (!required && err instanceof Error && 'code' in err && err.code === 'ENOENT') {
      return {};
    }
    const message = err instanceof Error ? err.message : String(err);
    throw new InvalidInputError(`Cannot read config file ${path}: ${message}`);
  }

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new InvalidInputError(`Config file ${path} is not valid JSON: ${message}`);
  }

  const parsed = settingsInputSchema.safeParse(json);
  if (!parsed.success) {
    throw new InvalidInputError(`Invalid config file ${path}: ${formatIssues(parsed.error)}`);
  }
  return parsed.data;
}

export function defaultSettingsFilePath(homeDir: string = homedir()): string {
  return join(homeDir, DEFAULT_CONFIG_FILE_NAME);
}

export interface PutioUploadConfig {
  backend: 'putio';
  token: string;
  parentId: number | null;
}

export interface S3UploadConfig {
  backend: 's3';
  endpoint: string;
  bucket: string;
  accessKeyId: string;
  secretAccessKey: string;
  region: string;
  forcePathStyle: boolean;
  prefix: string;
}

export type CloudUploadConfig = PutioUploadConfig | S3UploadConfig;

/**
 * アップロード先の設定を取り出す（upload 系コマンドのみ必要）
 */
export function getCloudUploadConfig(settings: ArchiverSettings): CloudUploadConfig {
  if (settings.cloudBackend === 's3') {
    const { endpoint, bucket, accessKeyId, secretAccessKey, region, forcePathStyle, prefix } = settings.s3;
    if (!endpoint || !bucket || !accessKeyId || !secretAccessKey) {
      throw new InvalidInputError(
        'S3 upload backend requires S3_ENDPOINT, S3_BUCKET, S3_ACCESS_KEY_ID, and S3_SECRET_ACCESS_KEY',
      );
    }
    return { backend: 's3', endpoint, bucket, accessKeyId, secretAccessKey, region, forcePathStyle, prefix };
  }

  if (!settings.putio.token) {
    throw new InvalidInputError('put.io upload backend requires PUTIO_TOKEN');
  }
  return { backend: 'putio', token: settings.putio.token, parentId: settings.putio.parentId };
}

