import { createReadStream } from 'fs';
import { extname } from 'path';
import {
  S3Client,
  PutObjectCommand,
} from '@aws-sdk/client-s3';
import { UploadFailedError } from '@dvr-archiver/common-types';
import type { CloudUploadFile, CloudUploadResult, ICloudUploader } from '../../domain/services/ICloudUploader.js';
import type { Logger } from '../../domain/services/Logger.js';
import type { S3UploadConfig } from '../config/archiverConfig.js';
import { isTransientNetworkError, isTransientStatus, withRetry } from '../../shared/retry.js';
import type { RetryOptions } from '../../shared/retry.js';
import { createLogger } from '../../shared/logger.js';
import { DEFAULT_UPLOAD_TIMEOUT_MS } from './PutioUploadService.js';

const CONTENT_TYPES: Record<string, string> = {
  '.mp4': 'video/mp4',
  '.m4v': 'video/mp4',
  '.mkv': 'video/x-matroska',
  '.avi': 'video/x-msvideo',
  '.mov': 'video/quicktime',
  '.mpg': 'video/mpeg',
  '.mpeg': 'video/mpeg',
};

const TRANSIENT_S3_ERROR_NAMES = new Set([
  'SlowDown',
  'Throttling',
  'ThrottlingException',
  'RequestTimeout',
  'RequestTimeTooSkewed',
  'InternalError',
  'ServiceUnavailable',
  'TimeoutError',
]);

/**
 * S3 SDK のエラーが一時的かどうか（5xx, 429, スロットリング, タイムアウト, 接続エラー）
 */
export function isTransientS3Error(err: unknown): boolean {
  if (err instanceof Error && TRANSIENT_S3_ERROR_NAMES.has(err.name)) {
    return true;
  }
  if (typeof err === 'object' && err !== null && '$metadata' in err) {
    const metadata = err.$metadata;
    if (
      typeof metadata === 'object' &&
      metadata !== null &&
      'httpStatusCode' in metadata &&
      typeof metadata.httpStatusCode === 'number' &&
      isTransientStatus(metadata.httpStatusCode)
    ) {
      return true;
    }
  }
  return isTransientNetworkError(err);
}

export interface S3UploadServiceOptions {
  timeoutMs?: number;
  retry?: Partial<Pick<RetryOptions, 'attempts' | 'baseDelayMs' | 'sleep'>>;
  logger?: Logger;
}

/**
 * S3互換ストレージへのファイルアップロードサービス
 *
 * オブジェクトキー = prefix + ファイル名。キーをリモートIDとして返す
 * SDK 自身の再試行は無効にし、試行ごとに新しいストリームで withRetry する
 */
export class S3UploadService implements ICloudUploader {
  readonly name = 's3';
  private client: S3Client;
  private bucket: string;
  private prefix: string;
  private readonly retry: Partial<Pick<RetryOptions, 'attempts' | 'baseDelayMs' | 'sleep'>>;
  private readonly logger: Logger;

  constructor(config: S3UploadConfig, options: S3UploadServiceOptions = {}) {
    this.bucket = config.bucket;
    this.prefix = config.prefix;
    this.retry = options.retry ?? {};
    this.logger = options.logger ?? createLogger('S3');
    this.client = new S3Client({
      endpoint: config.endpoint,
      region: config.region,
      forcePathStyle: config.forcePathStyle,
      credentials: {
        accessKeyId: config.accessKeyId,
        secretAccessKey: config.secretAccessKey,
      },
      maxAttempts: 1,
      requestHandler: {
        requestTimeout: options.timeoutMs ?? DEFAULT_UPLOAD_TIMEOUT_MS,
      },
    });
  }

  objectKey(fileName: string): string {
    return `${this.prefix}${fileName}`;
  }

  /**
   * ローカルファイルをS3にアップロード
   */
  async upload(file: CloudUploadFile): Promise<CloudUploadResult> {
    const key = this.objectKey(file.fileName);

    try {
      await withRetry(() => this.put(file, key), {
        label: `upload ${file.fileName}`,
        ...this.retry,
        isTransient: isTransientS3Error,
        onRetry: ({ attempt, attempts, delayMs, error }) => {
          const message = error instanceof Error ? error.message : String(error);
          this.logger.warn(`Upload of ${file.fileName} failed (${attempt}/${attempts}), retrying in ${delayMs}ms: ${message}`);
        },
      });
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      throw new UploadFailedError(
        `S3 upload of ${file.fileName} to ${this.bucket}/${key} failed: ${message}`,
        isTransientS3Error(err),
      );
    }

    return { remoteId: key };
  }

  private async put(file: CloudUploadFile, key: string): Promise<void> {
    const stream = createReadStream(file.path);
    try {
      await this.client.send(
        new PutObjectCommand({
          Bucket: this.bucket,
          Key: key,
          Body: stream,
          ContentType: CONTENT_TYPES[extname(file.fileName).toLowerCase()] ?? 'application/octet-stream',
          ContentLength: file.size,
        })
      );
    } finally {
      stream.destroy();
    }
  }

  destroy(): void {
    this.client.destroy();
  }
}
