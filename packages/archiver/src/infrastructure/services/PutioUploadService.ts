import { openAsBlob } from 'fs';
import { z } from 'zod';
import { UploadFailedError } from '@dvr-archiver/common-types';
import type { CloudUploadFile, CloudUploadResult, ICloudUploader } from '../../domain/services/ICloudUploader.js';
import type { Logger } from '../../domain/services/Logger.js';
import type { PutioUploadConfig } from '../config/archiverConfig.js';
import { isTransientNetworkError, isTransientStatus, withRetry } from '../../shared/retry.js';
import type { RetryOptions } from '../../shared/retry.js';
import { createLogger } from '../../shared/logger.js';

export const PUTIO_UPLOAD_URL = 'https://upload.put.io/v2/files/upload';

/** 30分 */
export const DEFAULT_UPLOAD_TIMEOUT_MS = 30 * 60 * 1000;

const uploadResponseSchema = z.object({
  status: z.string(),
  error_message: z.string().optional(),
  file: z.object({ id: z.number() }).nullable().optional(),
  transfer: z.object({ id: z.number() }).nullable().optional(),
});

export interface PutioUploadServiceOptions {
  fetchFn?: typeof fetch;
  timeoutMs?: number;
  retry?: Partial<Pick<RetryOptions, 'attempts' | 'baseDelayMs' | 'sleep'>>;
  logger?: Logger;
}

/**
 * put.io へのファイルアップロードサービス
 *
 * multipart/form-data で POST し、返ってきた file.id（または transfer.id）をリモートIDとする
 */
export class PutioUploadService implements ICloudUploader {
  readonly name = 'put.io';
  private readonly fetchFn: typeof fetch;
  private readonly timeoutMs: number;
  private readonly retry: Partial<Pick<RetryOptions, 'attempts' | 'baseDelayMs' | 'sleep'>>;
  private readonly logger: Logger;

  constructor(
    private readonly config: PutioUploadConfig,
    options: PutioUploadServiceOptions = {},
  ) {
    this.fetchFn = options.fetchFn ?? fetch;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_UPLOAD_TIMEOUT_MS;
    this.retry = options.retry ?? {};
    this.logger = options.logger ?? createLogger('Put.io');
  }

  async upload(file: CloudUploadFile): Promise<CloudUploadResult> {
    try {
      return await withRetry(() => this.post(file), {
        label: `upload ${file.fileName}`,
        ...this.retry,
        isTransient: (err) =>
          err instanceof UploadFailedError ? err.transient : isTransientNetworkError(err),
        onRetry: ({ attempt, attempts, delayMs, error }) => {
          const message = error instanceof Error ? error.message : String(error);
          this.logger.warn(`Upload of ${file.fileName} failed (${attempt}/${attempts}), retrying in ${delayMs}ms: ${message}`);
        },
      });
    } catch (err) {
      if (err instanceof UploadFailedError) {
        throw err;
      }
      const message = err instanceof Error ? err.message : String(err);
      throw new UploadFailedError(`put.io upload of ${file.fileName} failed: ${message}`, isTransientNetworkError(err));
    }
  }

  private async post(file: CloudUploadFile): Promise<CloudUploadResult> {
    const form = new FormData();
    form.append('file', await openAsBlob(file.path), file.fileName);
    form.append('filename', file.fileName);
    if (this.config.parentId !== null) {
      form.append('parent_id', String(this.config.parentId));
    }

    const response = await this.fetchFn(PUTIO_UPLOAD_URL, {
      method: 'POST',
      headers: { Authorization: `Bearer ${this.config.token}` },
      body: form,
      signal: AbortSignal.timeout(this.timeoutMs),
    });

    if (!response.ok) {
      throw new UploadFailedError(
        `put.io upload of ${file.fileName} failed: HTTP ${response.status}`,
        isTransientStatus(response.status),
      );
    }

    const parsed = uploadResponseSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new UploadFailedError(`put.io upload of ${file.fileName} returned an unexpected response`);
    }

    const body = parsed.data;
    if (body.status !== 'OK') {
      throw new UploadFailedError(
        `put.io upload of ${file.fileName} failed: ${body.error_message ?? body.status}`,
      );
    }

    const remoteId = body.file?.id ?? body.transfer?.id;
    if (remoteId === undefined) {
      throw new UploadFailedError(`put.io upload of ${file.fileName} returned no file or transfer id`);
    }
    return { remoteId: String(remoteId) };
  }
}
