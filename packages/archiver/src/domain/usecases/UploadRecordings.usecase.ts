import { readdir, stat } from 'fs/promises';
import { basename, extname, join } from 'path';
import type { ContentIdentity, RunSummary, UploadDecision } from '@dvr-archiver/common-types';
import { UploadFailedError, UploadRecordEntity, createRunSummary } from '@dvr-archiver/common-types';
import type { IUploadLedgerRepository } from '../repositories/IUploadLedgerRepository.js';
import type { ICloudUploader } from '../services/ICloudUploader.js';
import type { IContentIdentifier, IdentifiedFile } from '../services/IContentIdentifier.js';
import type { Logger } from '../services/Logger.js';
import { isPartialFile } from './RetrieveRecording.usecase.js';
import { runWithConcurrency } from '../../shared/concurrency.js';
import { createLogger } from '../../shared/logger.js';

export const VIDEO_EXTENSIONS: ReadonlySet<string> = new Set([
  '.mp4',
  '.mkv',
  '.avi',
  '.mov',
  '.m4v',
  '.mpg',
  '.mpeg',
]);

export function isVideoFile(fileName: string): boolean {
  return VIDEO_EXTENSIONS.has(extname(fileName).toLowerCase()) && !isPartialFile(fileName);
}

export interface UploadFileResult {
  path: string;
  fileName: string;
  decision: UploadDecision;
  identity: ContentIdentity | null;
  remoteId: string | null;
  error: string | null;
  /** The cloud target was not contacted and the ledger was not written */
  dryRun: boolean;
}

export interface UploadReport {
  results: UploadFileResult[];
  summary: RunSummary;
}

export interface UploadRecordingsOptions {
  /** Files uploaded in parallel by uploadDirectory */
  concurrency?: number;
  dryRun?: boolean;
  logger?: Logger;
  now?: () => Date;
}

interface LocalVideo {
  path: string;
  fileName: string;
  size: number;
  mtimeMs: number;
}

/**
 * UploadRecordings UseCase
 *
 * ビジネスルール:
 * - 同一性キー（ContentIdentity）ごとに成功レコードは最大1件
 * - 成功レコードがあるファイルはクラウドに一切問い合わせずにスキップ
 * - 失敗は failed レコードとして記録し、次回の実行で再試行される
 * - アップロード成功後、レコード書き込み前にクラッシュした場合は次回1回だけ再アップロードされる
 * - 同じ identity の照会 → 転送 → 記録は実行中に重ならない（同内容の2ファイルは2件目がスキップ）
 */
export class UploadRecordingsUseCase {
  private readonly concurrency: number;
  private readonly dryRun: boolean;
  private readonly logger: Logger;
  private readonly now: () => Date;
  /** identity ごとの処理中の Promise（照会から記録までを直列化する） */
  private readonly identityLocks = new Map<ContentIdentity, Promise<void>>();
  /** dry run で「アップロードする」と報告済みの identity */
  private readonly plannedInDryRun = new Set<ContentIdentity>();

  constructor(
    private readonly ledgerRepository: IUploadLedgerRepository,
    private readonly identifier: IContentIdentifier,
    private readonly uploader: ICloudUploader,
    options: UploadRecordingsOptions = {},
  ) {
    this.concurrency = options.concurrency ?? 2;
    this.dryRun = options.dryRun ?? false;
    this.logger = options.logger ?? createLogger('Upload');
    this.now = options.now ?? (() => new Date());
  }

  /**
   * 1ファイルを必要な場合のみアップロード
   */
  async uploadIfNeeded(filePath: string): Promise<UploadFileResult> {
    const video = await this.statVideo(filePath);
    if (video.size === 0) {
      return this.emptyFileResult(video);
    }
    return this.uploadIdentified(video, await this.identifier.identify(video.path));
  }

  /**
   * ディレクトリ内のすべての動画ファイル（ファイル名順）
   */
  async uploadDirectory(dir: string): Promise<UploadReport> {
    const videos = await this.listVideos(dir);
    this.logger.info(`📂 Found ${videos.length} video files in ${dir}`);

    const results = await runWithConcurrency(videos, this.concurrency, async (video) => {
      if (video.size === 0) {
        return this.emptyFileResult(video);
      }
      return this.uploadIdentified(video, await this.identifier.identify(video.path));
    });

    return { results, summary: this.summarize(results) };
  }

  /**
   * 成功レコードのない動画ファイルのうち最も新しい1件のみ
   */
  async uploadNewest(dir: string): Promise<UploadReport> {
    const videos = (await this.listVideos(dir))
      .filter((video) => video.size > 0)
      .sort((a, b) => b.mtimeMs - a.mtimeMs || (a.fileName < b.fileName ? 1 : a.fileName > b.fileName ? -1 : 0));

    for (const video of videos) {
      const identified = await this.identifier.identify(video.path);
      const existing = await this.ledgerRepository.findByIdentity(identified.identity);
      if (existing?.isSuccessful()) {
        this.logger.debug(`${video.fileName} already uploaded, looking further back`);
        continue;
      }
      const result = await this.uploadIdentified(video, identified);
      return { results: [result], summary: this.summarize([result]) };
    }

    this.logger.info(`No video file in ${dir} needs uploading`);
    return { results: [], summary: this.summarize([]) };
  }

  private uploadIdentified(video: LocalVideo, identified: IdentifiedFile): Promise<UploadFileResult> {
    return this.withIdentityLock(identified.identity, () => this.uploadLocked(video, identified));
  }

  private withIdentityLock<T>(identity: ContentIdentity, fn: () => Promise<T>): Promise<T> {
    const previous = this.identityLocks.get(identity) ?? Promise.resolve();
    const run = previous.then(fn);
    const settled: Promise<void> = run
      .then(
        () => undefined,
        () => undefined,
      )
      .finally(() => {
        if (this.identityLocks.get(identity) === settled) {
          this.identityLocks.delete(identity);
        }
      });
    this.identityLocks.set(identity, settled);
    return run;
  }

  private async uploadLocked(video: LocalVideo, identified: IdentifiedFile): Promise<UploadFileResult> {
    const base = {
      path: video.path,
      fileName: video.fileName,
      identity: identified.identity,
      dryRun: this.dryRun,
    };

    const existing = await this.ledgerRepository.findByIdentity(identified.identity);
    if (existing?.isSuccessful()) {
      this.logger.info(`⏭️ Skipping ${video.fileName}: already uploaded (${identified.identity})`);
      return { ...base, decision: 'skipped_duplicate', remoteId: existing.toDTO().remoteId, error: null };
    }

    if (this.dryRun) {
      if (this.plannedInDryRun.has(identified.identity)) {
        this.logger.info(`[dry run] Would skip ${video.fileName}: same content as a file listed above`);
        return { ...base, decision: 'skipped_duplicate', remoteId: null, error: null };
      }
      this.plannedInDryRun.add(identified.identity);
      this.logger.info(`[dry run] Would upload ${video.fileName} (${identified.size} bytes) to ${this.uploader.name}`);
      return { ...base, decision: 'uploaded', remoteId: null, error: null };
    }

    const attempt = {
      identity: identified.identity,
      fileName: video.fileName,
      size: identified.size,
      mtimeMs: identified.mtimeMs,
    };

    let remoteId: string;
    try {
      this.logger.info(`📤 Uploading ${video.fileName} (${identified.size} bytes) to ${this.uploader.name}`);
      ({ remoteId } = await this.uploader.upload({
        path: video.path,
        fileName: video.fileName,
        size: identified.size,
      }));
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      this.logger.error(`Upload of ${video.fileName} failed: ${message}`);
      const record = existing ?? UploadRecordEntity.failed(attempt, message, this.now());
      if (existing) {
        existing.recordRetry({ error: message }, this.now());
      }
      await this.ledgerRepository.save(record);
      return { ...base, decision: 'failed', remoteId: null, error: message };
    }

    const record = existing ?? UploadRecordEntity.succeeded(attempt, remoteId, this.now());
    if (existing) {
      existing.recordRetry({ remoteId }, this.now());
    }
    await this.ledgerRepository.save(record);

    this.logger.info(`✅ Uploaded ${video.fileName} (remote id ${remoteId})`);
    return { ...base, decision: 'uploaded', remoteId, error: null };
  }

  private emptyFileResult(video: LocalVideo): UploadFileResult {
    this.logger.warn(`Skipping empty file ${video.fileName}`);
    return {
      path: video.path,
      fileName: video.fileName,
      decision: 'failed',
      identity: null,
      remoteId: null,
      error: 'File is empty',
      dryRun: this.dryRun,
    };
  }

  private async statVideo(filePath: string): Promise<LocalVideo> {
    const info = await stat(filePath);
    if (!info.isFile()) {
      throw new UploadFailedError(`${filePath} is not a regular file`);
    }
    return { path: filePath, fileName: basename(filePath), size: info.size, mtimeMs: info.mtimeMs };
  }

  private async listVideos(dir: string): Promise<LocalVideo[]> {
    const dirents = await readdir(dir, { withFileTypes: true });
    const names = dirents
      .filter((dirent) => dirent.isFile() && isVideoFile(dirent.name))
      .map((dirent) => dirent.name)
      .sort();
    return Promise.all(names.map((name) => this.statVideo(join(dir, name))));
  }

  private summarize(results: UploadFileResult[]): RunSummary {
    const summary = createRunSummary(this.dryRun ? 'upload (dry run)' : 'upload');
    for (const result of results) {
      switch (result.decision) {
        case 'uploaded':
          summary.succeeded.push(result.fileName);
          break;
        case 'skipped_duplicate':
          summary.skipped.push(result.fileName);
          break;
        case 'failed':
          summary.failed.push({
            subject: result.fileName,
            code: 'UPLOAD_FAILED',
            message: result.error ?? 'Upload failed',
          });
          break;
      }
    }
    return summary;
  }
}
