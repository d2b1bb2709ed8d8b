import { mkdir, rename, rm, stat } from 'fs/promises';
import { join } from 'path';
import type { RecordingRef } from '@dvr-archiver/common-types';
import {
  DomainError,
  InvalidInputError,
  RecordingNotFoundError,
  TranscodeFailedError,
} from '@dvr-archiver/common-types';
import type { ICatalogRepository } from '../repositories/ICatalogRepository.js';
import type { IDeviceClient } from '../services/IDeviceClient.js';
import type { ITranscoder } from '../services/ITranscoder.js';
import type { IVideoValidator } from '../services/IVideoValidator.js';
import type { Logger } from '../services/Logger.js';
import { buildTitleAndFilename } from '../naming/recordingNaming.js';
import { createLogger } from '../../shared/logger.js';

export interface RetrieveRecordingRequest {
  ref: RecordingRef;
  destinationDir: string;
  /** Re-download even if the target file already exists */
  overwrite?: boolean;
  /** Aborting stops the transcoder; the partial file is removed */
  signal?: AbortSignal;
}

export interface LocalFile {
  path: string;
  size: number;
  /** true when an existing file was reused without transcoding */
  reused: boolean;
}

export type RetrievePlanAction = 'download' | 'reuse' | 'overwrite';

/**
 * 実行せずに決めた取得内容（dry run 用）
 */
export interface RetrievePlan {
  ref: RecordingRef;
  title: string;
  path: string;
  action: RetrievePlanAction;
}

export interface RetrieveRecordingOptions {
  /** Output is checked against the recording's duration when set */
  validator?: IVideoValidator;
  logger?: Logger;
  now?: () => Date;
}

const PARTIAL_MARKER = '.partial-';

/**
 * ダウンロード途中の一時ファイルかどうか
 */
export function isPartialFile(fileName: string): boolean {
  return fileName.includes(PARTIAL_MARKER);
}

function partialFileName(filename: string): string {
  const base = filename.endsWith('.mp4') ? filename.slice(0, -4) : filename;
  return `${base}${PARTIAL_MARKER}${process.pid}.mp4`;
}

async function fileSize(path: string): Promise<number | null> {
  try {
    const info = await stat(path);
    return info.isFile() ? info.size : null;
  } catch (err) {
    if (err instanceof Error && 'code' in err && err.code === 'ENOENT') {
      return null;
    }
    throw err;
  }
}

/**
 * RetrieveRecording UseCase
 *
 * ビジネスフロー:
 * 1. カタログからエントリを取得し、出力ファイル名を決定
 * 2. 既存ファイルがあり overwrite=false なら再利用（トランスコーダは呼ばない）
 * 3. downloading を永続化 → マニフェスト取得 → 一時ファイルへトランスコード
 * 4. 終了コード・サイズ・（設定されていれば）再生時間を検証
 * 5. 一時ファイルを最終パスへ rename し complete を永続化
 *
 * 失敗時は一時ファイルを削除し、ダウンロード状態を absent に戻す
 */
export class RetrieveRecordingUseCase {
  private readonly validator: IVideoValidator | undefined;
  private readonly logger: Logger;
  private readonly now: () => Date;

  constructor(
    private readonly catalogRepository: ICatalogRepository,
    private readonly deviceClient: IDeviceClient,
    private readonly transcoder: ITranscoder,
    options: RetrieveRecordingOptions = {},
  ) {
    this.validator = options.validator;
    this.logger = options.logger ?? createLogger('Retrieve');
    this.now = options.now ?? (() => new Date());
  }

  /**
   * カタログもファイルも変更せず、execute が何をするかを返す
   */
  async plan(request: Omit<RetrieveRecordingRequest, 'signal'>): Promise<RetrievePlan> {
    const { ref, destinationDir, overwrite = false } = request;
    const { naming, finalPath } = await this.locate(ref, destinationDir);
    const existingSize = await fileSize(finalPath);
    let action: RetrievePlanAction = 'download';
    if (existingSize !== null) {
      action = overwrite ? 'overwrite' : 'reuse';
    }
    return { ref, title: naming.title, path: finalPath, action };
  }

  private async locate(ref: RecordingRef, destinationDir: string) {
    const entry = await this.catalogRepository.findByRef(ref);
    if (!entry) {
      throw new RecordingNotFoundError(`Recording ${ref.device}${ref.recordingId} is not in the catalog`);
    }

    const recording = entry.getRecording();
    const naming = buildTitleAndFilename(recording);
    if (!naming) {
      throw new InvalidInputError(
        `Cannot derive a file name for ${ref.device}${ref.recordingId} (category: ${recording.category})`,
      );
    }

    return { entry, recording, naming, finalPath: join(destinationDir, naming.filename) };
  }

  async execute(request: RetrieveRecordingRequest): Promise<LocalFile> {
    const { ref, destinationDir, overwrite = false, signal } = request;
    const { entry, recording, naming, finalPath } = await this.locate(ref, destinationDir);

    const existingSize = await fileSize(finalPath);
    if (existingSize !== null && !overwrite) {
      this.logger.info(`♻️ File ${finalPath} exists, reusing`);
      if (entry.getDownloadStatus() === 'downloading') {
        entry.resetDownload();
      }
      entry.completeDownload(finalPath, this.now());
      await this.catalogRepository.save(entry);
      return { path: finalPath, size: existingSize, reused: true };
    }

    // 前回の実行が途中で終了した場合
    if (entry.getDownloadStatus() === 'downloading') {
      this.logger.warn(`Recording ${ref.device}${ref.recordingId} was left downloading, restarting`);
      entry.resetDownload();
    }

    await mkdir(destinationDir, { recursive: true });
    const tempPath = join(destinationDir, partialFileName(naming.filename));

    entry.startDownload();
    await this.catalogRepository.save(entry);

    try {
      this.logger.info(`📥 Downloading ${naming.title} to ${finalPath}`);
      const manifest = await this.deviceClient.getManifest(ref.device, ref.recordingId);

      const result = await this.transcoder.transcode({
        manifestUrl: manifest.url,
        outputPath: tempPath,
        title: naming.title,
        signal,
      });

      if (signal?.aborted) {
        throw new TranscodeFailedError(`Download of ${ref.device}${ref.recordingId} was interrupted`);
      }
      if (result.exitCode !== 0) {
        throw new TranscodeFailedError(
          `Transcoder exited with code ${result.exitCode} for ${ref.device}${ref.recordingId}: ${result.stderr.trim()}`,
        );
      }

      const size = await fileSize(tempPath);
      if (!size) {
        throw new TranscodeFailedError(`Transcoder produced no output for ${ref.device}${ref.recordingId}`);
      }

      if (this.validator && recording.duration) {
        const validation = await this.validator.validate(tempPath, recording.duration);
        if (!validation.isValid) {
          throw new TranscodeFailedError(
            `Output for ${ref.device}${ref.recordingId} looks truncated: ${validation.reason}`,
          );
        }
      }

      await rename(tempPath, finalPath);
      entry.completeDownload(finalPath, this.now());
      await this.catalogRepository.save(entry);

      this.logger.info(`✅ Downloaded ${finalPath} (${size} bytes)`);
      return { path: finalPath, size, reused: false };
    } catch (err) {
      await rm(tempPath, { force: true });
      if (entry.getDownloadStatus() === 'downloading') {
        entry.resetDownload();
        await this.catalogRepository.save(entry);
      }

      if (err instanceof DomainError) {
        throw err;
      }
      const message = err instanceof Error ? err.message : String(err);
      throw new TranscodeFailedError(`Download of ${ref.device}${ref.recordingId} failed: ${message}`);
    }
  }
}
