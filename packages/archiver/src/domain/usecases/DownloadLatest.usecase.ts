import type { RecordingRef } from '@dvr-archiver/common-types';
import type { Logger } from '../services/Logger.js';
import type { NotFoundReason, ResolveEpisodeUseCase, ResolveOptions } from './ResolveEpisode.usecase.js';
import type { LocalFile, RetrievePlan, RetrieveRecordingUseCase } from './RetrieveRecording.usecase.js';
import { createLogger } from '../../shared/logger.js';

export interface DownloadLatestRequest {
  query: string;
  destinationDir: string;
  overwrite?: boolean;
  resolve?: ResolveOptions;
  /** 解決と出力先の決定だけを行い、取得しない */
  dryRun?: boolean;
  signal?: AbortSignal;
}

export type DownloadLatestResult =
  | { status: 'downloaded'; ref: RecordingRef; file: LocalFile }
  | { status: 'planned'; ref: RecordingRef; plan: RetrievePlan }
  | { status: 'skipped'; reason: NotFoundReason };

/**
 * DownloadLatest UseCase
 *
 * 番組名から未ダウンロードの最新エピソードを選び、取得する
 */
export class DownloadLatestUseCase {
  constructor(
    private readonly resolveEpisode: ResolveEpisodeUseCase,
    private readonly retrieveRecording: RetrieveRecordingUseCase,
    private readonly logger: Logger = createLogger('Download'),
  ) {}

  async execute(request: DownloadLatestRequest): Promise<DownloadLatestResult> {
    const resolved = await this.resolveEpisode.execute(request.query, request.resolve);
    if (resolved.status === 'not_found') {
      this.logger.info(`No episode to download for "${request.query}" (${resolved.reason})`);
      return { status: 'skipped', reason: resolved.reason };
    }

    this.logger.info(
      `🎯 "${request.query}" resolved to ${resolved.ref.device}${resolved.ref.recordingId} (score ${resolved.score.toFixed(2)})`,
    );

    if (request.dryRun) {
      const plan = await this.retrieveRecording.plan({
        ref: resolved.ref,
        destinationDir: request.destinationDir,
        overwrite: request.overwrite,
      });
      return { status: 'planned', ref: resolved.ref, plan };
    }

    const file = await this.retrieveRecording.execute({
      ref: resolved.ref,
      destinationDir: request.destinationDir,
      overwrite: request.overwrite,
      signal: request.signal,
    });

    return { status: 'downloaded', ref: resolved.ref, file };
  }
}
