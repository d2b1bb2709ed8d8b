import type { CatalogEntryEntity, DeviceAddress, RecordingId, RecordingRef } from '@dvr-archiver/common-types';
import { AmbiguousMatchError, InvalidInputError } from '@dvr-archiver/common-types';
import type { ICatalogRepository } from '../repositories/ICatalogRepository.js';
import { DEFAULT_MATCH_THRESHOLD, matchTitle, normalizeTitle } from '../matching/titleMatch.js';

export interface ResolveOptions {
  /** Skip episodes already downloaded (default true) */
  excludeDownloaded?: boolean;
  /** Throw AmbiguousMatchError when distinct shows tie on the best score */
  strict?: boolean;
  threshold?: number;
  /** Restrict candidates to these devices */
  devices?: DeviceAddress[];
}

export type NotFoundReason = 'empty_catalog' | 'no_match' | 'all_downloaded';

export type ResolveResult =
  | { status: 'found'; ref: RecordingRef; entry: CatalogEntryEntity; score: number }
  | { status: 'not_found'; reason: NotFoundReason };

interface Candidate {
  entry: CatalogEntryEntity;
  score: number;
  normalizedTitle: string;
  airTime: number;
}

function airTime(entry: CatalogEntryEntity): number {
  const airDate = entry.getRecording().airDate;
  if (!airDate) return Number.NEGATIVE_INFINITY;
  const time = Date.parse(airDate);
  return Number.isNaN(time) ? Number.NEGATIVE_INFINITY : time;
}

function compareDesc(a: string, b: string): number {
  if (a === b) return 0;
  return a < b ? 1 : -1;
}

/**
 * 一致スコア降順 → 放送日時降順 → Recording ID 降順 → デバイス降順
 */
function compareCandidates(a: Candidate, b: Candidate): number {
  if (a.score !== b.score) return b.score - a.score;
  if (a.airTime !== b.airTime) return b.airTime > a.airTime ? 1 : -1;
  const ra = a.entry.getRecording();
  const rb = b.entry.getRecording();
  return compareDesc(ra.id, rb.id) || compareDesc(ra.device, rb.device);
}

/**
 * 番組名クエリからダウンロード対象のエピソードを1件選ぶ（純粋関数）
 *
 * 見つからないことは正常な結果であり、エラーではない
 */
export function resolveEpisode(
  entries: readonly CatalogEntryEntity[],
  query: string,
  options: ResolveOptions = {},
): ResolveResult {
  const normalizedQuery = normalizeTitle(query);
  if (normalizedQuery.length === 0) {
    throw new InvalidInputError('Show query must not be empty');
  }

  const threshold = options.threshold ?? DEFAULT_MATCH_THRESHOLD;
  const excludeDownloaded = options.excludeDownloaded ?? true;
  const devices = options.devices ? new Set(options.devices) : null;

  const live = entries.filter(
    (entry) => !entry.isStale() && (!devices || devices.has(entry.getRecording().device)),
  );
  if (live.length === 0) {
    return { status: 'not_found', reason: 'empty_catalog' };
  }

  const matches: Candidate[] = [];
  for (const entry of live) {
    const normalizedTitle = normalizeTitle(entry.getRecording().showTitle ?? '');
    const score = matchTitle(normalizedQuery, normalizedTitle, threshold);
    if (score !== null) {
      matches.push({ entry, score, normalizedTitle, airTime: airTime(entry) });
    }
  }
  if (matches.length === 0) {
    return { status: 'not_found', reason: 'no_match' };
  }

  const candidates = excludeDownloaded ? matches.filter((c) => !c.entry.isDownloaded()) : matches;
  if (candidates.length === 0) {
    return { status: 'not_found', reason: 'all_downloaded' };
  }

  candidates.sort(compareCandidates);
  const best = candidates[0];

  if (options.strict) {
    const tiedTitles = new Set(
      candidates.filter((c) => c.score === best.score).map((c) => c.normalizedTitle),
    );
    if (tiedTitles.size > 1) {
      const titles = [...tiedTitles].sort();
      throw new AmbiguousMatchError(
        `Query "${query}" matches several shows equally well: ${titles.join(', ')}`,
        titles,
      );
    }
  }

  return { status: 'found', ref: best.entry.getRef(), entry: best.entry, score: best.score };
}

/**
 * ResolveEpisode UseCase
 *
 * 同期済みカタログを読み込み、resolveEpisode で1件を選ぶ
 */
export class ResolveEpisodeUseCase {
  constructor(
    private readonly catalogRepository: ICatalogRepository,
    private readonly defaults: ResolveOptions = {},
  ) {}

  async execute(query: string, options: ResolveOptions = {}): Promise<ResolveResult> {
    const entries = await this.catalogRepository.findAll();
    return resolveEpisode(entries, query, {
      excludeDownloaded: options.excludeDownloaded ?? this.defaults.excludeDownloaded,
      strict: options.strict ?? this.defaults.strict,
      threshold: options.threshold ?? this.defaults.threshold,
      devices: options.devices ?? this.defaults.devices,
    });
  }

  /**
   * Recording ID を直接指定する場合の検索
   *
   * device 未指定のときは全デバイスから探し、複数見つかれば AmbiguousMatchError
   */
  async findById(recordingId: RecordingId, device?: DeviceAddress): Promise<CatalogEntryEntity | null> {
    if (device) {
      return this.catalogRepository.findByRef({ device, recordingId });
    }
    const entries = (await this.catalogRepository.findAll()).filter(
      (entry) => entry.getRecording().id === recordingId,
    );
    if (entries.length > 1) {
      const devices = entries.map((entry) => entry.getRecording().device).sort();
      throw new AmbiguousMatchError(
        `Recording ${recordingId} exists on several devices: ${devices.join(', ')}`,
        devices,
      );
    }
    return entries[0] ?? null;
  }
}
