import { z } from 'zod';
import type { DeviceAddress, Recording, RecordingId, RecordingListing } from '@dvr-archiver/common-types';
import { DeviceRequestError, categoryFromRecordingId } from '@dvr-archiver/common-types';
import type { IDeviceClient, StreamManifest } from '../../domain/services/IDeviceClient.js';
import type { Logger } from '../../domain/services/Logger.js';
import { isTransientNetworkError, isTransientStatus, withRetry } from '../../shared/retry.js';
import type { RetryOptions } from '../../shared/retry.js';
import { createLogger } from '../../shared/logger.js';

export const TABLO_PORT = 8885;

/** 10秒 */
export const DEFAULT_DEVICE_TIMEOUT_MS = 10_000;

const listingSchema = z.array(z.string().min(1));

const optionalText = z.string().nullable().optional();
const optionalNumber = z.number().nullable().optional();

const recordingDetailsSchema = z.object({
  path: z.string().optional(),
  airing_details: z
    .object({
      datetime: optionalText,
      show_title: optionalText,
      duration: optionalNumber,
    })
    .optional(),
  episode: z
    .object({
      title: optionalText,
      description: optionalText,
      orig_air_date: optionalText,
      season_number: optionalNumber,
      number: optionalNumber,
    })
    .optional(),
  movie_airing: z.object({ release_year: optionalNumber }).optional(),
  event: z
    .object({
      title: optionalText,
      description: optionalText,
      season: optionalText,
    })
    .optional(),
  video_details: z
    .object({
      duration: optionalNumber,
      state: optionalText,
    })
    .optional(),
  user_info: z.object({ protected: z.boolean().optional() }).optional(),
});

export type TabloRecordingDetails = z.infer<typeof recordingDetailsSchema>;

const watchSchema = z.object({
  playlist_url: z.string().optional(),
  expires: z.string().nullable().optional(),
  error: z.unknown().optional(),
});

export interface TabloDeviceClientOptions {
  fetchFn?: typeof fetch;
  port?: number;
  timeoutMs?: number;
  retry?: Partial<Pick<RetryOptions, 'attempts' | 'baseDelayMs' | 'sleep'>>;
  logger?: Logger;
}

/**
 * Tablo の詳細レスポンスを Recording に変換
 */
export function toRecording(device: DeviceAddress, id: RecordingId, details: TabloRecordingDetails): Recording {
  const category = categoryFromRecordingId(id);
  const airing = details.airing_details;
  const video = details.video_details;

  const recording: Recording = {
    id,
    device,
    category,
    showTitle: airing?.show_title ?? null,
    episodeTitle: null,
    airDate: airing?.datetime ?? null,
    duration: video?.duration ?? airing?.duration ?? null,
    protected: details.user_info?.protected ?? false,
  };
  if (video?.state) {
    recording.stateToken = video.state;
  }

  switch (category) {
    case 'series': {
      const episode = details.episode;
      recording.episodeTitle = episode?.title ?? null;
      recording.episodeDescription = episode?.description ?? null;
      recording.originalAirDate = episode?.orig_air_date ?? null;
      recording.episodeSeason = episode?.season_number ?? null;
      recording.episodeNumber = episode?.number ?? null;
      break;
    }
    case 'movies':
      recording.movieYear = details.movie_airing?.release_year ?? null;
      break;
    case 'sports': {
      const event = details.event;
      recording.eventTitle = event?.title ?? null;
      recording.eventDescription = event?.description ?? null;
      recording.eventSeason = event?.season ?? null;
      break;
    }
    default:
      break;
  }

  return recording;
}

/**
 * Tablo（レガシー HTTP API, port 8885）の Device Client
 *
 * - GET  /recordings/airings  : Recording ID 一覧
 * - GET  <recording id>       : メタデータ
 * - POST <recording id>/watch : HLS playlist URL
 *
 * 一時的な失敗（接続エラー, タイムアウト, 5xx, 429）のみ指数バックオフで再試行する
 */
export class TabloDeviceClient implements IDeviceClient {
  private readonly fetchFn: typeof fetch;
  private readonly port: number;
  private readonly timeoutMs: number;
  private readonly retry: Partial<Pick<RetryOptions, 'attempts' | 'baseDelayMs' | 'sleep'>>;
  private readonly logger: Logger;

  constructor(options: TabloDeviceClientOptions = {}) {
    this.fetchFn = options.fetchFn ?? fetch;
    this.port = options.port ?? TABLO_PORT;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_DEVICE_TIMEOUT_MS;
    this.retry = options.retry ?? {};
    this.logger = options.logger ?? createLogger('Tablo');
  }

  async listRecordings(device: DeviceAddress): Promise<RecordingListing[]> {
    const json = await this.request(device, 'GET', '/recordings/airings');
    const parsed = listingSchema.safeParse(json);
    if (!parsed.success) {
      throw new DeviceRequestError(`Unexpected recordings listing from ${device}`, false);
    }
    return parsed.data.map((id) => ({ id }));
  }

  async getRecording(device: DeviceAddress, recordingId: RecordingId): Promise<Recording> {
    const json = await this.request(device, 'GET', recordingId);
    const parsed = recordingDetailsSchema.safeParse(json);
    if (!parsed.success) {
      throw new DeviceRequestError(`Unexpected metadata for ${device}${recordingId}`, false);
    }
    return toRecording(device, recordingId, parsed.data);
  }

  async getManifest(device: DeviceAddress, recordingId: RecordingId): Promise<StreamManifest> {
    const json = await this.request(device, 'POST', `${recordingId}/watch`);
    const parsed = watchSchema.safeParse(json);
    if (!parsed.success || parsed.data.error !== undefined || !parsed.data.playlist_url) {
      throw new DeviceRequestError(`Device ${device} refused to stream ${recordingId}`, false);
    }
    return { url: parsed.data.playlist_url, expiresAt: parsed.data.expires ?? null };
  }

  baseUrl(device: DeviceAddress): string {
    return `http://${device}:${this.port}`;
  }

  private async request(device: DeviceAddress, method: 'GET' | 'POST', path: string): Promise<unknown> {
    const url = `${this.baseUrl(device)}${path.startsWith('/') ? path : `/${path}`}`;

    return withRetry<unknown>(
      async () => {
        let response: Response;
        try {
          response = await this.fetchFn(url, {
            method,
            headers: { Accept: 'application/json' },
            signal: AbortSignal.timeout(this.timeoutMs),
          });
        } catch (err) {
          const message = err instanceof Error ? err.message : String(err);
          throw new DeviceRequestError(`${method} ${url} failed: ${message}`, isTransientNetworkError(err));
        }

        if (!response.ok) {
          throw new DeviceRequestError(
            `${method} ${url} failed: HTTP ${response.status}`,
            isTransientStatus(response.status),
            response.status,
          );
        }

        try {
          return await response.json();
        } catch (err) {
          const message = err instanceof Error ? err.message : String(err);
          throw new DeviceRequestError(`${method} ${url} returned invalid JSON: ${message}`, false, response.status);
        }
      },
      {
        label: `${method} ${url}`,
        ...this.retry,
        isTransient: (err) => err instanceof DeviceRequestError && err.transient,
        onRetry: ({ attempt, attempts, delayMs, error }) => {
          const message = error instanceof Error ? error.message : String(error);
          this.logger.warn(`${message} (attempt ${attempt}/${attempts}), retrying in ${delayMs}ms`);
        },
      },
    );
  }
}
