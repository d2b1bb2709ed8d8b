/**
 * デバイス上のRecording ID（パス形式）
 * 例: "/recordings/series/episodes/4011394"
 */
export type RecordingId = string;

/**
 * デバイスのアドレス（IP もしくはホスト名）
 */
export type DeviceAddress = string;

/**
 * Recording category
 * - series: 連続番組のエピソード
 * - movies: 映画
 * - sports: スポーツイベント
 * - programs: 単発番組
 * - unknown: パスから判別できないもの
 */
export type RecordingCategory = 'series' | 'movies' | 'sports' | 'programs' | 'unknown';

/**
 * Recording information reported by a device
 */
export interface Recording {
  /** Device-assigned identifier (immutable) */
  id: RecordingId;

  /** Device address this recording lives on */
  device: DeviceAddress;

  category: RecordingCategory;

  showTitle: string | null;

  episodeTitle: string | null;

  /** Airing start time (ISO 8601) */
  airDate: string | null;

  /** Duration in seconds */
  duration: number | null;

  /** Device-reported change token. undefined when the device does not expose one */
  stateToken?: string;

  /** Protected ("kept") on the device */
  protected: boolean;

  episodeDescription?: string | null;
  episodeSeason?: number | null;
  episodeNumber?: number | null;
  /** Original air date of the episode (YYYY-MM-DD) */
  originalAirDate?: string | null;

  movieYear?: number | null;

  eventTitle?: string | null;
  eventDescription?: string | null;
  eventSeason?: string | null;
}

/**
 * デバイス修飾済みのRecording参照
 */
export interface RecordingRef {
  device: DeviceAddress;
  recordingId: RecordingId;
}

/**
 * Listing call の1要素
 */
export interface RecordingListing {
  id: RecordingId;
  stateToken?: string;
}

/**
 * Recording ID の3番目のセグメントからカテゴリを判定
 * "/recordings/series/episodes/123" -> "series"
 */
export function categoryFromRecordingId(id: RecordingId): RecordingCategory {
  const segment = id.split('/')[2];
  switch (segment) {
    case 'series':
    case 'movies':
    case 'sports':
    case 'programs':
      return segment;
    default:
      return 'unknown';
  }
}
