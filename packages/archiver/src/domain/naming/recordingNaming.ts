import type { Recording } from '@dvr-archiver/common-types';

export interface TitleAndFilename {
  /** Human readable title, written into the container metadata */
  title: string;
  /** Output file name (with .mp4) */
  filename: string;
}

const UNSAFE_FILENAME_CHARS = /[/\\:*?"<>|\u0000-\u001f\u007f]/g;

/**
 * 拡張子を除いたファイル名の上限バイト数
 *
 * ファイル名の上限 255 バイトから ".partial-<pid>.mp4" の分を残す
 */
export const MAX_FILENAME_STEM_BYTES = 200;

const encoder = new TextEncoder();

function pad2(value: number): string {
  return String(value).padStart(2, '0');
}

function isPositiveInt(value: number | null | undefined): value is number {
  return typeof value === 'number' && Number.isInteger(value) && value > 0;
}

function datePart(airDate: string | null): string | null {
  return airDate ? airDate.slice(0, 10) : null;
}

/**
 * ファイルシステムで使えない文字を除去し、空白を "_" にする
 */
export function sanitizeFilename(name: string): string {
  return name.replace(UNSAFE_FILENAME_CHARS, '').replace(/\s+/g, '_');
}

/**
 * UTF-8 で maxBytes 以内に収まるよう、コードポイント単位で末尾を切る
 */
export function truncateToBytes(value: string, maxBytes: number): string {
  if (encoder.encode(value).length <= maxBytes) {
    return value;
  }
  let result = '';
  let bytes = 0;
  for (const char of value) {
    const size = encoder.encode(char).length;
    if (bytes + size > maxBytes) {
      break;
    }
    result += char;
    bytes += size;
  }
  return result;
}

/**
 * Recordingのメタデータから表示タイトルと出力ファイル名を決定的に生成
 *
 * - series : "Show_-_Episode_-_S01E02.mp4"（エピソード情報がなければ放送日）
 * - movies : "Show_(1999).mp4"
 * - sports : "Show_-_Event_-_2024-01-01.mp4"
 * - programs: "Show_-_2024-01-01.mp4"
 *
 * カテゴリ不明の場合は null
 */
export function buildTitleAndFilename(recording: Recording): TitleAndFilename | null {
  const showTitle = recording.showTitle || 'UNKNOWN';
  let filename = showTitle;
  let title = showTitle;

  switch (recording.category) {
    case 'movies': {
      if (typeof recording.movieYear === 'number' && Number.isInteger(recording.movieYear)) {
        filename += ` (${recording.movieYear})`;
      }
      break;
    }
    case 'series': {
      const episodeTitle = recording.episodeTitle;
      if (episodeTitle) {
        filename += `_-_${episodeTitle}`;
        title += ` - ${episodeTitle}`;
      }

      let season = isPositiveInt(recording.episodeSeason) ? pad2(recording.episodeSeason) : null;
      const number = isPositiveInt(recording.episodeNumber) ? pad2(recording.episodeNumber) : null;
      if (number && !season) {
        season = '00';
      }
      if (season) {
        const code = `S${season}E${number ?? '00'}`;
        filename += `_-_${code}`;
        if (!episodeTitle) {
          title += ` - ${code}`;
        }
      }

      const date = datePart(recording.airDate);
      if (!episodeTitle && !season && date) {
        filename += ` ${date}`;
      }
      break;
    }
    case 'sports': {
      if (recording.eventTitle) {
        filename += `_-_${recording.eventTitle}`;
        title += ` - ${recording.eventTitle}`;
      }
      const date = datePart(recording.airDate);
      if (date) {
        filename += `_-_${date}`;
        title += ` - ${date}`;
      }
      break;
    }
    case 'programs': {
      const date = datePart(recording.airDate);
      if (date) {
        filename += `_-_${date}`;
        title += ` - ${date}`;
      }
      break;
    }
    default:
      return null;
  }

  return { title, filename: `${truncateToBytes(sanitizeFilename(filename), MAX_FILENAME_STEM_BYTES)}.mp4` };
}

/**
 * 長い説明文を単語境界で切り詰める
 */
export function truncateText(text: string, length: number): string {
  if (text.length < length) {
    return text;
  }
  const cut = text.slice(0, length - 4).lastIndexOf(' ');
  return `${text.slice(0, cut > 0 ? cut : length - 4)} ...`;
}
