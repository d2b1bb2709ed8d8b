import type {
  CatalogEntryEntity,
  DeviceAddress,
  DownloadStatus,
  RecordingCategory,
  RecordingId,
} from '@dvr-archiver/common-types';
import type { ICatalogRepository } from '../repositories/ICatalogRepository.js';
import { buildTitleAndFilename, truncateText } from '../naming/recordingNaming.js';

export const DESCRIPTION_LENGTH = 70;

export interface RecordingListItem {
  device: DeviceAddress;
  recordingId: RecordingId;
  category: RecordingCategory;
  showTitle: string | null;
  /** Title tag written into the container, null when the category is unknown */
  title: string | null;
  filename: string | null;
  description: string | null;
  airDate: string | null;
  downloadStatus: DownloadStatus;
  localPath: string | null;
  stale: boolean;
}

export interface ListRecordingsRequest {
  device?: DeviceAddress;
  /** Include entries the device no longer reports (default true) */
  includeStale?: boolean;
}

function descriptionOf(entry: CatalogEntryEntity): string | null {
  const recording = entry.getRecording();
  const text = recording.episodeDescription ?? recording.eventDescription ?? null;
  return text ? truncateText(text, DESCRIPTION_LENGTH) : null;
}

function compareNullable<T extends string | number>(a: T | null | undefined, b: T | null | undefined): number {
  if (a === b) return 0;
  if (a === null || a === undefined) return 1;
  if (b === null || b === undefined) return -1;
  return a < b ? -1 : 1;
}

function compareEntries(a: CatalogEntryEntity, b: CatalogEntryEntity): number {
  const ra = a.getRecording();
  const rb = b.getRecording();
  return (
    compareNullable(ra.device, rb.device) ||
    compareNullable(ra.showTitle, rb.showTitle) ||
    compareNullable(ra.episodeSeason, rb.episodeSeason) ||
    compareNullable(ra.episodeNumber, rb.episodeNumber) ||
    compareNullable(ra.airDate, rb.airDate) ||
    compareNullable(ra.id, rb.id)
  );
}

/**
 * ListRecordings UseCase
 *
 * カタログの内容を (デバイス, 番組名, シーズン, 話数, 放送日) 順に列挙する
 */
export class ListRecordingsUseCase {
  constructor(private readonly catalogRepository: ICatalogRepository) {}

  async execute(request: ListRecordingsRequest = {}): Promise<RecordingListItem[]> {
    const includeStale = request.includeStale ?? true;
    const entries = request.device
      ? await this.catalogRepository.findByDevice(request.device)
      : await this.catalogRepository.findAll();

    return entries
      .filter((entry) => includeStale || !entry.isStale())
      .sort(compareEntries)
      .map((entry) => {
        const recording = entry.getRecording();
        const naming = buildTitleAndFilename(recording);
        return {
          device: recording.device,
          recordingId: recording.id,
          category: recording.category,
          showTitle: recording.showTitle,
          title: naming?.title ?? null,
          filename: naming?.filename ?? null,
          description: descriptionOf(entry),
          airDate: recording.airDate,
          downloadStatus: entry.getDownloadStatus(),
          localPath: entry.getLocalPath() ?? null,
          stale: entry.isStale(),
        };
      });
  }
}
