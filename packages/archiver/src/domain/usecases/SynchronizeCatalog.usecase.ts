import type { DeviceAddress, Recording, RecordingId, RecordingListing, RunSummary } from '@dvr-archiver/common-types';
import {
  CatalogEntryEntity,
  DeviceUnreachableError,
  MetadataFetchFailedError,
  createRunSummary,
} from '@dvr-archiver/common-types';
import type { ICatalogRepository } from '../repositories/ICatalogRepository.js';
import type { IDeviceClient } from '../services/IDeviceClient.js';
import type { Logger } from '../services/Logger.js';
import { runWithConcurrency } from '../../shared/concurrency.js';
import { createLogger } from '../../shared/logger.js';

export interface SynchronizeCatalogRequest {
  devices: DeviceAddress[];
}

export interface DeviceSyncResult {
  device: DeviceAddress;
  status: 'synced' | 'unreachable';
  added: RecordingId[];
  revived: RecordingId[];
  refreshed: RecordingId[];
  markedStale: RecordingId[];
  metadataFailures: MetadataFetchFailedError[];
  metadataCalls: number;
  error: DeviceUnreachableError | null;
}

export interface SyncReport {
  devices: DeviceSyncResult[];
  summary: RunSummary;
}

export interface SynchronizeCatalogOptions {
  /** Devices synced in parallel */
  concurrency?: number;
  /** Also sync devices that only appear in the existing catalog */
  includeKnownDevices?: boolean;
  logger?: Logger;
  now?: () => Date;
}

/**
 * SynchronizeCatalog UseCase
 *
 * ビジネスフロー（デバイスごと、互いに独立）:
 * 1. リスティング呼び出しで Recording ID 一覧を取得（失敗したらデバイスをスキップ）
 * 2. カタログにない / stale な ID のみメタデータを取得
 * 3. リスティングから消えた ID は stale にする（削除しない）
 * 4. 両方にある ID は stateToken が変わった場合のみ再取得
 * 5. デバイス単位で結果を永続化（部分的な成功も保存される）
 */
export class SynchronizeCatalogUseCase {
  private readonly concurrency: number;
  private readonly includeKnownDevices: boolean;
  private readonly logger: Logger;
  private readonly now: () => Date;

  constructor(
    private readonly catalogRepository: ICatalogRepository,
    private readonly deviceClient: IDeviceClient,
    options: SynchronizeCatalogOptions = {},
  ) {
    this.concurrency = options.concurrency ?? 2;
    this.includeKnownDevices = options.includeKnownDevices ?? true;
    this.logger = options.logger ?? createLogger('Sync');
    this.now = options.now ?? (() => new Date());
  }

  async execute(request: SynchronizeCatalogRequest): Promise<SyncReport> {
    const devices = await this.resolveDevices(request.devices);
    this.logger.info(`🔄 Creating/updating catalog for devices [${devices.join(' ')}]`);

    const results = await runWithConcurrency(devices, this.concurrency, (device) => this.syncDevice(device));

    const summary = createRunSummary('sync');
    for (const result of results) {
      if (result.error) {
        summary.failed.push({ subject: result.device, code: result.error.code, message: result.error.message });
        continue;
      }
      summary.succeeded.push(result.device);
      for (const failure of result.metadataFailures) {
        summary.failed.push({
          subject: `${result.device}${failure.recordingId}`,
          code: failure.code,
          message: failure.message,
        });
      }
    }

    return { devices: results, summary };
  }

  private async resolveDevices(requested: DeviceAddress[]): Promise<DeviceAddress[]> {
    const devices = requested.map((d) => d.trim()).filter((d) => d.length > 0);
    if (this.includeKnownDevices) {
      devices.push(...(await this.catalogRepository.listDevices()));
    }
    return [...new Set(devices)];
  }

  private async syncDevice(device: DeviceAddress): Promise<DeviceSyncResult> {
    const result: DeviceSyncResult = {
      device,
      status: 'synced',
      added: [],
      revived: [],
      refreshed: [],
      markedStale: [],
      metadataFailures: [],
      metadataCalls: 0,
      error: null,
    };

    this.logger.info(`📋 Getting recordings for device ${device}`);

    let listing: RecordingListing[];
    try {
      listing = await this.deviceClient.listRecordings(device);
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      const error = new DeviceUnreachableError(device, `Device ${device} unreachable: ${message}`);
      this.logger.error(error.message);
      await this.catalogRepository.recordDeviceError(device, error.message);
      return { ...result, status: 'unreachable', error };
    }

    const now = this.now();
    const existing = await this.catalogRepository.findByDevice(device);
    const entriesById = new Map(existing.map((entry) => [entry.getRecording().id, entry]));
    const liveIds = new Set(listing.map((item) => item.id));
    const changed: CatalogEntryEntity[] = [];

    for (const item of listing) {
      const entry = entriesById.get(item.id);
      const isNew = entry === undefined || entry.isStale();
      const tokenChanged =
        entry !== undefined &&
        !isNew &&
        item.stateToken !== undefined &&
        item.stateToken !== entry.getRecording().stateToken;

      if (!isNew && !tokenChanged) {
        continue;
      }

      result.metadataCalls++;
      let recording: Recording;
      try {
        this.logger.debug(`Getting metadata for recording ${device}${item.id}`);
        recording = await this.fetchRecording(device, item);
        if (!entry) {
          changed.push(CatalogEntryEntity.create(recording, now));
          result.added.push(item.id);
        } else if (isNew) {
          entry.revive(recording, now);
          changed.push(entry);
          result.revived.push(item.id);
        } else {
          entry.refresh(recording, now);
          changed.push(entry);
          result.refreshed.push(item.id);
        }
      } catch (err) {
        const message = err instanceof Error ? err.message : String(err);
        const failure = new MetadataFetchFailedError(
          item.id,
          `Metadata fetch failed for ${device}${item.id}: ${message}`,
        );
        this.logger.warn(failure.message);
        result.metadataFailures.push(failure);
      }
    }

    for (const entry of existing) {
      const id = entry.getRecording().id;
      if (!liveIds.has(id) && !entry.isStale()) {
        this.logger.debug(`Marking recording ${device}${id} as stale`);
        entry.markStale(now);
        changed.push(entry);
        result.markedStale.push(id);
      }
    }

    await this.catalogRepository.recordDeviceSync(device, changed, now);

    this.logger.info(
      `✅ Device ${device}: ${listing.length} listed, ${result.added.length} added, ` +
        `${result.revived.length} revived, ${result.refreshed.length} refreshed, ` +
        `${result.markedStale.length} marked stale, ${result.metadataFailures.length} failed`,
    );

    return result;
  }

  private async fetchRecording(device: DeviceAddress, item: RecordingListing): Promise<Recording> {
    const recording = await this.deviceClient.getRecording(device, item.id);
    if (recording.id !== item.id || recording.device !== device) {
      throw new Error(`Device returned ${recording.device}${recording.id} for ${device}${item.id}`);
    }
    return item.stateToken !== undefined ? { ...recording, stateToken: item.stateToken } : recording;
  }
}
