import type { ArchiverSettings } from '../config/archiverConfig.js';
import { getCloudUploadConfig } from '../config/archiverConfig.js';
import { closePool, ensureSchema, getPool } from '../database/PostgresClient.js';
import { JsonFileCatalogRepository } from '../repositories/JsonFileCatalogRepository.js';
import { JsonFileUploadLedgerRepository } from '../repositories/JsonFileUploadLedgerRepository.js';
import { PostgresCatalogRepository } from '../repositories/PostgresCatalogRepository.js';
import { PostgresUploadLedgerRepository } from '../repositories/PostgresUploadLedgerRepository.js';
import { TabloDeviceClient } from '../services/TabloDeviceClient.js';
import { FfmpegTranscoder } from '../services/FfmpegTranscoder.js';
import { FfprobeVideoValidator } from '../services/FfprobeVideoValidator.js';
import { ContentIdentifier } from '../services/ContentIdentifier.js';
import { PutioUploadService } from '../services/PutioUploadService.js';
import { S3UploadService } from '../services/S3UploadService.js';

// Use Cases
import { SynchronizeCatalogUseCase } from '../../domain/usecases/SynchronizeCatalog.usecase.js';
import { ResolveEpisodeUseCase } from '../../domain/usecases/ResolveEpisode.usecase.js';
import { RetrieveRecordingUseCase } from '../../domain/usecases/RetrieveRecording.usecase.js';
import { DownloadLatestUseCase } from '../../domain/usecases/DownloadLatest.usecase.js';
import { UploadRecordingsUseCase } from '../../domain/usecases/UploadRecordings.usecase.js';
import { ListRecordingsUseCase } from '../../domain/usecases/ListRecordings.usecase.js';
import { ValidateDownloadsUseCase } from '../../domain/usecases/ValidateDownloads.usecase.js';

import type { ICatalogRepository } from '../../domain/repositories/ICatalogRepository.js';
import type { IUploadLedgerRepository } from '../../domain/repositories/IUploadLedgerRepository.js';
import type { IDeviceClient } from '../../domain/services/IDeviceClient.js';
import type { ITranscoder } from '../../domain/services/ITranscoder.js';
import type { IVideoValidator } from '../../domain/services/IVideoValidator.js';
import type { ICloudUploader } from '../../domain/services/ICloudUploader.js';
import type { IContentIdentifier } from '../../domain/services/IContentIdentifier.js';
import { createLogger } from '../../shared/logger.js';

/**
 * 差し替え可能な依存（テストではフェイクを渡す）
 */
export interface ContainerOverrides {
  catalogRepository?: ICatalogRepository;
  ledgerRepository?: IUploadLedgerRepository;
  deviceClient?: IDeviceClient;
  transcoder?: ITranscoder;
  validator?: IVideoValidator;
  identifier?: IContentIdentifier;
  cloudUploader?: ICloudUploader;
}

export interface ArchiverContainer {
  settings: ArchiverSettings;
  catalogRepository: ICatalogRepository;
  ledgerRepository: IUploadLedgerRepository;
  deviceClient: IDeviceClient;
  synchronizeCatalog: SynchronizeCatalogUseCase;
  resolveEpisode: ResolveEpisodeUseCase;
  retrieveRecording: RetrieveRecordingUseCase;
  downloadLatest: DownloadLatestUseCase;
  listRecordings: ListRecordingsUseCase;
  validateDownloads: ValidateDownloadsUseCase;
  /** アップロード先の設定はここで初めて検証される */
  uploadRecordings(options: { dryRun: boolean }): UploadRecordingsUseCase;
  close(): Promise<void>;
}

function createCloudUploader(settings: ArchiverSettings): ICloudUploader {
  const config = getCloudUploadConfig(settings);
  if (config.backend === 's3') {
    console.log(`📦 Upload backend: S3 (endpoint: ${config.endpoint}, bucket: ${config.bucket})`);
    return new S3UploadService(config, { logger: createLogger('S3', settings.logLevel) });
  }
  console.log('📦 Upload backend: put.io');
  return new PutioUploadService(config);
}

/**
 * 依存関係の組み立て
 *
 * カタログ / 台帳のバックエンドは settings.catalogBackend で切り替え:
 * - 'json' (default): JsonFileCatalogRepository / JsonFileUploadLedgerRepository
 * - 'postgres': PostgresCatalogRepository / PostgresUploadLedgerRepository
 */
export async function setupContainer(
  settings: ArchiverSettings,
  overrides: ContainerOverrides = {},
): Promise<ArchiverContainer> {
  const logger = createLogger('Archiver', settings.logLevel);

  // Repositories（バックエンド選択）
  let catalogRepository: ICatalogRepository;
  let ledgerRepository: IUploadLedgerRepository;
  if (settings.catalogBackend === 'postgres' && !(overrides.catalogRepository && overrides.ledgerRepository)) {
    const pool = getPool(settings.databaseUrl);
    await ensureSchema(pool);
    catalogRepository = overrides.catalogRepository ?? new PostgresCatalogRepository(pool);
    ledgerRepository = overrides.ledgerRepository ?? new PostgresUploadLedgerRepository(pool);
    logger.debug('Catalog backend: PostgreSQL');
  } else {
    catalogRepository = overrides.catalogRepository ?? new JsonFileCatalogRepository(settings.catalogPath);
    ledgerRepository = overrides.ledgerRepository ?? new JsonFileUploadLedgerRepository(settings.ledgerPath);
    logger.debug(`Catalog backend: JSON (${settings.catalogPath}, ${settings.ledgerPath})`);
  }

  // Services
  const deviceClient = overrides.deviceClient ?? new TabloDeviceClient({ logger: createLogger('Tablo', settings.logLevel) });
  const transcoder = overrides.transcoder ?? new FfmpegTranscoder();
  const validator = overrides.validator ?? new FfprobeVideoValidator('ffprobe', undefined, createLogger('Validate', settings.logLevel));
  const identifier = overrides.identifier ?? new ContentIdentifier(settings.identityMode);

  // Use Cases
  const synchronizeCatalog = new SynchronizeCatalogUseCase(catalogRepository, deviceClient, {
    concurrency: settings.syncConcurrency,
    logger: createLogger('Sync', settings.logLevel),
  });

  const resolveEpisode = new ResolveEpisodeUseCase(catalogRepository, { threshold: settings.matchThreshold });

  const retrieveRecording = new RetrieveRecordingUseCase(catalogRepository, deviceClient, transcoder, {
    validator,
    logger: createLogger('Retrieve', settings.logLevel),
  });

  const downloadLatest = new DownloadLatestUseCase(
    resolveEpisode,
    retrieveRecording,
    createLogger('Download', settings.logLevel),
  );

  const listRecordings = new ListRecordingsUseCase(catalogRepository);

  const validateDownloads = new ValidateDownloadsUseCase(validator, createLogger('Validate', settings.logLevel));

  let cloudUploader: ICloudUploader | undefined = overrides.cloudUploader;

  return {
    settings,
    catalogRepository,
    ledgerRepository,
    deviceClient,
    synchronizeCatalog,
    resolveEpisode,
    retrieveRecording,
    downloadLatest,
    listRecordings,
    validateDownloads,
    uploadRecordings: ({ dryRun }) => {
      cloudUploader ??= createCloudUploader(settings);
      return new UploadRecordingsUseCase(ledgerRepository, identifier, cloudUploader, {
        concurrency: settings.uploadConcurrency,
        dryRun,
        logger: createLogger('Upload', settings.logLevel),
      });
    },
    close: async () => {
      if (cloudUploader instanceof S3UploadService) {
        cloudUploader.destroy();
      }
      await closePool();
    },
  };
}
