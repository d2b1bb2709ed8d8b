// Entities
export { CatalogEntryEntity } from './entities/CatalogEntry.entity.js';
export { UploadRecordEntity } from './entities/UploadRecord.entity.js';
export type { UploadAttemptFile } from './entities/UploadRecord.entity.js';

// Domain Errors
export {
  DomainError,
  InvalidInputError,
  RecordingNotFoundError,
  InvalidStateTransitionError,
  AmbiguousMatchError,
  DeviceRequestError,
  DeviceUnreachableError,
  MetadataFetchFailedError,
  TranscodeFailedError,
  UploadFailedError,
  CatalogCorruptError,
  LedgerCorruptError,
} from './errors/DomainErrors.js';

// Recording types
export { categoryFromRecordingId } from './recording.js';
export type {
  RecordingId,
  DeviceAddress,
  RecordingCategory,
  Recording,
  RecordingRef,
  RecordingListing,
} from './recording.js';

// Catalog types
export { emptyCatalog, emptyDeviceCatalog } from './catalog.js';
export type {
  DownloadStatus,
  CatalogEntry,
  DeviceCatalog,
  CatalogSnapshot,
} from './catalog.js';

// Upload ledger types
export { emptyLedger } from './upload.js';
export type {
  ContentIdentity,
  IdentityMode,
  UploadOutcome,
  UploadRecord,
  UploadDecision,
  UploadLedgerSnapshot,
} from './upload.js';

// Run summary
export { createRunSummary } from './summary.js';
export type { RunFailure, RunSummary } from './summary.js';
