import { z } from 'zod';
import type { CatalogSnapshot, UploadLedgerSnapshot } from '@dvr-archiver/common-types';

const isoDate = z.string().datetime({ offset: true });

export const recordingSchema = z.object({
  id: z.string().min(1),
  device: z.string().min(1),
  category: z.enum(['series', 'movies', 'sports', 'programs', 'unknown']),
  showTitle: z.string().nullable(),
  episodeTitle: z.string().nullable(),
  airDate: z.string().nullable(),
  duration: z.number().nonnegative().nullable(),
  stateToken: z.string().optional(),
  protected: z.boolean(),
  episodeDescription: z.string().nullable().optional(),
  episodeSeason: z.number().int().nullable().optional(),
  episodeNumber: z.number().int().nullable().optional(),
  originalAirDate: z.string().nullable().optional(),
  movieYear: z.number().int().nullable().optional(),
  eventTitle: z.string().nullable().optional(),
  eventDescription: z.string().nullable().optional(),
  eventSeason: z.string().nullable().optional(),
});

export const catalogEntrySchema = z.object({
  recording: recordingSchema,
  lastSyncedAt: isoDate,
  stale: z.boolean(),
  staleSince: isoDate.nullable(),
  downloadStatus: z.enum(['absent', 'downloading', 'complete']),
  localPath: z.string().nullable(),
  downloadedAt: isoDate.nullable(),
});

const deviceCatalogSchema = z.object({
  lastSyncedAt: isoDate.nullable(),
  lastError: z.string().nullable(),
  entries: z.record(z.string(), catalogEntrySchema),
});

export const catalogSnapshotSchema: z.ZodType<CatalogSnapshot, z.ZodTypeDef, unknown> = z.object({
  version: z.literal(1),
  devices: z.record(z.string(), deviceCatalogSchema),
});

export const uploadRecordSchema = z.object({
  identity: z.string().min(1),
  fileName: z.string().min(1),
  size: z.number().int().nonnegative(),
  mtimeMs: z.number().nonnegative(),
  outcome: z.enum(['success', 'failed']),
  remoteId: z.string().nullable(),
  error: z.string().nullable(),
  attempts: z.number().int().min(1),
  firstAttemptAt: isoDate,
  uploadedAt: isoDate.nullable(),
});

export const uploadLedgerSnapshotSchema: z.ZodType<UploadLedgerSnapshot, z.ZodTypeDef, unknown> = z.object({
  version: z.literal(1),
  records: z.record(z.string(), uploadRecordSchema),
});
