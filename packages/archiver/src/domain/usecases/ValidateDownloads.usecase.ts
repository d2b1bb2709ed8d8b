import { readdir } from 'fs/promises';
import { join } from 'path';
import type { RunSummary } from '@dvr-archiver/common-types';
import { createRunSummary } from '@dvr-archiver/common-types';
import type { IVideoValidator, VideoValidation } from '../services/IVideoValidator.js';
import type { Logger } from '../services/Logger.js';
import { isPartialFile } from './RetrieveRecording.usecase.js';
import { createLogger } from '../../shared/logger.js';

export interface FileValidationResult {
  fileName: string;
  path: string;
  validation: VideoValidation | null;
  /** Set when the validator itself failed */
  error: string | null;
}

export interface ValidateDownloadsReport {
  valid: FileValidationResult[];
  invalid: FileValidationResult[];
  errors: FileValidationResult[];
  summary: RunSummary;
}

/**
 * ValidateDownloads UseCase
 *
 * 録画ディレクトリ内の .mp4 をすべて検証する（ファイルは変更しない）
 */
export class ValidateDownloadsUseCase {
  constructor(
    private readonly validator: IVideoValidator,
    private readonly logger: Logger = createLogger('Validate'),
  ) {}

  async execute(recordingsDir: string): Promise<ValidateDownloadsReport> {
    const dirents = await readdir(recordingsDir, { withFileTypes: true });
    const fileNames = dirents
      .filter((d) => d.isFile() && d.name.toLowerCase().endsWith('.mp4') && !isPartialFile(d.name))
      .map((d) => d.name)
      .sort();

    this.logger.info(`🔎 Validating ${fileNames.length} files in ${recordingsDir}`);

    const report: ValidateDownloadsReport = {
      valid: [],
      invalid: [],
      errors: [],
      summary: createRunSummary('validate'),
    };

    for (const fileName of fileNames) {
      const path = join(recordingsDir, fileName);
      try {
        const validation = await this.validator.validate(path);
        const result = { fileName, path, validation, error: null };
        if (validation.isValid) {
          report.valid.push(result);
          report.summary.succeeded.push(fileName);
        } else {
          this.logger.warn(`${fileName}: ${validation.reason}`);
          report.invalid.push(result);
          report.summary.failed.push({ subject: fileName, code: 'INVALID_VIDEO', message: validation.reason });
        }
      } catch (err) {
        const message = err instanceof Error ? err.message : String(err);
        this.logger.error(`Error validating ${fileName}: ${message}`);
        report.errors.push({ fileName, path, validation: null, error: message });
        report.summary.failed.push({ subject: fileName, code: 'VALIDATION_ERROR', message });
      }
    }

    return report;
  }
}
