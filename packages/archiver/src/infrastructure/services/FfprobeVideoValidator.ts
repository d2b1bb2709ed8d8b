import { execFile } from 'child_process';
import { stat } from 'fs/promises';
import { promisify } from 'util';
import type { IVideoValidator, VideoValidation } from '../../domain/services/IVideoValidator.js';
import type { Logger } from '../../domain/services/Logger.js';
import { createLogger } from '../../shared/logger.js';

const execFileAsync = promisify(execFile);

/** 1 MiB */
export const MIN_FILE_SIZE = 1024 * 1024;

export const DEFAULT_DURATION_TOLERANCE = 0.1;

export interface VideoFacts {
  /** null when the file does not exist */
  size: number | null;
  /** null when ffprobe could not read a duration */
  actualDuration: number | null;
  expectedDuration: number | null;
}

/**
 * ファイルサイズと再生時間から妥当性を判定（純粋関数）
 */
export function evaluateVideo(facts: VideoFacts, tolerance: number = DEFAULT_DURATION_TOLERANCE): VideoValidation {
  const { size, actualDuration } = facts;
  const expectedDuration = facts.expectedDuration && facts.expectedDuration > 0 ? facts.expectedDuration : null;
  const invalid = (reason: string): VideoValidation => ({
    isValid: false,
    reason,
    actualDuration,
    expectedDuration,
    deviation: null,
  });

  if (size === null) {
    return invalid('File does not exist');
  }
  if (size < MIN_FILE_SIZE) {
    return invalid(`File too small (${size} bytes, minimum ${MIN_FILE_SIZE})`);
  }
  if (actualDuration === null) {
    return invalid('Cannot determine video duration (possibly corrupted)');
  }

  if (expectedDuration === null) {
    return {
      isValid: true,
      reason: `Valid (duration: ${actualDuration.toFixed(1)}s)`,
      actualDuration,
      expectedDuration,
      deviation: null,
    };
  }

  const deviation = Math.abs(actualDuration - expectedDuration) / expectedDuration;
  const comparison =
    `${actualDuration.toFixed(1)}s actual vs ${expectedDuration.toFixed(1)}s expected ` +
    `(${(deviation * 100).toFixed(1)}% deviation)`;

  return {
    isValid: deviation <= tolerance,
    reason: deviation <= tolerance ? `Valid (${comparison})` : `Duration mismatch: ${comparison}`,
    actualDuration,
    expectedDuration,
    deviation,
  };
}

/**
 * ffprobe の JSON 出力から format.duration を取り出す
 */
export function parseProbeDuration(stdout: string): number | null {
  let json: unknown;
  try {
    json = JSON.parse(stdout);
  } catch {
    return null;
  }
  if (typeof json !== 'object' || json === null || !('format' in json)) {
    return null;
  }
  const format = json.format;
  if (typeof format !== 'object' || format === null || !('duration' in format)) {
    return null;
  }
  const duration = Number(format.duration);
  return Number.isFinite(duration) ? duration : null;
}

/**
 * ffprobe で再生時間を取得して検証する Video Validator
 */
export class FfprobeVideoValidator implements IVideoValidator {
  constructor(
    private readonly ffprobePath: string = 'ffprobe',
    private readonly tolerance: number = DEFAULT_DURATION_TOLERANCE,
    private readonly logger: Logger = createLogger('Validate'),
  ) {}

  async validate(filePath: string, expectedDuration: number | null = null): Promise<VideoValidation> {
    let size: number | null = null;
    try {
      size = (await stat(filePath)).size;
    } catch (err) {
      if (!(err instanceof Error && 'code' in err && err.code === 'ENOENT')) {
        throw err;
      }
    }

    const actualDuration = size !== null && size >= MIN_FILE_SIZE ? await this.probeDuration(filePath) : null;
    return evaluateVideo({ size, actualDuration, expectedDuration }, this.tolerance);
  }

  private async probeDuration(filePath: string): Promise<number | null> {
    try {
      const { stdout } = await execFileAsync(
        this.ffprobePath,
        ['-v', 'error', '-show_entries', 'format=duration', '-of', 'json', filePath],
        { timeout: 30000 },
      );
      return parseProbeDuration(stdout);
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      this.logger.warn(`ffprobe failed for ${filePath}: ${message}`);
      return null;
    }
  }
}
