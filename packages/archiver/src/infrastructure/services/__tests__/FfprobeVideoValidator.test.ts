import { mkdtemp, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { silentLogger } from '../../../shared/logger.js';
import { FfprobeVideoValidator, MIN_FILE_SIZE, evaluateVideo, parseProbeDuration } from '../FfprobeVideoValidator.js';

const BIG = 2 * MIN_FILE_SIZE;

describe('evaluateVideo', () => {
  it('ファイルがなければ無効', () => {
    expect(evaluateVideo({ size: null, actualDuration: null, expectedDuration: 3600 }).reason).toBe(
      'File does not exist',
    );
  });

  it('1 MiB 未満は無効', () => {
    expect(evaluateVideo({ size: 1000, actualDuration: null, expectedDuration: null }).reason).toBe(
      'File too small (1000 bytes, minimum 1048576)',
    );
  });

  it('再生時間が取れなければ無効', () => {
    expect(evaluateVideo({ size: BIG, actualDuration: null, expectedDuration: 3600 })).toEqual({
      isValid: false,
      reason: 'Cannot determine video duration (possibly corrupted)',
      actualDuration: null,
      expectedDuration: 3600,
      deviation: null,
    });
  });

  it('期待値がなければ再生時間が取れれば有効', () => {
    expect(evaluateVideo({ size: BIG, actualDuration: 3590, expectedDuration: null })).toEqual({
      isValid: true,
      reason: 'Valid (duration: 3590.0s)',
      actualDuration: 3590,
      expectedDuration: null,
      deviation: null,
    });
  });

  it('許容範囲内の差は有効', () => {
    const result = evaluateVideo({ size: BIG, actualDuration: 3590, expectedDuration: 3600 });

    expect(result.isValid).toBe(true);
    expect(result.reason).toBe('Valid (3590.0s actual vs 3600.0s expected (0.3% deviation))');
  });

  it('途中で切れた動画は無効', () => {
    const result = evaluateVideo({ size: BIG, actualDuration: 1200, expectedDuration: 3600 });

    expect(result.isValid).toBe(false);
    expect(result.reason).toBe('Duration mismatch: 1200.0s actual vs 3600.0s expected (66.7% deviation)');
    expect(result.deviation).toBeCloseTo(2 / 3);
  });

  it('should treat a zero expected duration as unknown', () => {
    expect(evaluateVideo({ size: BIG, actualDuration: 10, expectedDuration: 0 }).reason).toBe(
      'Valid (duration: 10.0s)',
    );
  });
});

describe('parseProbeDuration', () => {
  it('should read format.duration', () => {
    expect(parseProbeDuration('{"format": {"duration": "3600.040000"}}')).toBe(3600.04);
  });

  it('should return null when the duration is missing or unreadable', () => {
    expect(parseProbeDuration('{"format": {}}')).toBeNull();
    expect(parseProbeDuration('{"format": {"duration": "N/A"}}')).toBeNull();
    expect(parseProbeDuration('not json')).toBeNull();
  });
});

describe('FfprobeVideoValidator', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'dvr-validate-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('小さいファイルは ffprobe を実行せずに無効と判定する', async () => {
    const path = join(dir, 'tiny.mp4');
    await writeFile(path, 'tiny');
    const validator = new FfprobeVideoValidator('/nonexistent/ffprobe', 0.1, silentLogger);

    await expect(validator.validate(path, 3600)).resolves.toMatchObject({
      isValid: false,
      reason: 'File too small (4 bytes, minimum 1048576)',
    });
  });

  it('存在しないファイルは無効', async () => {
    const validator = new FfprobeVideoValidator('/nonexistent/ffprobe', 0.1, silentLogger);

    await expect(validator.validate(join(dir, 'missing.mp4'))).resolves.toMatchObject({
      isValid: false,
      reason: 'File does not exist',
    });
  });
});
