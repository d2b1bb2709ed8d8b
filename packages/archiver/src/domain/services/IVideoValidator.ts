export interface VideoValidation {
  isValid: boolean;
  reason: string;
  actualDuration: number | null;
  expectedDuration: number | null;
  /** |actual - expected| / expected, null when no expected duration */
  deviation: number | null;
}

/**
 * ダウンロード済み動画ファイルの検証
 */
export interface IVideoValidator {
  validate(filePath: string, expectedDuration?: number | null): Promise<VideoValidation>;
}
