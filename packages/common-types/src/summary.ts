/**
 * 1回の実行で発生した個別の失敗
 */
export interface RunFailure {
  /** device address, recording id or file name */
  subject: string;
  code: string;
  message: string;
}

/**
 * 操作種別ごとの集計（実行終了時に表示する）
 */
export interface RunSummary {
  operation: string;
  succeeded: string[];
  skipped: string[];
  failed: RunFailure[];
}

export function createRunSummary(operation: string): RunSummary {
  return { operation, succeeded: [], skipped: [], failed: [] };
}
