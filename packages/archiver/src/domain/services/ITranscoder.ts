export interface TranscodeRequest {
  /** Manifest location passed to the transcoder as input */
  manifestUrl: string;
  outputPath: string;
  /** Written into the container's title metadata */
  title: string;
  /** Aborting kills the transcoder process */
  signal?: AbortSignal;
}

export interface TranscodeResult {
  exitCode: number;
  stderr: string;
}

/**
 * 外部トランスコーダの境界
 *
 * 観測するのは終了コードと出力ファイルのみ
 */
export interface ITranscoder {
  transcode(request: TranscodeRequest): Promise<TranscodeResult>;
}
