import { execFile } from 'child_process';
import { promisify } from 'util';
import { TranscodeFailedError } from '@dvr-archiver/common-types';
import type { ITranscoder, TranscodeRequest, TranscodeResult } from '../../domain/services/ITranscoder.js';

const execFileAsync = promisify(execFile);

const PROTOCOL_WHITELIST = 'file,http,https,tcp,tls,crypto';

/**
 * HLS マニフェストを再エンコードせずに mp4 へコピーする ffmpeg 引数
 */
export function buildFfmpegArgs(request: Pick<TranscodeRequest, 'manifestUrl' | 'outputPath' | 'title'>): string[] {
  return [
    '-hide_banner',
    '-loglevel', 'warning',
    '-protocol_whitelist', PROTOCOL_WHITELIST,
    '-i', request.manifestUrl,
    '-c', 'copy',
    '-metadata', `title=${request.title}`,
    '-y',
    request.outputPath,
  ];
}

function processFailure(err: unknown): { exitCode: number; stderr: string } | null {
  if (typeof err !== 'object' || err === null || !('code' in err) || typeof err.code !== 'number') {
    return null;
  }
  const stderr = 'stderr' in err && typeof err.stderr === 'string' ? err.stderr : '';
  return { exitCode: err.code, stderr };
}

/**
 * ffmpeg を子プロセスとして起動するトランスコーダ
 *
 * 終了コードと stderr のみを返す。signal が abort されたらプロセスを kill する
 */
export class FfmpegTranscoder implements ITranscoder {
  constructor(private readonly ffmpegPath: string = 'ffmpeg') {}

  async transcode(request: TranscodeRequest): Promise<TranscodeResult> {
    try {
      const { stderr } = await execFileAsync(this.ffmpegPath, buildFfmpegArgs(request), {
        signal: request.signal,
        maxBuffer: 10 * 1024 * 1024,
      });
      return { exitCode: 0, stderr };
    } catch (err: unknown) {
      if (request.signal?.aborted) {
        throw new TranscodeFailedError(`ffmpeg was interrupted while writing ${request.outputPath}`);
      }
      const failure = processFailure(err);
      if (failure) {
        return failure;
      }
      const message = err instanceof Error ? err.message : String(err);
      throw new TranscodeFailedError(`Could not run ${this.ffmpegPath}: ${message}`);
    }
  }
}
