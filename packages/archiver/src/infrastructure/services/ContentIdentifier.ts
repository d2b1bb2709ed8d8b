import { createReadStream } from 'fs';
import { stat } from 'fs/promises';
import { blake3 } from '@noble/hashes/blake3.js';
import { bytesToHex } from '@noble/hashes/utils.js';
import type { IdentityMode } from '@dvr-archiver/common-types';
import type { IContentIdentifier, IdentifiedFile } from '../../domain/services/IContentIdentifier.js';

/**
 * ファイル全体の BLAKE3 ハッシュ（ストリーミング）
 */
export async function blake3File(filePath: string): Promise<string> {
  const hasher = blake3.create({});
  for await (const chunk of createReadStream(filePath)) {
    if (typeof chunk === 'string') {
      hasher.update(new TextEncoder().encode(chunk));
    } else if (chunk instanceof Uint8Array) {
      hasher.update(chunk);
    }
  }
  return bytesToHex(hasher.digest());
}

/**
 * 同一性キーの算出
 *
 * - blake3     : "blake3:<hex>"
 * - size-mtime : "size-mtime:<size>:<mtimeMs>"（内容を読まないので高速だが、コピーで別物になる）
 */
export class ContentIdentifier implements IContentIdentifier {
  constructor(private readonly mode: IdentityMode = 'blake3') {}

  async identify(filePath: string): Promise<IdentifiedFile> {
    const info = await stat(filePath);
    const mtimeMs = Math.trunc(info.mtimeMs);

    if (this.mode === 'size-mtime') {
      return { identity: `size-mtime:${info.size}:${mtimeMs}`, size: info.size, mtimeMs };
    }

    const hex = await blake3File(filePath);
    return { identity: `blake3:${hex}`, size: info.size, mtimeMs };
  }
}
