import type { ContentIdentity } from '@dvr-archiver/common-types';

export interface IdentifiedFile {
  identity: ContentIdentity;
  size: number;
  mtimeMs: number;
}

/**
 * ローカルファイルから同一性キーを算出
 */
export interface IContentIdentifier {
  identify(filePath: string): Promise<IdentifiedFile>;
}
