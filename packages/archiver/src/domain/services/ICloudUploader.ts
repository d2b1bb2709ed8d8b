export interface CloudUploadFile {
  path: string;
  fileName: string;
  size: number;
}

export interface CloudUploadResult {
  /** Identifier assigned by the cloud target */
  remoteId: string;
}

/**
 * クラウドアップロードの境界
 *
 * 失敗は UploadFailedError として throw される
 * 実装: PutioUploadService, S3UploadService
 */
export interface ICloudUploader {
  readonly name: string;
  upload(file: CloudUploadFile): Promise<CloudUploadResult>;
}
