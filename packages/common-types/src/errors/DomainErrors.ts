/**
 * ドメインエラーの基底クラス
 */
export abstract class DomainError extends Error {
  constructor(
    message: string,
    public readonly code: string
  ) {
    super(message);
    this.name = this.constructor.name;
    // prototypeチェーンの復元（TypeScriptのextends Errorの問題対応）
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * 入力値エラー（実行全体を中断する）
 */
export class InvalidInputError extends DomainError {
  constructor(message: string) {
    super(message, 'INVALID_INPUT');
  }
}

/**
 * Recording / Catalog関連エラー
 */
export class RecordingNotFoundError extends DomainError {
  constructor(message: string) {
    super(message, 'RECORDING_NOT_FOUND');
  }
}

export class InvalidStateTransitionError extends DomainError {
  constructor(message: string) {
    super(message, 'INVALID_STATE_TRANSITION');
  }
}

export class AmbiguousMatchError extends DomainError {
  constructor(
    message: string,
    public readonly candidates: string[]
  ) {
    super(message, 'AMBIGUOUS_MATCH');
  }
}

/**
 * デバイス関連エラー
 */
export class DeviceRequestError extends DomainError {
  constructor(
    message: string,
    public readonly transient: boolean,
    public readonly status: number | null = null
  ) {
    super(message, 'DEVICE_REQUEST_FAILED');
  }
}

export class DeviceUnreachableError extends DomainError {
  constructor(
    public readonly device: string,
    message: string
  ) {
    super(message, 'DEVICE_UNREACHABLE');
  }
}

export class MetadataFetchFailedError extends DomainError {
  constructor(
    public readonly recordingId: string,
    message: string
  ) {
    super(message, 'METADATA_FETCH_FAILED');
  }
}

/**
 * 取得（トランスコード）関連エラー
 */
export class TranscodeFailedError extends DomainError {
  constructor(message: string) {
    super(message, 'TRANSCODE_FAILED');
  }
}

/**
 * アップロード関連エラー
 */
export class UploadFailedError extends DomainError {
  constructor(
    message: string,
    public readonly transient: boolean = false
  ) {
    super(message, 'UPLOAD_FAILED');
  }
}

/**
 * 永続ストア破損（プロセスは処理を続行してはならない）
 */
export class CatalogCorruptError extends DomainError {
  constructor(message: string) {
    super(message, 'CATALOG_CORRUPT');
  }
}

export class LedgerCorruptError extends DomainError {
  constructor(message: string) {
    super(message, 'LEDGER_CORRUPT');
  }
}
