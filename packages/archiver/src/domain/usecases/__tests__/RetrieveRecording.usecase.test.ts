import { mkdtemp, readFile, readdir, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import {
  CatalogEntryEntity,
  InvalidInputError,
  RecordingNotFoundError,
  TranscodeFailedError,
} from '@dvr-archiver/common-types';
import type { Recording } from '@dvr-archiver/common-types';
import { InMemoryCatalogRepository } from '../../../infrastructure/repositories/InMemoryCatalogRepository.js';
import { silentLogger } from '../../../shared/logger.js';
import { RetrieveRecordingUseCase, isPartialFile } from '../RetrieveRecording.usecase.js';
import type { RetrieveRecordingOptions } from '../RetrieveRecording.usecase.js';
import {
  DEVICE_A,
  FakeDeviceClient,
  FakeTranscoder,
  FakeVideoValidator,
  invalidVideo,
  makeRecording,
} from './fakes.js';

const FILE_NAME = 'Nature_Hour_-_Owls_-_S01E02.mp4';
const completedAt = new Date('2024-03-06T12:00:00.000Z');

describe('RetrieveRecordingUseCase', () => {
  let dir: string;
  let repository: InMemoryCatalogRepository;
  let device: FakeDeviceClient;
  let recording: Recording;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'dvr-retrieve-'));
    repository = new InMemoryCatalogRepository();
    device = new FakeDeviceClient();
    recording = makeRecording();
    await repository.save(CatalogEntryEntity.create(recording, new Date('2024-03-02T00:00:00.000Z')));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  function createUseCase(transcoder: FakeTranscoder, options: RetrieveRecordingOptions = {}) {
    return new RetrieveRecordingUseCase(repository, device, transcoder, {
      logger: silentLogger,
      now: () => completedAt,
      ...options,
    });
  }

  async function storedEntry() {
    return repository.findByRef({ device: DEVICE_A, recordingId: recording.id });
  }

  it('一時ファイルにトランスコードしてから最終パスへ移動する', async () => {
    const transcoder = new FakeTranscoder({ content: 'video-bytes' });

    const file = await createUseCase(transcoder).execute({
      ref: { device: DEVICE_A, recordingId: recording.id },
      destinationDir: dir,
    });

    expect(file).toEqual({ path: join(dir, FILE_NAME), size: 11, reused: false });
    expect(transcoder.requests).toHaveLength(1);
    expect(transcoder.requests[0]).toMatchObject({
      manifestUrl: `http://${DEVICE_A}:8885/stream${recording.id}/pl/playlist.m3u8`,
      outputPath: join(dir, `Nature_Hour_-_Owls_-_S01E02.partial-${process.pid}.mp4`),
      title: 'Nature Hour - Owls',
    });
    expect(await readdir(dir)).toEqual([FILE_NAME]);
    expect(await readFile(join(dir, FILE_NAME), 'utf-8')).toBe('video-bytes');

    const entry = await storedEntry();
    expect(entry?.getDownloadStatus()).toBe('complete');
    expect(entry?.toDTO().localPath).toBe(join(dir, FILE_NAME));
    expect(entry?.toDTO().downloadedAt).toBe('2024-03-06T12:00:00.000Z');
  });

  it('既存ファイルがあり overwrite=false ならトランスコーダを呼ばずに再利用する', async () => {
    await writeFile(join(dir, FILE_NAME), 'old');
    const transcoder = new FakeTranscoder();

    const file = await createUseCase(transcoder).execute({
      ref: { device: DEVICE_A, recordingId: recording.id },
      destinationDir: dir,
    });

    expect(file).toEqual({ path: join(dir, FILE_NAME), size: 3, reused: true });
    expect(transcoder.requests).toEqual([]);
    expect(device.manifestCalls).toEqual([]);
    expect((await storedEntry())?.getDownloadStatus()).toBe('complete');
  });

  it('overwrite=true なら既存ファイルを置き換える', async () => {
    await writeFile(join(dir, FILE_NAME), 'old');
    const transcoder = new FakeTranscoder({ content: 'fresh-video' });

    const file = await createUseCase(transcoder).execute({
      ref: { device: DEVICE_A, recordingId: recording.id },
      destinationDir: dir,
      overwrite: true,
    });

    expect(file.reused).toBe(false);
    expect(await readFile(join(dir, FILE_NAME), 'utf-8')).toBe('fresh-video');
  });

  it('出力先ディレクトリがなければ作成する', async () => {
    const nested = join(dir, 'a', 'b');

    const file = await createUseCase(new FakeTranscoder()).execute({
      ref: { device: DEVICE_A, recordingId: recording.id },
      destinationDir: nested,
    });

    expect(file.path).toBe(join(nested, FILE_NAME));
  });

  it('終了コードが 0 以外なら一時ファイルを削除して失敗する', async () => {
    const transcoder = new FakeTranscoder({ exitCode: 1, content: 'partial', stderr: 'Server returned 404 Not Found\n' });

    const promise = createUseCase(transcoder).execute({
      ref: { device: DEVICE_A, recordingId: recording.id },
      destinationDir: dir,
    });

    await expect(promise).rejects.toThrow(
      new TranscodeFailedError(
        `Transcoder exited with code 1 for ${DEVICE_A}${recording.id}: Server returned 404 Not Found`,
      ),
    );
    expect(await readdir(dir)).toEqual([]);
    expect((await storedEntry())?.getDownloadStatus()).toBe('absent');
  });

  it('出力が空なら失敗する', async () => {
    const promise = createUseCase(new FakeTranscoder({ content: '' })).execute({
      ref: { device: DEVICE_A, recordingId: recording.id },
      destinationDir: dir,
    });

    await expect(promise).rejects.toThrow(`Transcoder produced no output for ${DEVICE_A}${recording.id}`);
    expect((await storedEntry())?.getDownloadStatus()).toBe('absent');
  });

  it('再生時間が足りない出力は途中で切れたものとして破棄する', async () => {
    const validator = new FakeVideoValidator();
    validator.results.set('*', invalidVideo('Duration mismatch: 1200.0s actual vs 3600.0s expected (66.7% deviation)'));

    const promise = createUseCase(new FakeTranscoder(), { validator }).execute({
      ref: { device: DEVICE_A, recordingId: recording.id },
      destinationDir: dir,
    });

    await expect(promise).rejects.toThrow(
      `Output for ${DEVICE_A}${recording.id} looks truncated: Duration mismatch: 1200.0s actual vs 3600.0s expected (66.7% deviation)`,
    );
    expect(validator.calls).toEqual([
      { filePath: join(dir, `Nature_Hour_-_Owls_-_S01E02.partial-${process.pid}.mp4`), expectedDuration: 3600 },
    ]);
    expect(await readdir(dir)).toEqual([]);
  });

  it('中断されたら一時ファイルを削除する', async () => {
    const controller = new AbortController();
    controller.abort();

    const promise = createUseCase(new FakeTranscoder()).execute({
      ref: { device: DEVICE_A, recordingId: recording.id },
      destinationDir: dir,
      signal: controller.signal,
    });

    await expect(promise).rejects.toThrow(`Download of ${DEVICE_A}${recording.id} was interrupted`);
    expect(await readdir(dir)).toEqual([]);
  });

  it('前回の実行で downloading のまま残ったエントリもダウンロードできる', async () => {
    const entry = CatalogEntryEntity.create(recording);
    entry.startDownload();
    await repository.save(entry);

    const file = await createUseCase(new FakeTranscoder()).execute({
      ref: { device: DEVICE_A, recordingId: recording.id },
      destinationDir: dir,
    });

    expect(file.reused).toBe(false);
    expect((await storedEntry())?.getDownloadStatus()).toBe('complete');
  });

  it('カタログにない Recording は RecordingNotFoundError', async () => {
    const promise = createUseCase(new FakeTranscoder()).execute({
      ref: { device: DEVICE_A, recordingId: '/recordings/series/episodes/999999' },
      destinationDir: dir,
    });

    await expect(promise).rejects.toThrow(RecordingNotFoundError);
  });

  it('カテゴリ不明の Recording はファイル名を決められない', async () => {
    const unknown = makeRecording({ id: '/recordings/news/airings/5', category: 'unknown' });
    await repository.save(CatalogEntryEntity.create(unknown));

    const promise = createUseCase(new FakeTranscoder()).execute({
      ref: { device: DEVICE_A, recordingId: unknown.id },
      destinationDir: dir,
    });

    await expect(promise).rejects.toThrow(InvalidInputError);
  });

  describe('plan', () => {
    const ref = () => ({ device: DEVICE_A, recordingId: recording.id });

    it('ファイルがなければ download', async () => {
      const transcoder = new FakeTranscoder();

      const plan = await createUseCase(transcoder).plan({ ref: ref(), destinationDir: dir });

      expect(plan).toEqual({ ref: ref(), title: 'Nature Hour - Owls', path: join(dir, FILE_NAME), action: 'download' });
      expect(transcoder.requests).toEqual([]);
      expect(await readdir(dir)).toEqual([]);
      expect((await storedEntry())?.getDownloadStatus()).toBe('absent');
    });

    it('既存ファイルは reuse、overwrite 指定なら overwrite', async () => {
      await writeFile(join(dir, FILE_NAME), 'old');
      const useCase = createUseCase(new FakeTranscoder());

      expect((await useCase.plan({ ref: ref(), destinationDir: dir })).action).toBe('reuse');
      expect((await useCase.plan({ ref: ref(), destinationDir: dir, overwrite: true })).action).toBe('overwrite');
      expect((await storedEntry())?.getDownloadStatus()).toBe('absent');
    });
  });
});

describe('isPartialFile', () => {
  it('should recognise in-progress downloads', () => {
    expect(isPartialFile('Show.partial-4242.mp4')).toBe(true);
    expect(isPartialFile('Show.mp4')).toBe(false);
  });
});
