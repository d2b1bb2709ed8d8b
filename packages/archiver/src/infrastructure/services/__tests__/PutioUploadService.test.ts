import { mkdtemp, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest';
import { UploadFailedError } from '@dvr-archiver/common-types';
import { silentLogger } from '../../../shared/logger.js';
import { PUTIO_UPLOAD_URL, PutioUploadService } from '../PutioUploadService.js';

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } });
}

describe('PutioUploadService', () => {
  let dir: string;
  let path: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'dvr-putio-'));
    path = join(dir, 'a.mp4');
    await writeFile(path, 'video-bytes');
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  function createService(fetchFn: typeof fetch, parentId: number | null = 7) {
    return new PutioUploadService(
      { backend: 'putio', token: 'test-token', parentId },
      { fetchFn, logger: silentLogger, retry: { sleep: async () => {} } },
    );
  }

  it('multipart で POST し、file.id をリモートIDとして返す', async () => {
    const fetchFn = vi.fn<typeof fetch>(async () => jsonResponse({ status: 'OK', file: { id: 123 } }));

    const result = await createService(fetchFn).upload({ path, fileName: 'a.mp4', size: 11 });

    expect(result).toEqual({ remoteId: '123' });
    const [url, init] = fetchFn.mock.calls[0];
    expect(url).toBe(PUTIO_UPLOAD_URL);
    expect(init?.method).toBe('POST');
    expect(init?.headers).toEqual({ Authorization: 'Bearer test-token' });
    const body = init?.body;
    expect(body).toBeInstanceOf(FormData);
    if (body instanceof FormData) {
      expect(body.get('filename')).toBe('a.mp4');
      expect(body.get('parent_id')).toBe('7');
      const uploaded = body.get('file');
      expect(uploaded instanceof Blob ? await uploaded.text() : null).toBe('video-bytes');
    }
  });

  it('parent_id が未設定なら送らない', async () => {
    const fetchFn = vi.fn<typeof fetch>(async () => jsonResponse({ status: 'OK', file: { id: 1 } }));

    await createService(fetchFn, null).upload({ path, fileName: 'a.mp4', size: 11 });

    const body = fetchFn.mock.calls[0][1]?.body;
    expect(body instanceof FormData ? body.has('parent_id') : true).toBe(false);
  });

  it('file がなければ transfer.id を使う', async () => {
    const fetchFn = vi.fn<typeof fetch>(async () => jsonResponse({ status: 'OK', file: null, transfer: { id: 55 } }));

    await expect(createService(fetchFn).upload({ path, fileName: 'a.mp4', size: 11 })).resolves.toEqual({
      remoteId: '55',
    });
  });

  it('status が OK でなければ失敗', async () => {
    const fetchFn = vi.fn<typeof fetch>(async () => jsonResponse({ status: 'ERROR', error_message: 'Invalid token' }));

    await expect(createService(fetchFn).upload({ path, fileName: 'a.mp4', size: 11 })).rejects.toThrow(
      new UploadFailedError('put.io upload of a.mp4 failed: Invalid token'),
    );
    expect(fetchFn).toHaveBeenCalledTimes(1);
  });

  it('5xx は再試行する', async () => {
    const fetchFn = vi
      .fn<typeof fetch>()
      .mockResolvedValueOnce(jsonResponse({}, 502))
      .mockResolvedValueOnce(jsonResponse({ status: 'OK', file: { id: 9 } }));

    await expect(createService(fetchFn).upload({ path, fileName: 'a.mp4', size: 11 })).resolves.toEqual({
      remoteId: '9',
    });
    expect(fetchFn).toHaveBeenCalledTimes(2);
  });

  it('401 は再試行しない', async () => {
    const fetchFn = vi.fn<typeof fetch>(async () => jsonResponse({}, 401));

    await expect(createService(fetchFn).upload({ path, fileName: 'a.mp4', size: 11 })).rejects.toThrow(
      'put.io upload of a.mp4 failed: HTTP 401',
    );
    expect(fetchFn).toHaveBeenCalledTimes(1);
  });
});
