import { describe, it, expect } from 'vitest';
import { AmbiguousMatchError, CatalogEntryEntity, InvalidInputError } from '@dvr-archiver/common-types';
import type { Recording } from '@dvr-archiver/common-types';
import { InMemoryCatalogRepository } from '../../../infrastructure/repositories/InMemoryCatalogRepository.js';
import { ResolveEpisodeUseCase, resolveEpisode } from '../ResolveEpisode.usecase.js';
import { DEVICE_A, DEVICE_B, makeRecording } from './fakes.js';

const syncedAt = new Date('2024-03-05T00:00:00.000Z');

function entry(overrides: Partial<Recording>): CatalogEntryEntity {
  return CatalogEntryEntity.create(makeRecording(overrides), syncedAt);
}

function downloaded(overrides: Partial<Recording>): CatalogEntryEntity {
  const e = entry(overrides);
  e.completeDownload('/recordings/done.mp4', syncedAt);
  return e;
}

describe('resolveEpisode', () => {
  it('大文字小文字・記号を無視して一致し、最も新しい未ダウンロードのエピソードを選ぶ', () => {
    const january = entry({ id: '/recordings/series/episodes/201', showTitle: 'the show', airDate: '2024-01-01T20:00Z' });
    const march = entry({ id: '/recordings/series/episodes/202', showTitle: 'The Show!', airDate: '2024-03-01T20:00Z' });
    const december = entry({ id: '/recordings/series/episodes/203', showTitle: 'THE SHOW', airDate: '2023-12-01T20:00Z' });
    const other = entry({
      id: '/recordings/series/episodes/204',
      showTitle: 'The Showrunner',
      airDate: '2024-06-01T20:00Z',
    });

    const result = resolveEpisode([january, march, december, other], 'The Show');

    expect(result).toEqual({
      status: 'found',
      ref: { device: DEVICE_A, recordingId: '/recordings/series/episodes/202' },
      entry: march,
      score: 1,
    });
  });

  it('カタログが空なら empty_catalog', () => {
    expect(resolveEpisode([], 'The Show')).toEqual({ status: 'not_found', reason: 'empty_catalog' });
  });

  it('stale なエントリは候補にしない', () => {
    const stale = entry({ showTitle: 'The Show' });
    stale.markStale(syncedAt);

    expect(resolveEpisode([stale], 'The Show')).toEqual({ status: 'not_found', reason: 'empty_catalog' });
  });

  it('一致する番組がなければ no_match', () => {
    expect(resolveEpisode([entry({ showTitle: 'Evening News' })], 'The Show')).toEqual({
      status: 'not_found',
      reason: 'no_match',
    });
  });

  it('一致したエピソードがすべてダウンロード済みなら all_downloaded', () => {
    const entries = [downloaded({ showTitle: 'The Show' }), downloaded({ showTitle: 'The Show' })];

    expect(resolveEpisode(entries, 'The Show')).toEqual({ status: 'not_found', reason: 'all_downloaded' });
  });

  it('excludeDownloaded=false ならダウンロード済みも選ぶ', () => {
    const done = downloaded({ showTitle: 'The Show' });

    const result = resolveEpisode([done], 'The Show', { excludeDownloaded: false });

    expect(result.status).toBe('found');
  });

  it('放送日時が同じなら Recording ID の大きい方を選ぶ', () => {
    const a = entry({ id: '/recordings/series/episodes/301', showTitle: 'The Show', airDate: '2024-03-01T20:00Z' });
    const b = entry({ id: '/recordings/series/episodes/302', showTitle: 'The Show', airDate: '2024-03-01T20:00Z' });

    const result = resolveEpisode([a, b], 'the show');

    expect(result.status === 'found' && result.ref.recordingId).toBe('/recordings/series/episodes/302');
  });

  it('放送日時のないエントリは最も古いものとして扱う', () => {
    const undated = entry({ id: '/recordings/series/episodes/401', showTitle: 'The Show', airDate: null });
    const dated = entry({ id: '/recordings/series/episodes/400', showTitle: 'The Show', airDate: '2020-01-01T00:00Z' });

    const result = resolveEpisode([undated, dated], 'The Show');

    expect(result.status === 'found' && result.ref.recordingId).toBe('/recordings/series/episodes/400');
  });

  it('一致スコアの高い番組を優先する', () => {
    const exact = entry({ showTitle: 'Simpsons', airDate: '2020-01-01T00:00Z' });
    const fuzzy = entry({ showTitle: 'Simpsns', airDate: '2024-01-01T00:00Z' });

    const result = resolveEpisode([fuzzy, exact], 'simpsons');

    expect(result.status === 'found' && result.entry).toBe(exact);
  });

  it('devices で候補のデバイスを絞り込める', () => {
    const onA = entry({ showTitle: 'The Show', device: DEVICE_A, airDate: '2024-05-01T00:00Z' });
    const onB = entry({ showTitle: 'The Show', device: DEVICE_B, airDate: '2024-01-01T00:00Z' });

    const result = resolveEpisode([onA, onB], 'The Show', { devices: [DEVICE_B] });

    expect(result.status === 'found' && result.ref.device).toBe(DEVICE_B);
  });

  it('空のクエリは InvalidInputError', () => {
    expect(() => resolveEpisode([entry({})], '  !! ')).toThrow(InvalidInputError);
  });

  describe('strict', () => {
    const one = entry({ showTitle: 'Show One', airDate: '2024-02-01T00:00Z' });
    const two = entry({ showTitle: 'Show Two', airDate: '2024-01-01T00:00Z' });

    it('別々の番組が同点なら AmbiguousMatchError', () => {
      expect(() => resolveEpisode([one, two], 'show', { strict: true })).toThrow(AmbiguousMatchError);
      try {
        resolveEpisode([two, one], 'show', { strict: true });
      } catch (err) {
        expect(err instanceof AmbiguousMatchError && err.candidates).toEqual(['show one', 'show two']);
      }
    });

    it('strict でなければ最新のエピソードを選ぶ', () => {
      const result = resolveEpisode([one, two], 'show');

      expect(result.status === 'found' && result.entry).toBe(one);
    });

    it('同じ番組の複数エピソードは曖昧とみなさない', () => {
      const again = entry({ showTitle: 'Show One', airDate: '2024-03-01T00:00Z' });

      const result = resolveEpisode([one, again], 'show one', { strict: true });

      expect(result.status === 'found' && result.entry).toBe(again);
    });
  });
});

describe('ResolveEpisodeUseCase', () => {
  it('リポジトリのカタログから解決する', async () => {
    const repository = new InMemoryCatalogRepository();
    const recording = makeRecording({ showTitle: 'Nature Hour' });
    await repository.save(CatalogEntryEntity.create(recording, syncedAt));

    const result = await new ResolveEpisodeUseCase(repository).execute('nature hour');

    expect(result.status === 'found' && result.ref).toEqual({ device: DEVICE_A, recordingId: recording.id });
  });

  it('デフォルトの閾値を使い、呼び出し側の指定で上書きできる', async () => {
    const repository = new InMemoryCatalogRepository();
    await repository.save(CatalogEntryEntity.create(makeRecording({ showTitle: 'Simpsons' }), syncedAt));
    const useCase = new ResolveEpisodeUseCase(repository, { threshold: 0.9 });

    expect(await useCase.execute('simpsns')).toEqual({ status: 'not_found', reason: 'no_match' });
    expect((await useCase.execute('simpsns', { threshold: 0.8 })).status).toBe('found');
  });

  describe('findById', () => {
    it('デバイス指定ありで1件取得できる', async () => {
      const repository = new InMemoryCatalogRepository();
      const recording = makeRecording({ device: DEVICE_B });
      await repository.save(CatalogEntryEntity.create(recording, syncedAt));

      const found = await new ResolveEpisodeUseCase(repository).findById(recording.id, DEVICE_B);

      expect(found?.getRef()).toEqual({ device: DEVICE_B, recordingId: recording.id });
    });

    it('存在しなければ null', async () => {
      const found = await new ResolveEpisodeUseCase(new InMemoryCatalogRepository()).findById('/recordings/x/1');

      expect(found).toBeNull();
    });

    it('複数のデバイスに同じ ID があれば AmbiguousMatchError', async () => {
      const repository = new InMemoryCatalogRepository();
      const id = '/recordings/series/episodes/777';
      await repository.save(CatalogEntryEntity.create(makeRecording({ id, device: DEVICE_A }), syncedAt));
      await repository.save(CatalogEntryEntity.create(makeRecording({ id, device: DEVICE_B }), syncedAt));

      await expect(new ResolveEpisodeUseCase(repository).findById(id)).rejects.toThrow(AmbiguousMatchError);
    });
  });
});
