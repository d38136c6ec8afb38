import { describe, expect, it } from 'vitest';
import { extractNameAndYear, rankCandidates, SeriesResolver } from '../src/resolver.js';
import type { SeriesCandidate } from '../src/types.js';
import { FakeMetadata, makeSeries } from './fakes.js';

const cand = (id: number, firstAirDate: string | undefined, popularity?: number): SeriesCandidate => ({
  id,
  name: `Show ${id}`,
  firstAirDate,
  popularity,
});

describe('extractNameAndYear', () => {
  it('recognises both year forms', () => {
    expect(extractNameAndYear('Supernatural (2005)')).toEqual({ name: 'Supernatural', year: 2005 });
    expect(extractNameAndYear('Doctor Who 2005')).toEqual({ name: 'Doctor Who', year: 2005 });
  });

  it('leaves names without a trailing year alone', () => {
    expect(extractNameAndYear('  Dark  ')).toEqual({ name: 'Dark' });
    expect(extractNameAndYear('1923')).toEqual({ name: '1923' });
  });
});

describe('rankCandidates', () => {
  const results = [cand(1, '2005-01-01', 10), cand(2, '1963-11-23', 90), cand(3, '2005-06-01', 40), cand(4, undefined)];

  it('keeps only exact-year matches when there are any', () => {
    expect(rankCandidates(results, 2005).map(r => r.id)).toEqual([3, 1]);
  });

  it('falls back to popularity when no year matches', () => {
    expect(rankCandidates(results, 1999).map(r => r.id)).toEqual([2, 3, 1, 4]);
    expect(rankCandidates(results).map(r => r.id)).toEqual([2, 3, 1, 4]);
  });

  it('keeps the original order for equal popularity', () => {
    const tied = [cand(7, undefined, 5), cand(8, undefined, 5), cand(9, undefined, 5)];
    expect(rankCandidates(tied).map(r => r.id)).toEqual([7, 8, 9]);
  });
});

describe('SeriesResolver', () => {
  it('searches with the year stripped and ranks the results', async () => {
    const source = new FakeMetadata();
    source.candidates = [cand(1, '1996-01-01', 99), cand(2, '2005-09-13', 3)];
    const ranked = await new SeriesResolver(source).search('Supernatural (2005)');
    expect(source.calls).toEqual(['search:Supernatural']);
    expect(ranked.map(r => r.id)).toEqual([2]);
  });

  it('returns an empty list when the service is unavailable', async () => {
    const source = new FakeMetadata();
    source.searchSeries = async () => undefined;
    expect(await new SeriesResolver(source).search('Dark')).toEqual([]);
  });

  it('resolves to the full series when available', async () => {
    const source = new FakeMetadata();
    source.series.set(1, makeSeries({ id: 1, name: 'Dark', status: 'Ended', genres: ['Drama'] }));
    const series = await new SeriesResolver(source).resolve(cand(1, '2017-12-01'));
    expect(series.status).toBe('Ended');
    expect(series.genres).toEqual(['Drama']);
  });

  it('falls back to the search result when details are unavailable', async () => {
    const source = new FakeMetadata();
    const series = await new SeriesResolver(source).resolve({ id: 4, name: 'Dark', firstAirDate: '2017-12-01', overview: 'A town.' });
    expect(series).toMatchObject({ id: 4, name: 'Dark', firstAirDate: '2017-12-01', overview: 'A town.', genres: [], networks: [] });
  });
});
