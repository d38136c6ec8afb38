import { Response } from 'node-fetch';
import { describe, expect, it } from 'vitest';
import { MetadataClient, type FetchLike } from '../src/metadataClient.js';
import { TmdbApi } from '../src/tmdb.js';

function api(routes: Record<string, unknown>) {
  const requested: string[] = [];
  const fetch: FetchLike = async url => {
    requested.push(url);
    const pathname = new URL(url).pathname.replace(/^\/3/, '');
    if (!(pathname in routes)) return new Response('{}', { status: 404 });
    return new Response(JSON.stringify(routes[pathname]), { status: 200 });
  };
  const client = new MetadataClient({ maxRetries: 1, fetch, sleep: async () => {} });
  const tmdb = new TmdbApi(client, {
    apiKey: 'test-secret',
    baseUrl: 'https://api.test/3',
    imageBaseUrl: 'https://img.test/t/p',
  });
  return { tmdb, requested };
}

describe('TmdbApi', () => {
  it('searches with the api key and maps results', async () => {
    const { tmdb, requested } = api({
      '/search/tv': {
        results: [
          { id: 100, name: 'Supernatural', first_air_date: '2005-09-13', popularity: 250.5, poster_path: '/p.jpg', overview: null },
        ],
      },
    });
    const results = await tmdb.searchSeries('Supernatural');
    expect(results).toEqual([
      {
        id: 100,
        name: 'Supernatural',
        originalName: undefined,
        firstAirDate: '2005-09-13',
        popularity: 250.5,
        overview: undefined,
        posterPath: '/p.jpg',
        backdropPath: undefined,
        voteAverage: undefined,
      },
    ]);
    expect(requested[0]).toBe('https://api.test/3/search/tv?api_key=test-secret&include_adult=false&query=Supernatural');
  });

  it('maps a series with genres and networks', async () => {
    const { tmdb } = api({
      '/tv/100': {
        id: 100,
        name: 'Supernatural',
        original_name: 'Supernatural',
        first_air_date: '2005-09-13',
        status: 'Ended',
        vote_average: 8.3,
        genres: [{ id: 1, name: 'Drama' }, { id: 2, name: 'Mystery' }],
        networks: [{ id: 7, name: 'The WB' }],
      },
    });
    const series = await tmdb.getSeries(100);
    expect(series?.name).toBe('Supernatural');
    expect(series?.status).toBe('Ended');
    expect(series?.genres).toEqual(['Drama', 'Mystery']);
    expect(series?.networks).toEqual(['The WB']);
  });

  it('counts season episodes when episode_count is missing', async () => {
    const { tmdb } = api({
      '/tv/100/season/1': { season_number: 1, name: 'Season 1', air_date: '2005-09-13', episodes: [{}, {}, {}] },
    });
    expect(await tmdb.getSeason(100, 1)).toEqual({
      seasonNumber: 1,
      name: 'Season 1',
      overview: undefined,
      airDate: '2005-09-13',
      episodeCount: 3,
      posterPath: undefined,
    });
  });

  it('derives directors from crew and keeps guest stars', async () => {
    const { tmdb } = api({
      '/tv/100/season/1/episode/2': {
        id: 55,
        name: 'Wendigo',
        crew: [
          { name: 'Ann Director', job: 'Director' },
          { name: 'Will Writer', job: 'Writer' },
        ],
        guest_stars: [{ name: 'Guest One', character: 'Ranger' }],
        still_path: '/still.jpg',
      },
    });
    const ep = await tmdb.getEpisode(100, 1, 2);
    expect(ep?.seasonNumber).toBe(1);
    expect(ep?.episodeNumber).toBe(2);
    expect(ep?.directors).toEqual(['Ann Director']);
    expect(ep?.guestStars).toEqual([{ name: 'Guest One', character: 'Ranger' }]);
    expect(ep?.stillPath).toBe('/still.jpg');
  });

  it('returns undefined when the service fails or the shape is wrong', async () => {
    const { tmdb } = api({ '/tv/5': { name: 'no id here' } });
    expect(await tmdb.getSeries(5)).toBeUndefined();
    expect(await tmdb.getEpisode(5, 1, 1)).toBeUndefined();
  });

  it('maps season posters', async () => {
    const { tmdb } = api({
      '/tv/100/season/1/images': { posters: [{ file_path: '/a.jpg', vote_average: 5.2 }, { file_path: '/b.jpg' }] },
    });
    expect(await tmdb.getSeasonImages(100, 1)).toEqual([
      { filePath: '/a.jpg', voteAverage: 5.2 },
      { filePath: '/b.jpg', voteAverage: undefined },
    ]);
  });

  it('builds image urls', () => {
    const { tmdb } = api({});
    expect(tmdb.imageUrl('/p.jpg')).toBe('https://img.test/t/p/original/p.jpg');
    expect(tmdb.imageUrl('/p.jpg', 'w500')).toBe('https://img.test/t/p/w500/p.jpg');
    expect(tmdb.imageUrl(undefined)).toBeUndefined();
  });
});
