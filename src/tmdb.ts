import { z } from 'zod';
import type { MetadataClient } from './metadataClient.js';
import type { Episode, ImageRef, MetadataSource, Season, Series, SeriesCandidate } from './types.js';
import { log } from './logging.js';

// TMDB sends null for missing fields; the domain models use undefined.
const optStr = z.string().nullish().transform(v => v ?? undefined);
const optNum = z.number().nullish().transform(v => v ?? undefined);

const candidateSchema = z.object({
  id: z.number(),
  name: z.string(),
  original_name: optStr,
  first_air_date: optStr,
  popularity: optNum,
  overview: optStr,
  poster_path: optStr,
  backdrop_path: optStr,
  vote_average: optNum,
});

const searchSchema = z.object({ results: z.array(candidateSchema) });

const seriesSchema = candidateSchema.extend({
  status: optStr,
  genres: z.array(z.object({ name: z.string() })).nullish(),
  networks: z.array(z.object({ name: z.string() })).nullish(),
});

const seasonSchema = z.object({
  season_number: z.number(),
  name: optStr,
  overview: optStr,
  air_date: optStr,
  episode_count: optNum,
  poster_path: optStr,
  episodes: z.array(z.unknown()).nullish(),
});

const episodeSchema = z.object({
  id: optNum,
  name: optStr,
  overview: optStr,
  season_number: optNum,
  episode_number: optNum,
  air_date: optStr,
  vote_average: optNum,
  still_path: optStr,
  crew: z.array(z.object({ name: z.string(), job: optStr })).nullish(),
  guest_stars: z.array(z.object({ name: z.string(), character: optStr })).nullish(),
});

const imagesSchema = z.object({
  posters: z.array(z.object({ file_path: z.string(), vote_average: optNum })).nullish(),
});

export interface TmdbOptions {
  apiKey: string;
  baseUrl: string;
  imageBaseUrl: string;
}

function toCandidate(d: z.infer<typeof candidateSchema>): SeriesCandidate {
  return {
    id: d.id,
    name: d.name,
    originalName: d.original_name,
    firstAirDate: d.first_air_date,
    popularity: d.popularity,
    overview: d.overview,
    posterPath: d.poster_path,
    backdropPath: d.backdrop_path,
    voteAverage: d.vote_average,
  };
}

export class TmdbApi implements MetadataSource {
  constructor(private readonly client: MetadataClient, private readonly opts: TmdbOptions) {}

  private async get<T extends z.ZodTypeAny>(path: string, schema: T, params: Record<string, string> = {}): Promise<z.output<T> | undefined> {
    const base = this.opts.baseUrl.replace(/\/+$/, '');
    const body = await this.client.get(`${base}${path}`, { ...params, api_key: this.opts.apiKey });
    if (body === undefined) return undefined;
    const parsed = schema.safeParse(body);
    if (!parsed.success) {
      log('warn', `Unexpected response shape from ${path}: ${parsed.error.issues[0]?.message ?? 'invalid'}`);
      return undefined;
    }
    return parsed.data;
  }

  async searchSeries(term: string): Promise<SeriesCandidate[] | undefined> {
    const js = await this.get('/search/tv', searchSchema, { query: term, include_adult: 'false' });
    if (!js) return undefined;
    log('debug', `searchSeries: query=${term} results=${js.results.length}`);
    return js.results.map(toCandidate);
  }

  async getSeries(seriesId: number): Promise<Series | undefined> {
    const d = await this.get(`/tv/${seriesId}`, seriesSchema);
    if (!d) return undefined;
    return {
      ...toCandidate(d),
      status: d.status,
      genres: (d.genres ?? []).map(g => g.name),
      networks: (d.networks ?? []).map(n => n.name),
    };
  }

  async getSeason(seriesId: number, seasonNumber: number): Promise<Season | undefined> {
    const d = await this.get(`/tv/${seriesId}/season/${seasonNumber}`, seasonSchema);
    if (!d) return undefined;
    return {
      seasonNumber: d.season_number,
      name: d.name ?? `Season ${d.season_number}`,
      overview: d.overview,
      airDate: d.air_date,
      episodeCount: d.episode_count ?? d.episodes?.length,
      posterPath: d.poster_path,
    };
  }

  async getEpisode(seriesId: number, seasonNumber: number, episodeNumber: number): Promise<Episode | undefined> {
    const d = await this.get(`/tv/${seriesId}/season/${seasonNumber}/episode/${episodeNumber}`, episodeSchema);
    if (!d) return undefined;
    return {
      id: d.id,
      name: d.name,
      overview: d.overview,
      seasonNumber: d.season_number ?? seasonNumber,
      episodeNumber: d.episode_number ?? episodeNumber,
      airDate: d.air_date,
      voteAverage: d.vote_average,
      stillPath: d.still_path,
      directors: (d.crew ?? []).filter(c => c.job === 'Director').map(c => c.name),
      guestStars: (d.guest_stars ?? []).map(g => ({ name: g.name, character: g.character })),
    };
  }

  async getSeasonImages(seriesId: number, seasonNumber: number): Promise<ImageRef[] | undefined> {
    const d = await this.get(`/tv/${seriesId}/season/${seasonNumber}/images`, imagesSchema);
    if (!d) return undefined;
    return (d.posters ?? []).map(p => ({ filePath: p.file_path, voteAverage: p.vote_average }));
  }

  imageUrl(imagePath: string | undefined, size = 'original'): string | undefined {
    if (!imagePath) return undefined;
    return `${this.opts.imageBaseUrl.replace(/\/+$/, '')}/${size}${imagePath}`;
  }
}
