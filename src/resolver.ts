import { type MetadataSource, type Series, type SeriesCandidate, seriesYear } from './types.js';
import { log } from './logging.js';

export function extractNameAndYear(query: string): { name: string; year?: number } {
  const q = String(query || '').trim();
  const m = q.match(/^(.+?)\s*\((\d{4})\)$/) || q.match(/^(.+?)\s+(\d{4})$/);
  if (m) return { name: m[1].trim(), year: Number(m[2]) };
  return { name: q };
}

/**
 * Exact-year matches win when there are any; either way the list is ordered
 * by popularity, highest first. Ties keep the service's order.
 */
export function rankCandidates(results: readonly SeriesCandidate[], year?: number): SeriesCandidate[] {
  const byPopularity = (a: SeriesCandidate, b: SeriesCandidate) => (b.popularity ?? 0) - (a.popularity ?? 0);
  if (year !== undefined) {
    const sameYear = results.filter(r => seriesYear(r) === String(year));
    if (sameYear.length) return [...sameYear].sort(byPopularity);
  }
  return [...results].sort(byPopularity);
}

export class SeriesResolver {
  constructor(private readonly source: MetadataSource) {}

  async search(query: string): Promise<SeriesCandidate[]> {
    const { name, year } = extractNameAndYear(query);
    const results = await this.source.searchSeries(name);
    if (!results) {
      log('warn', `Series search for "${name}" returned nothing`);
      return [];
    }
    const ranked = rankCandidates(results, year);
    log('debug', `search: query=${query} name=${name} year=${year ?? ''} results=${ranked.length}`);
    return ranked;
  }

  async resolve(candidate: SeriesCandidate): Promise<Series> {
    const full = await this.source.getSeries(candidate.id);
    if (full) return full;
    log('warn', `Could not fetch details for series ${candidate.id}, using search result`);
    return {
      id: candidate.id,
      name: candidate.name,
      originalName: candidate.originalName,
      firstAirDate: candidate.firstAirDate,
      overview: candidate.overview,
      voteAverage: candidate.voteAverage,
      popularity: candidate.popularity,
      posterPath: candidate.posterPath,
      backdropPath: candidate.backdropPath,
      genres: [],
      networks: [],
    };
  }
}
