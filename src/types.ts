export interface Series {
  readonly id: number;
  readonly name: string;
  readonly originalName?: string;
  /** ISO date; the series year is its first four characters */
  readonly firstAirDate?: string;
  readonly status?: string;
  readonly overview?: string;
  readonly voteAverage?: number;
  readonly popularity?: number;
  readonly genres: readonly string[];
  readonly networks: readonly string[];
  readonly posterPath?: string;
  readonly backdropPath?: string;
}

export interface Season {
  readonly seasonNumber: number;
  readonly name: string;
  readonly overview?: string;
  readonly airDate?: string;
  readonly episodeCount?: number;
  readonly posterPath?: string;
}

export interface GuestStar {
  readonly name: string;
  readonly character?: string;
}

export interface Episode {
  readonly id?: number;
  readonly name?: string;
  readonly overview?: string;
  readonly seasonNumber: number;
  readonly episodeNumber: number;
  readonly airDate?: string;
  readonly voteAverage?: number;
  readonly stillPath?: string;
  readonly directors: readonly string[];
  readonly guestStars: readonly GuestStar[];
}

/** One row of a series search, before the full detail fetch */
export interface SeriesCandidate {
  readonly id: number;
  readonly name: string;
  readonly originalName?: string;
  readonly firstAirDate?: string;
  readonly popularity?: number;
  readonly overview?: string;
  readonly posterPath?: string;
  readonly backdropPath?: string;
  readonly voteAverage?: number;
}

export interface ImageRef {
  readonly filePath: string;
  readonly voteAverage?: number;
}

/**
 * Remote metadata service. Every lookup resolves to `undefined` when the
 * service could not answer; callers degrade instead of failing.
 */
export interface MetadataSource {
  searchSeries(term: string): Promise<SeriesCandidate[] | undefined>;
  getSeries(seriesId: number): Promise<Series | undefined>;
  getSeason(seriesId: number, seasonNumber: number): Promise<Season | undefined>;
  getEpisode(seriesId: number, seasonNumber: number, episodeNumber: number): Promise<Episode | undefined>;
  getSeasonImages(seriesId: number, seasonNumber: number): Promise<ImageRef[] | undefined>;
  imageUrl(imagePath: string | undefined, size?: string): string | undefined;
}

export type EpisodeMatch =
  | { kind: 'matched'; season: number; episode: number }
  | { kind: 'episode-only'; episode: number }
  | { kind: 'unmatched' };

export type RenameOutcome =
  | { kind: 'performed'; path: string }
  | { kind: 'already-correct'; path: string }
  | { kind: 'skipped-dry-run'; path: string; target: string }
  | { kind: 'skipped-conflict'; path: string; existing: string }
  | { kind: 'failed'; path: string; reason: string };

export interface BatchStats {
  renamed: number;
  failed: number;
  total: number;
}

export function seriesYear(series: { firstAirDate?: string }): string | undefined {
  const y = (series.firstAirDate || '').slice(0, 4);
  return /^\d{4}$/.test(y) ? y : undefined;
}
