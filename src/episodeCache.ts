import type { Episode } from './types.js';

/**
 * Per-batch memo of episode lookups. Misses are remembered too, so each
 * (season, episode) pair costs at most one remote call.
 */
export class EpisodeCache {
  private readonly entries = new Map<string, Episode | undefined>();

  private static key(season: number, episode: number) { return `${season}:${episode}`; }

  async resolve(
    season: number,
    episode: number,
    load: (season: number, episode: number) => Promise<Episode | undefined>,
  ): Promise<Episode | undefined> {
    const key = EpisodeCache.key(season, episode);
    if (this.entries.has(key)) return this.entries.get(key);
    const found = await load(season, episode);
    this.entries.set(key, found);
    return found;
  }
}
