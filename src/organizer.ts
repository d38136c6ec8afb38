import fs from 'fs';
import path from 'path';
import type { RunConfig } from './config.js';
import type { ArtworkDownloader } from './artwork.js';
import { EpisodeCache } from './episodeCache.js';
import { log } from './logging.js';
import type { NfoWriter } from './nfo.js';
import { detectSeasonNumber, suggestSeriesName } from './parse.js';
import type { Prompter } from './prompt.js';
import { basicEpisodeFileName, episodeFileName, type RenameEngine, seasonFolderName, seriesFolderName } from './renamer.js';
import type { SeriesResolver } from './resolver.js';
import { findSeasonDirectories, findVideoFiles, sortEpisodeFiles } from './scan.js';
import type { BatchStats, ImageRef, MetadataSource, Season, Series } from './types.js';
import * as ui from './ui.js';

export type AbortReason = 'empty-name' | 'no-results' | 'invalid-selection' | 'declined';

export type OrganizeResult =
  | { status: 'completed'; series: Series; folder: string; stats: BatchStats }
  | { status: 'aborted'; reason: AbortReason };

export interface OrganizerDeps {
  config: RunConfig;
  resolver: SeriesResolver;
  metadata: MetadataSource;
  renamer: RenameEngine;
  writer: NfoWriter;
  artwork: ArtworkDownloader;
  prompter: Prompter;
  out?: (line: string) => void;
}

const MAX_CHOICES = 5;

function positiveInt(answer: string): number | undefined {
  const s = answer.trim();
  return /^\d+$/.test(s) ? Number(s) : undefined;
}

function bestPoster(images: readonly ImageRef[] | undefined): string | undefined {
  if (!images?.length) return undefined;
  return [...images].sort((a, b) => (b.voteAverage ?? 0) - (a.voteAverage ?? 0))[0].filePath;
}

/**
 * Walks one show folder: pick the series, rename the show and its season
 * folders, then every episode file, writing NFOs and artwork on the way.
 * Every step is awaited in order.
 */
export class SeriesOrganizer {
  private readonly out: (line: string) => void;

  constructor(private readonly deps: OrganizerDeps) {
    this.out = deps.out ?? (line => console.log(line));
  }

  async organize(folder: string): Promise<OrganizeResult> {
    const root = path.resolve(folder);
    if (!fs.existsSync(root) || !fs.statSync(root).isDirectory()) {
      throw new Error(`Folder does not exist: ${root}`);
    }
    const { config, prompter, resolver } = this.deps;

    const suggestion = suggestSeriesName(path.basename(root));
    const name = (await prompter.ask('Series name to search for', suggestion)).trim();
    if (!name) {
      this.out(ui.warning('No series name given, skipping folder.'));
      return { status: 'aborted', reason: 'empty-name' };
    }

    const results = await resolver.search(name);
    if (!results.length) {
      this.out(ui.error(`No results found for "${name}".`));
      return { status: 'aborted', reason: 'no-results' };
    }
    const choices = results.slice(0, MAX_CHOICES);
    this.out(ui.info('Search results:'));
    for (const line of ui.formatSearchResults(choices)) this.out(line);
    const picked = positiveInt(await prompter.ask(`Select a series (1-${choices.length})`, '1'));
    if (picked === undefined || picked < 1 || picked > choices.length) {
      this.out(ui.error('Invalid selection.'));
      return { status: 'aborted', reason: 'invalid-selection' };
    }

    const series = await resolver.resolve(choices[picked - 1]);
    for (const line of ui.formatSeriesInfo(series)) this.out(line);
    if (!config.noPrompt && !(await prompter.confirm('Is this the correct series?', true))) {
      this.out(ui.warning('Skipping folder.'));
      return { status: 'aborted', reason: 'declined' };
    }

    const seriesDir = this.deps.renamer.renameFolder(root, seriesFolderName(series));
    if (!config.skipImages) {
      await this.downloadImage(series.posterPath, path.join(seriesDir, 'poster.jpg'));
      await this.downloadImage(series.backdropPath, path.join(seriesDir, 'fanart.jpg'));
    }
    this.deps.writer.writeSeries(seriesDir, series);

    const stats: BatchStats = { renamed: 0, failed: 0, total: 0 };
    const add = (b: BatchStats) => {
      stats.renamed += b.renamed;
      stats.failed += b.failed;
      stats.total += b.total;
    };

    add(await this.processEpisodes(seriesDir, series, 1));

    for (const dir of await findSeasonDirectories(seriesDir)) {
      const seasonDir = await this.processSeasonFolder(dir, series);
      if (seasonDir === undefined) continue;
      add(await this.processEpisodes(seasonDir.path, series, seasonDir.seasonNumber));
    }

    return { status: 'completed', series, folder: seriesDir, stats };
  }

  private async processSeasonFolder(dir: string, series: Series): Promise<{ path: string; seasonNumber: number } | undefined> {
    const { config, metadata, prompter } = this.deps;
    const base = path.basename(dir);
    let seasonNumber = detectSeasonNumber(base);
    if (seasonNumber === undefined) {
      seasonNumber = positiveInt(await prompter.ask(`Season number for "${base}"`, '1'));
      if (seasonNumber === undefined) {
        this.out(ui.warning(`Skipping folder "${base}": no season number.`));
        return undefined;
      }
    }
    this.out(ui.info(`Processing season ${seasonNumber} (${base})`));

    const season: Season = (await metadata.getSeason(series.id, seasonNumber)) ?? { seasonNumber, name: `Season ${seasonNumber}` };
    const seasonDir = this.deps.renamer.renameFolder(dir, seasonFolderName(season));

    if (!config.skipImages) {
      const poster = season.posterPath ?? bestPoster(await metadata.getSeasonImages(series.id, seasonNumber));
      await this.downloadImage(poster, path.join(seasonDir, 'season.jpg'));
    }
    this.deps.writer.writeSeason(seasonDir, season, series);
    return { path: seasonDir, seasonNumber };
  }

  private async processEpisodes(dir: string, series: Series, defaultSeason: number): Promise<BatchStats> {
    const { config, metadata, prompter, renamer, writer } = this.deps;
    const cache = new EpisodeCache();
    const files = sortEpisodeFiles(await findVideoFiles(dir), defaultSeason);
    const stats: BatchStats = { renamed: 0, failed: 0, total: files.length };
    if (!files.length) return stats;

    for (const file of files) {
      const base = path.basename(file.path);
      let season = file.season;
      let episode = file.episode;
      if (season === undefined || episode === undefined) {
        this.out(ui.warning(`Could not detect the episode number of "${base}".`));
        episode = positiveInt(await prompter.ask(`Episode number for "${base}"`, '1'));
        season = defaultSeason;
        if (episode === undefined) {
          log('warn', `No usable episode number for ${file.path}`);
          stats.failed++;
          continue;
        }
      }

      const detail = await cache.resolve(season, episode, (s, e) => metadata.getEpisode(series.id, s, e));
      const ext = path.extname(file.path);
      const target = path.join(dir, detail ? episodeFileName(detail, ext) : basicEpisodeFileName(season, episode, ext));
      const outcome = renamer.planFile(file.path, target);
      if (outcome.kind === 'failed') {
        stats.failed++;
        continue;
      }
      stats.renamed++;

      if (!detail) continue;
      writer.writeEpisode(target, detail, series);
      if (!config.skipImages && detail.stillPath) {
        const thumb = `${path.basename(target, path.extname(target))}-thumb.jpg`;
        await this.downloadImage(detail.stillPath, path.join(dir, thumb));
      }
    }

    this.out(ui.success(`Renamed ${stats.renamed} of ${stats.total} episode files.`));
    if (stats.failed > 0) this.out(ui.error(`Failed to rename ${stats.failed} files.`));
    return stats;
  }

  private async downloadImage(imagePath: string | undefined, dest: string) {
    if (!imagePath) return false;
    return this.deps.artwork.download(this.deps.metadata.imageUrl(imagePath), dest);
  }
}
