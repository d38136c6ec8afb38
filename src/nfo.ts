import fs from 'fs';
import path from 'path';
import { XMLBuilder } from 'fast-xml-parser';
import { type Episode, type Season, type Series, seriesYear } from './types.js';
import { log } from './logging.js';

// attributes only appear on the xml declaration
const builder = new XMLBuilder({
  format: true,
  indentBy: '  ',
  ignoreAttributes: false,
  suppressEmptyNode: false,
});

const XML_DECLARATION = { '@_version': '1.0', '@_encoding': 'UTF-8', '@_standalone': 'yes' };

function build(root: string, body: Record<string, unknown>): string {
  return builder.build({ '?xml': XML_DECLARATION, [root]: body });
}

const text = (v: string | number | undefined) => (v === undefined ? '' : v);

export function seriesNfo(series: Series, art: { poster?: string; fanart?: string } = {}): string {
  return build('tvshow', {
    title: series.name,
    originaltitle: series.originalName && series.originalName !== series.name ? series.originalName : undefined,
    year: text(seriesYear(series)),
    premiered: text(series.firstAirDate),
    rating: text(series.voteAverage),
    plot: text(series.overview),
    status: text(series.status),
    studio: series.networks[0],
    genre: series.genres.length ? [...series.genres] : undefined,
    thumb: art.poster,
    fanart: art.fanart ? { thumb: art.fanart } : undefined,
    tmdbid: series.id,
  });
}

export function seasonNfo(season: Season, series: Pick<Series, 'name'>, poster?: string): string {
  const generic = !season.name || /^Season\s+\d+$/i.test(season.name);
  return build('season', {
    seasonnumber: season.seasonNumber,
    showtitle: series.name,
    title: generic ? undefined : season.name,
    plot: text(season.overview),
    premiered: text(season.airDate),
    episode_count: season.episodeCount,
    thumb: poster,
  });
}

export function episodeNfo(episode: Episode, series: Pick<Series, 'name'>, thumb?: string): string {
  return build('episodedetails', {
    title: text(episode.name),
    showtitle: series.name,
    season: episode.seasonNumber,
    episode: episode.episodeNumber,
    aired: text(episode.airDate),
    plot: text(episode.overview),
    rating: text(episode.voteAverage),
    thumb,
    director: episode.directors.length ? [...episode.directors] : undefined,
    actor: episode.guestStars.length
      ? episode.guestStars.map(g => ({ name: g.name, role: g.character }))
      : undefined,
    tmdbid: episode.id,
  });
}

export interface NfoWriterOptions {
  dryRun: boolean;
  skipImages: boolean;
}

export class NfoWriter {
  constructor(private readonly opts: NfoWriterOptions) {}

  /** `name` when the image is already beside the nfo or is about to be downloaded. */
  private artRef(folder: string, name: string, remote: string | undefined): string | undefined {
    if (fs.existsSync(path.join(folder, name))) return name;
    return !this.opts.skipImages && remote ? name : undefined;
  }

  private write(file: string, content: string): boolean {
    if (this.opts.dryRun) {
      log('info', `[DRY RUN] Would write ${file}`);
      return true;
    }
    try {
      fs.mkdirSync(path.dirname(file), { recursive: true });
      fs.writeFileSync(file, content, 'utf8');
      log('debug', `Wrote ${file}`);
      return true;
    } catch (e) {
      log('error', `Failed to write ${file}: ${e instanceof Error ? e.message : String(e)}`);
      return false;
    }
  }

  /** tvshow.nfo inside the series folder */
  writeSeries(folder: string, series: Series): boolean {
    const art = {
      poster: this.artRef(folder, 'poster.jpg', series.posterPath),
      fanart: this.artRef(folder, 'fanart.jpg', series.backdropPath),
    };
    return this.write(path.join(folder, 'tvshow.nfo'), seriesNfo(series, art));
  }

  writeSeason(folder: string, season: Season, series: Series): boolean {
    return this.write(path.join(folder, 'season.nfo'), seasonNfo(season, series, this.artRef(folder, 'season.jpg', season.posterPath)));
  }

  /** `<basename>.nfo` beside the video; thumb points at `<basename>-thumb.jpg` when it exists or will. */
  writeEpisode(videoPath: string, episode: Episode, series: Series): boolean {
    const dir = path.dirname(videoPath);
    const base = path.basename(videoPath, path.extname(videoPath));
    const thumb = this.artRef(dir, `${base}-thumb.jpg`, episode.stillPath);
    return this.write(path.join(dir, `${base}.nfo`), episodeNfo(episode, series, thumb));
  }
}
