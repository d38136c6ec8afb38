import type { RunConfig } from './config.js';
import { ArtworkDownloader } from './artwork.js';
import { MetadataClient } from './metadataClient.js';
import { NfoWriter } from './nfo.js';
import { SeriesOrganizer } from './organizer.js';
import type { Prompter } from './prompt.js';
import { RenameEngine } from './renamer.js';
import { SeriesResolver } from './resolver.js';
import { TmdbApi } from './tmdb.js';

/** Wires the production collaborators for one run. */
export function createOrganizer(config: RunConfig, prompter: Prompter, out?: (line: string) => void) {
  const client = new MetadataClient({ maxRetries: config.maxApiRetries, retryDelaySeconds: config.retryDelaySeconds });
  const metadata = new TmdbApi(client, {
    apiKey: config.tmdbApiKey,
    baseUrl: config.tmdbBaseUrl,
    imageBaseUrl: config.imageBaseUrl,
  });
  return new SeriesOrganizer({
    config,
    metadata,
    resolver: new SeriesResolver(metadata),
    renamer: new RenameEngine({ dryRun: config.dryRun, force: config.force }),
    writer: new NfoWriter({ dryRun: config.dryRun, skipImages: config.skipImages }),
    artwork: new ArtworkDownloader({ dryRun: config.dryRun, force: config.force }),
    prompter,
    out,
  });
}
