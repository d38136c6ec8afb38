#!/usr/bin/env node
import fs from 'fs';
import path from 'path';
import { Command, InvalidArgumentError } from 'commander';
import { createOrganizer } from './app.js';
import { type ConfigOverrides, loadConfig } from './config.js';
import { log, setLogLevel } from './logging.js';
import { createPrompter } from './prompt.js';
import * as ui from './ui.js';

const VERSION = '0.1.0';

function parseRetries(value: string) {
  const n = Number.parseInt(value, 10);
  if (!Number.isInteger(n) || n < 1) throw new InvalidArgumentError('must be a positive integer');
  return n;
}

function isExitPromptError(e: unknown) {
  return e instanceof Error && e.name === 'ExitPromptError';
}

interface CliOptions {
  dryRun?: boolean;
  verbose?: boolean;
  skipImages?: boolean;
  force?: boolean;
  prompt?: boolean;
  maxApiRetries?: number;
  config?: string;
}

const program = new Command();

program
  .name('showshelf')
  .description('Rename TV show folders and episode files from TMDB metadata and write NFO sidecars.')
  .version(VERSION, '-v, --version')
  .argument('[path]', 'show folder to organize', '.')
  .option('--dry-run', 'show what would change without touching anything')
  .option('--verbose', 'debug logging')
  .option('--skip-images', 'do not download posters, fanart or thumbnails')
  .option('--force', 'overwrite existing files')
  .option('--no-prompt', 'never ask; use the default answer everywhere')
  .option('--max-api-retries <n>', 'attempts per metadata request', parseRetries)
  .option('--config <file>', 'JSON config file')
  .action(async (target: string, opts: CliOptions) => {
    const overrides: ConfigOverrides = {
      dryRun: opts.dryRun || undefined,
      verbose: opts.verbose || undefined,
      skipImages: opts.skipImages || undefined,
      force: opts.force || undefined,
      noPrompt: opts.prompt === false ? true : undefined,
      maxApiRetries: opts.maxApiRetries,
    };
    const config = loadConfig({ configPath: opts.config, overrides });
    if (config.verbose) setLogLevel('debug');

    if (!config.tmdbApiKey) {
      console.error(ui.error('TMDB API key is not set. Export TMDB_API_KEY or add tmdbApiKey to the config file.'));
      process.exit(1);
    }
    const folder = path.resolve(target);
    if (!fs.existsSync(folder) || !fs.statSync(folder).isDirectory()) {
      console.error(ui.error(`Not a directory: ${folder}`));
      process.exit(1);
    }

    console.log(ui.info(`showshelf ${VERSION}`));
    if (config.dryRun) console.log(ui.warning('DRY RUN: no files will be changed.'));
    console.log(ui.info(`Processing ${folder}`));

    const organizer = createOrganizer(config, createPrompter(config.noPrompt));
    const result = await organizer.organize(folder);
    if (result.status === 'aborted') {
      log('info', `Folder skipped: ${result.reason}`);
      return;
    }
    console.log(ui.success(`Done: ${result.folder}`));
    if (config.dryRun) console.log(ui.warning('This was a dry run. Run again without --dry-run to apply the changes.'));
  });

program.parseAsync(process.argv).catch((e: unknown) => {
  if (isExitPromptError(e)) {
    console.error(ui.warning('Process interrupted.'));
  } else {
    log('error', `Unexpected error: ${e instanceof Error ? e.stack ?? e.message : String(e)}`);
    console.error(ui.error(e instanceof Error ? e.message : String(e)));
  }
  process.exit(1);
});
