import path from 'path';
import { type Episode, type RenameOutcome, type Season, type Series, seriesYear } from './types.js';
import { type FileSystem, nodeFileSystem } from './files.js';
import { log } from './logging.js';

function sanitize(s: string) {
  if (!s) return '';
  // Only remove characters that are illegal in Windows file names and
  // collapse excessive whitespace.
  const cleaned = String(s).replace(/[<>:"/\\|?*\u0000-\u001F]/g, '');
  return cleaned.replace(/\s+/g, ' ').trim().replace(/^[. ]+|[. ]+$/g, '');
}
export function pad2(n: number) { return String(n).padStart(2, '0'); }

/** "Dean's Pilot: Part 1" -> "Dean's_Pilot_Part_1" */
export function sanitizeNamePart(s: string | undefined) {
  return String(s ?? '')
    .replace(/[/\\:*?"<>|]/g, '_')
    .replace(/\s+/g, '_')
    .replace(/_+/g, '_')
    .replace(/^_+|_+$/g, '');
}

export function seriesFolderName(series: Pick<Series, 'name' | 'firstAirDate'>) {
  const name = sanitize(series.name);
  const year = seriesYear(series);
  return year ? `${name} (${year})` : name;
}

export function seasonFolderName(season: Pick<Season, 'seasonNumber' | 'name'>) {
  const code = `S${pad2(season.seasonNumber)}`;
  const name = season.name?.trim() ?? '';
  if (!name || /^Season\s+\d+$/i.test(name)) return code;
  const part = sanitizeNamePart(name);
  return part ? `${code}_${part}` : code;
}

function normalizeExt(ext: string) {
  ext = ext ? String(ext) : '';
  if (ext && !ext.startsWith('.')) ext = '.' + ext;
  return ext;
}

export function basicEpisodeFileName(season: number, episode: number, ext: string) {
  return `S${pad2(season)}E${pad2(episode)}${normalizeExt(ext)}`;
}

export function episodeFileName(episode: Pick<Episode, 'seasonNumber' | 'episodeNumber' | 'name'>, ext: string) {
  const part = sanitizeNamePart(episode.name);
  const code = `S${pad2(episode.seasonNumber)}E${pad2(episode.episodeNumber)}`;
  return part ? `${code}_${part}${normalizeExt(ext)}` : `${code}${normalizeExt(ext)}`;
}

export interface RenameOptions {
  dryRun: boolean;
  force: boolean;
}

// a single path segment that stays inside the parent directory
function isPlainName(name: string) {
  return name !== '' && name !== '.' && name !== '..' && !/[/\\]/.test(name);
}

function message(e: unknown) {
  return e instanceof Error ? e.message : String(e);
}

/**
 * Moves folders and files into their canonical names. Each call walks
 * AlreadyCorrect -> DryRun -> ConflictExists -> Perform and never throws.
 */
export class RenameEngine {
  constructor(private readonly opts: RenameOptions, private readonly fsx: FileSystem = nodeFileSystem) {}

  planFolder(original: string, newName: string): RenameOutcome {
    if (!isPlainName(newName)) {
      log('error', `Cannot rename folder ${original}: "${newName}" is not a usable folder name`);
      return { kind: 'failed', path: original, reason: 'invalid folder name' };
    }
    const target = path.join(path.dirname(original), newName);
    if (target === original) return { kind: 'already-correct', path: original };
    if (this.opts.dryRun) {
      log('info', `[DRY RUN] Would rename folder: ${path.basename(original)} -> ${newName}`);
      return { kind: 'skipped-dry-run', path: original, target };
    }
    try {
      if (this.fsx.exists(target) && !this.fsx.sameEntry(original, target)) {
        if (this.fsx.isDirectory(target)) {
          log('warn', `Folder already exists: ${target}, using it`);
          return { kind: 'skipped-conflict', path: target, existing: target };
        }
        log('error', `Cannot rename folder: ${target} exists and is not a directory`);
        return { kind: 'failed', path: original, reason: 'destination exists and is not a directory' };
      }
      if (!this.fsx.isDirectory(original)) {
        log('error', `Cannot rename folder: ${original} does not exist`);
        return { kind: 'failed', path: original, reason: 'source missing' };
      }
      this.fsx.mkdirp(path.dirname(target));
      this.fsx.move(original, target);
      log('info', `Renamed folder: ${path.basename(original)} -> ${newName}`);
      return { kind: 'performed', path: target };
    } catch (e) {
      log('error', `Failed to rename folder ${original}: ${message(e)}`);
      return { kind: 'failed', path: original, reason: message(e) };
    }
  }

  /** Resulting folder path: the new one, a reused existing one, or the original. */
  renameFolder(original: string, newName: string): string {
    return this.planFolder(original, newName).path;
  }

  planFile(original: string, target: string): RenameOutcome {
    if (original === target) return { kind: 'already-correct', path: original };
    if (this.opts.dryRun) {
      log('info', `[DRY RUN] Would rename: ${path.basename(original)} -> ${path.basename(target)}`);
      return { kind: 'skipped-dry-run', path: original, target };
    }
    try {
      if (!this.fsx.isFile(original)) {
        if (this.fsx.exists(original)) {
          log('error', `Cannot rename ${original}: not a regular file`);
          return { kind: 'failed', path: original, reason: 'source is not a file' };
        }
        if (this.fsx.isFile(target)) {
          log('info', `Already renamed: ${path.basename(target)}`);
          return { kind: 'skipped-conflict', path: target, existing: target };
        }
        log('error', `Cannot rename ${original}: file does not exist`);
        return { kind: 'failed', path: original, reason: 'source missing' };
      }
      if (this.fsx.exists(target) && !this.fsx.sameEntry(original, target)) {
        if (!this.fsx.isFile(target)) {
          log('error', `Cannot rename ${original}: ${target} exists and is not a file`);
          return { kind: 'failed', path: original, reason: 'destination exists and is not a file' };
        }
        if (!this.opts.force) {
          log('warn', `Target file already exists: ${path.basename(target)} (use --force to overwrite)`);
          return { kind: 'skipped-conflict', path: original, existing: target };
        }
        log('info', `Overwriting existing file: ${path.basename(target)}`);
        this.fsx.remove(target);
      }
      this.fsx.mkdirp(path.dirname(target));
      this.fsx.move(original, target);
      log('info', `Renamed: ${path.basename(original)} -> ${path.basename(target)}`);
      return { kind: 'performed', path: target };
    } catch (e) {
      log('error', `Failed to rename ${original}: ${message(e)}`);
      return { kind: 'failed', path: original, reason: message(e) };
    }
  }

  renameFile(original: string, target: string): boolean {
    return this.planFile(original, target).kind !== 'failed';
  }
}
