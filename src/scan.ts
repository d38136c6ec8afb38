import fg from 'fast-glob';
import path from 'path';
import { isSeasonFolderName, parseEpisodeInfo } from './parse.js';
import type { EpisodeMatch } from './types.js';

export const VIDEO_EXTENSIONS = ['mkv', 'mp4', 'avi', 'm4v'] as const;

const byName = (a: string, b: string) => (a < b ? -1 : a > b ? 1 : 0);

/** Video files directly inside `dir` (not recursive), absolute paths sorted by name. */
export async function findVideoFiles(dir: string): Promise<string[]> {
  const patterns = [`*.{${VIDEO_EXTENSIONS.join(',')}}`];
  const files = await fg(patterns, { cwd: dir, absolute: true, onlyFiles: true, caseSensitiveMatch: false, suppressErrors: true });
  return files.map(f => path.normalize(f)).sort(byName);
}

export async function findSeasonDirectories(dir: string): Promise<string[]> {
  const dirs = await fg(['*'], { cwd: dir, absolute: true, onlyDirectories: true, suppressErrors: true });
  return dirs
    .map(d => path.normalize(d))
    .filter(d => isSeasonFolderName(path.basename(d)))
    .sort((a, b) => byName(path.basename(a), path.basename(b)));
}

export interface ScannedEpisodeFile {
  path: string;
  match: EpisodeMatch;
  /** season/episode once the folder's default season is applied; absent when unparseable */
  season?: number;
  episode?: number;
}

/**
 * Parse every file and order them: parseable ones by (season, episode),
 * then the rest by filename.
 */
export function sortEpisodeFiles(files: readonly string[], defaultSeason: number): ScannedEpisodeFile[] {
  const scanned = files.map((f): ScannedEpisodeFile => {
    const match = parseEpisodeInfo(f);
    if (match.kind === 'matched') return { path: f, match, season: match.season, episode: match.episode };
    if (match.kind === 'episode-only') return { path: f, match, season: defaultSeason, episode: match.episode };
    return { path: f, match };
  });
  return scanned.sort((a, b) => {
    const pa = a.season !== undefined && a.episode !== undefined;
    const pb = b.season !== undefined && b.episode !== undefined;
    if (pa && pb) return (a.season ?? 0) - (b.season ?? 0) || (a.episode ?? 0) - (b.episode ?? 0) || byName(a.path, b.path);
    if (pa !== pb) return pa ? -1 : 1;
    return byName(path.basename(a.path), path.basename(b.path));
  });
}
