import path from 'path';
import type { EpisodeMatch } from './types.js';
import { log } from './logging.js';

// Ordered matchers: the first one that hits decides, later ones are never
// consulted for the same name.
type Matcher = { name: string; re: RegExp; extract: (m: RegExpMatchArray) => EpisodeMatch };

const MATCHERS: readonly Matcher[] = [
  {
    name: 'SxxExx',
    re: /S(\d+)E(\d+)/i,
    extract: m => ({ kind: 'matched', season: Number(m[1]), episode: Number(m[2]) }),
  },
  {
    name: 'NxNN',
    re: /(\d+)x(\d+)/i,
    extract: m => ({ kind: 'matched', season: Number(m[1]), episode: Number(m[2]) }),
  },
  {
    // "Show 101" -> S1E01
    name: 'three-digit',
    re: /\b(\d)(\d{2})\b/,
    extract: m => ({ kind: 'matched', season: Number(m[1]), episode: Number(m[2]) }),
  },
  {
    // "E07" alone carries no season; the caller knows which folder it is in
    name: 'episode-only',
    re: /\bE(\d+)\b/i,
    extract: m => ({ kind: 'episode-only', episode: Number(m[1]) }),
  },
];

export function parseEpisodeInfo(filename: string): EpisodeMatch {
  const base = path.basename(filename || '');
  for (const matcher of MATCHERS) {
    const m = base.match(matcher.re);
    if (!m) continue;
    const result = matcher.extract(m);
    log('debug', `parseEpisodeInfo: ${base} matched ${matcher.name} -> ${JSON.stringify(result)}`);
    return result;
  }
  return { kind: 'unmatched' };
}

const TAG_RE = /\b(720p|1080p|2160p|x264|x265|HEVC|BluRay|WEB-DL|COMPLETE)\b/gi;
const SEASON_EPISODE_RE = /\bS\d+(?:E\d+)?\b|\bSeason\s*\d+\b/gi;
const NOISE_RE_LIST: RegExp[] = [
  /\[[^\]]*\]/g,
  /\{[^}]*\}/g,
  /\((?!(?:19|20)\d{2}\))[^)]*\)/g, // parenthesis but not years
];
const YEAR_SUFFIX_RE = /^(.+?)\s+\(?((?:19|20)\d{2})\)?(?:\s|$)/;

/**
 * Turn a release-style folder name into something worth searching for,
 * e.g. "Supernatural_2005_S01" -> "Supernatural (2005)".
 */
export function suggestSeriesName(folderName: string): string {
  let s = String(folderName || '').replace(/[._]+/g, ' ');
  s = s.replace(TAG_RE, ' ');
  s = s.replace(SEASON_EPISODE_RE, ' ');
  for (const r of NOISE_RE_LIST) s = s.replace(r, ' ');
  s = s.replace(/\s+/g, ' ').replace(/^[\s-]+|[\s-]+$/g, '');

  const m = s.match(YEAR_SUFFIX_RE);
  if (m) return `${m[1].replace(/[\s-]+$/, '')} (${m[2]})`;
  return s;
}

export function detectSeasonNumber(folderName: string): number | undefined {
  const m = folderName.match(/\bS(?:eason)?\s*(\d+)(?!\d)/i);
  if (m) return Number(m[1]);
  const bare = folderName.match(/^(\d+)$/);
  if (bare && Number(bare[1]) < 50) return Number(bare[1]);
  return undefined;
}

export function isSeasonFolderName(name: string): boolean {
  return /\b(?:S\d+|Season\s*\d+)/i.test(name);
}
