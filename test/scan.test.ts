import fs from 'fs';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { findSeasonDirectories, findVideoFiles, sortEpisodeFiles } from '../src/scan.js';

describe('scan', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'showshelf-scan-'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('finds video files directly inside a folder, any extension case', async () => {
    for (const f of ['b.mkv', 'a.MP4', 'c.avi', 'd.m4v', 'notes.txt', 'e.nfo']) fs.writeFileSync(path.join(dir, f), '');
    fs.mkdirSync(path.join(dir, 'S01'));
    fs.writeFileSync(path.join(dir, 'S01', 'nested.mkv'), '');
    const files = await findVideoFiles(dir);
    expect(files.map(f => path.basename(f))).toEqual(['a.MP4', 'b.mkv', 'c.avi', 'd.m4v']);
    expect(files.every(f => path.isAbsolute(f))).toBe(true);
  });

  it('finds season folders sorted by name', async () => {
    for (const d of ['Season 2', 'S01', 'Extras', 'S00_Specials']) fs.mkdirSync(path.join(dir, d));
    fs.writeFileSync(path.join(dir, 'S03.mkv'), '');
    const dirs = await findSeasonDirectories(dir);
    expect(dirs.map(d => path.basename(d))).toEqual(['S00_Specials', 'S01', 'Season 2']);
  });

  it('returns nothing for a missing folder', async () => {
    expect(await findVideoFiles(path.join(dir, 'missing'))).toEqual([]);
  });
});

describe('sortEpisodeFiles', () => {
  it('orders parseable files by season and episode, the rest by name', () => {
    const sorted = sortEpisodeFiles(['/x/zz.mkv', '/x/Show.S01E10.mkv', '/x/E02.mkv', '/x/Show.S01E03.mkv', '/x/aa.mkv'], 1);
    expect(sorted.map(f => path.basename(f.path))).toEqual(['E02.mkv', 'Show.S01E03.mkv', 'Show.S01E10.mkv', 'aa.mkv', 'zz.mkv']);
  });

  it('applies the default season to episode-only names', () => {
    const [only] = sortEpisodeFiles(['/x/E05.mkv'], 3);
    expect(only).toEqual({ path: '/x/E05.mkv', match: { kind: 'episode-only', episode: 5 }, season: 3, episode: 5 });
  });

  it('leaves unmatched files without numbers', () => {
    const [only] = sortEpisodeFiles(['/x/episode7.mkv'], 1);
    expect(only.season).toBeUndefined();
    expect(only.episode).toBeUndefined();
    expect(only.match).toEqual({ kind: 'unmatched' });
  });
});
