import fs from 'fs';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { configFromEnv, DEFAULT_CONFIG, loadConfig } from '../src/config.js';

describe('loadConfig', () => {
  let dir: string;
  let missing: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'showshelf-config-'));
    missing = path.join(dir, 'none.json');
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('starts from the defaults', () => {
    const config = loadConfig({ configPath: missing, env: {} });
    expect(config).toEqual(DEFAULT_CONFIG);
    expect(Object.isFrozen(config)).toBe(true);
  });

  it('layers file, then environment, then overrides', () => {
    const file = path.join(dir, 'showshelf.json');
    fs.writeFileSync(file, JSON.stringify({ tmdbApiKey: 'file-key', maxApiRetries: 5, skipImages: true, dryRun: true }));
    const config = loadConfig({
      configPath: file,
      env: { TMDB_API_KEY: 'test-secret', SHOWSHELF_MAX_API_RETRIES: '7' },
      overrides: { dryRun: false, force: undefined },
    });
    expect(config.tmdbApiKey).toBe('test-secret');
    expect(config.maxApiRetries).toBe(7);
    expect(config.skipImages).toBe(true);
    expect(config.dryRun).toBe(false);
    expect(config.force).toBe(false);
  });

  it('ignores an invalid config file', () => {
    const file = path.join(dir, 'bad.json');
    fs.writeFileSync(file, JSON.stringify({ maxApiRetries: 'lots' }));
    expect(loadConfig({ configPath: file, env: {} }).maxApiRetries).toBe(3);
    fs.writeFileSync(file, '{ not json');
    expect(loadConfig({ configPath: file, env: {} })).toEqual(DEFAULT_CONFIG);
  });

  it('finds the file through SHOWSHELF_CONFIG', () => {
    const file = path.join(dir, 'alt.json');
    fs.writeFileSync(file, JSON.stringify({ verbose: true }));
    expect(loadConfig({ env: { SHOWSHELF_CONFIG: file } }).verbose).toBe(true);
  });
});

describe('configFromEnv', () => {
  it('reads boolean flags', () => {
    expect(
      configFromEnv({
        SHOWSHELF_DRY_RUN: 'yes',
        SHOWSHELF_FORCE: '1',
        SHOWSHELF_NO_PROMPT: 'On',
        SHOWSHELF_SKIP_IMAGES: 'false',
        SHOWSHELF_VERBOSE: '',
      }),
    ).toEqual({ dryRun: true, force: true, noPrompt: true, skipImages: false });
  });

  it('ignores an unusable retry count', () => {
    expect(configFromEnv({ SHOWSHELF_MAX_API_RETRIES: '0' })).toEqual({});
    expect(configFromEnv({ SHOWSHELF_MAX_API_RETRIES: 'x' })).toEqual({});
  });
});
