import fs from 'fs';
import os from 'os';
import path from 'path';
import { z } from 'zod';
import { log } from './logging.js';

export interface RunConfig {
  readonly tmdbApiKey: string;
  readonly tmdbBaseUrl: string;
  readonly imageBaseUrl: string;
  readonly dryRun: boolean;
  readonly force: boolean;
  readonly noPrompt: boolean;
  readonly skipImages: boolean;
  readonly verbose: boolean;
  readonly maxApiRetries: number;
  readonly retryDelaySeconds: number;
}

export const DEFAULT_CONFIG: RunConfig = Object.freeze({
  tmdbApiKey: '',
  tmdbBaseUrl: 'https://api.themoviedb.org/3',
  imageBaseUrl: 'https://image.tmdb.org/t/p',
  dryRun: false,
  force: false,
  noPrompt: false,
  skipImages: false,
  verbose: false,
  maxApiRetries: 3,
  retryDelaySeconds: 5,
});

const fileSchema = z
  .object({
    tmdbApiKey: z.string(),
    tmdbBaseUrl: z.string().url(),
    imageBaseUrl: z.string().url(),
    dryRun: z.boolean(),
    force: z.boolean(),
    noPrompt: z.boolean(),
    skipImages: z.boolean(),
    verbose: z.boolean(),
    maxApiRetries: z.number().int().min(1),
    retryDelaySeconds: z.number().min(0),
  })
  .partial();

export type ConfigOverrides = z.infer<typeof fileSchema>;

export function defaultConfigPath(env: NodeJS.ProcessEnv = process.env) {
  return env.SHOWSHELF_CONFIG || path.join(os.homedir(), '.showshelf.json');
}

export function loadConfigFile(configPath: string): ConfigOverrides {
  if (!fs.existsSync(configPath)) return {};
  try {
    const raw: unknown = JSON.parse(fs.readFileSync(configPath, 'utf8'));
    const parsed = fileSchema.safeParse(raw);
    if (!parsed.success) {
      log('warn', `Ignoring config file ${configPath}: ${parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join('; ')}`);
      return {};
    }
    return parsed.data;
  } catch (e) {
    log('warn', `Could not load config file ${configPath}: ${String(e)}`);
    return {};
  }
}

function stringToBool(s: string) {
  return ['true', 'yes', '1', 'on'].includes(s.trim().toLowerCase());
}

const BOOLEAN_ENV: ReadonlyArray<[string, 'dryRun' | 'verbose' | 'skipImages' | 'force' | 'noPrompt']> = [
  ['SHOWSHELF_DRY_RUN', 'dryRun'],
  ['SHOWSHELF_VERBOSE', 'verbose'],
  ['SHOWSHELF_SKIP_IMAGES', 'skipImages'],
  ['SHOWSHELF_FORCE', 'force'],
  ['SHOWSHELF_NO_PROMPT', 'noPrompt'],
];

export function configFromEnv(env: NodeJS.ProcessEnv): ConfigOverrides {
  const out: ConfigOverrides = {};
  if (env.TMDB_API_KEY) out.tmdbApiKey = env.TMDB_API_KEY;
  if (env.TMDB_BASE_URL) out.tmdbBaseUrl = env.TMDB_BASE_URL;
  for (const [name, key] of BOOLEAN_ENV) {
    const v = env[name];
    if (v != null && v !== '') out[key] = stringToBool(v);
  }
  const retries = Number.parseInt(env.SHOWSHELF_MAX_API_RETRIES || '', 10);
  if (Number.isInteger(retries) && retries >= 1) out.maxApiRetries = retries;
  return out;
}

export interface LoadConfigOptions {
  configPath?: string;
  env?: NodeJS.ProcessEnv;
  overrides?: ConfigOverrides;
}

/**
 * Defaults, then the JSON config file, then environment, then CLI overrides.
 * The result is frozen and handed to every component that needs it.
 */
export function loadConfig(opts: LoadConfigOptions = {}): RunConfig {
  const env = opts.env ?? process.env;
  const fromFile = loadConfigFile(opts.configPath ?? defaultConfigPath(env));
  const merged: RunConfig = {
    ...DEFAULT_CONFIG,
    ...fromFile,
    ...configFromEnv(env),
    ...dropUndefined(opts.overrides ?? {}),
  };
  return Object.freeze(merged);
}

function dropUndefined(o: ConfigOverrides): ConfigOverrides {
  const out: ConfigOverrides = {};
  for (const [k, v] of Object.entries(o)) {
    if (v !== undefined) Object.assign(out, { [k]: v });
  }
  return out;
}
