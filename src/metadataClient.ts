import fetch, { type RequestInit, type Response } from 'node-fetch';
import { log } from './logging.js';

export type HttpMethod = 'GET' | 'POST';
export type RequestParams = Record<string, string | number | boolean | undefined>;
export type FetchLike = (url: string, init?: RequestInit) => Promise<Response>;

export interface MetadataClientOptions {
  maxRetries?: number;
  retryDelaySeconds?: number;
  fetch?: FetchLike;
  sleep?: (ms: number) => Promise<void>;
}

const defaultSleep = (ms: number) => new Promise<void>(resolve => setTimeout(resolve, ms));

function cleanParams(params: RequestParams): [string, string][] {
  return Object.entries(params)
    .filter((e): e is [string, string | number | boolean] => e[1] !== undefined)
    .map(([k, v]): [string, string] => [k, String(v)])
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
}

// api_key values stay out of the logs
function redact(url: string) {
  return url.replace(/([?&]api_key=)[^&]*/g, '$1***');
}

/**
 * JSON-over-HTTP with a per-process response cache and a bounded retry
 * budget. Every failure path logs and resolves to `undefined`.
 */
export class MetadataClient {
  private readonly cache = new Map<string, unknown>();
  private readonly maxRetries: number;
  private readonly retryDelayMs: number;
  private readonly fetchImpl: FetchLike;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(opts: MetadataClientOptions = {}) {
    this.maxRetries = Math.max(1, Math.floor(opts.maxRetries ?? 3));
    this.retryDelayMs = Math.max(0, (opts.retryDelaySeconds ?? 5) * 1000);
    this.fetchImpl = opts.fetch ?? fetch;
    this.sleep = opts.sleep ?? defaultSleep;
  }

  static cacheKey(method: HttpMethod, url: string, params: RequestParams = {}) {
    return `${method}:${url}:${JSON.stringify(cleanParams(params))}`;
  }

  get cacheSize() { return this.cache.size; }

  async request(method: HttpMethod, url: string, params: RequestParams = {}): Promise<unknown> {
    if (!url || !/^https?:\/\//i.test(url)) {
      log('error', `Invalid URL: ${url || '(empty)'}`);
      return undefined;
    }
    const key = MetadataClient.cacheKey(method, url, params);
    if (this.cache.has(key)) {
      log('debug', `cache hit: ${method} ${url}`);
      return this.cache.get(key);
    }

    const pairs = cleanParams(params);
    let target = url;
    const init: RequestInit = { method, headers: { accept: 'application/json' } };
    if (method === 'GET') {
      if (pairs.length) target += (url.includes('?') ? '&' : '?') + new URLSearchParams(pairs).toString();
    } else {
      init.body = new URLSearchParams(pairs);
    }

    for (let attempt = 1; attempt <= this.maxRetries; attempt++) {
      const outcome = await this.attempt(target, init);
      if (outcome.ok) {
        this.cache.set(key, outcome.body);
        return outcome.body;
      }
      log('warn', `${method} ${redact(target)} attempt ${attempt}/${this.maxRetries} failed: ${outcome.reason}`);
      if (attempt < this.maxRetries) await this.sleep(this.retryDelayMs);
    }
    log('error', `${method} ${redact(target)} failed after ${this.maxRetries} attempt(s)`);
    return undefined;
  }

  private async attempt(target: string, init: RequestInit): Promise<{ ok: true; body: unknown } | { ok: false; reason: string }> {
    try {
      log('debug', `${init.method} ${redact(target)}`);
      const res = await this.fetchImpl(target, init);
      if (res.status === 429) return { ok: false, reason: 'rate limited (429)' };
      if (!res.ok) return { ok: false, reason: `HTTP ${res.status}` };
      const text = await res.text();
      try {
        const body: unknown = JSON.parse(text);
        return { ok: true, body };
      } catch {
        return { ok: false, reason: 'unparsable response body' };
      }
    } catch (e) {
      return { ok: false, reason: e instanceof Error ? e.message : String(e) };
    }
  }

  get(url: string, params: RequestParams = {}) { return this.request('GET', url, params); }
}
