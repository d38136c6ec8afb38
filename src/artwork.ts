import fs from 'fs';
import path from 'path';
import fetch from 'node-fetch';
import type { FetchLike } from './metadataClient.js';
import { log } from './logging.js';

export interface ArtworkOptions {
  dryRun: boolean;
  force: boolean;
  fetch?: FetchLike;
}

export class ArtworkDownloader {
  private readonly fetchImpl: FetchLike;

  constructor(private readonly opts: ArtworkOptions) {
    this.fetchImpl = opts.fetch ?? fetch;
  }

  async download(url: string | undefined, dest: string): Promise<boolean> {
    if (this.opts.dryRun) {
      log('info', `[DRY RUN] Would download ${path.basename(dest)}`);
      return true;
    }
    if (fs.existsSync(dest) && !this.opts.force) {
      log('debug', `Image already exists: ${dest}`);
      return true;
    }
    if (!url || !/^https?:\/\//i.test(url)) {
      log('warn', `Invalid image URL for ${path.basename(dest)}: ${url ?? '(none)'}`);
      return false;
    }
    try {
      const res = await this.fetchImpl(url);
      if (!res.ok) {
        log('error', `Image download failed for ${url}: ${res.status}`);
        return false;
      }
      const bytes = Buffer.from(await res.arrayBuffer());
      fs.mkdirSync(path.dirname(dest), { recursive: true });
      fs.writeFileSync(dest, bytes);
      log('info', `Downloaded ${path.basename(dest)}`);
      return true;
    } catch (e) {
      log('error', `Image download failed for ${url}: ${e instanceof Error ? e.message : String(e)}`);
      return false;
    }
  }
}
