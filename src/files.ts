import fs from 'fs';
import { log } from './logging.js';

/**
 * The filesystem operations the renamer needs. Everything is synchronous;
 * tests swap in a wrapper to observe or break individual calls.
 */
export interface FileSystem {
  exists(p: string): boolean;
  isDirectory(p: string): boolean;
  isFile(p: string): boolean;
  /** true when both paths name the same inode (case-only renames on case-insensitive volumes) */
  sameEntry(a: string, b: string): boolean;
  mkdirp(dir: string): void;
  move(from: string, to: string): void;
  /** deletes a single file */
  remove(p: string): void;
}

function statOrUndefined(p: string) {
  try {
    return fs.statSync(p);
  } catch {
    return undefined;
  }
}

function errorCode(e: unknown): string | undefined {
  if (e && typeof e === 'object' && 'code' in e && typeof e.code === 'string') return e.code;
  return undefined;
}

export const nodeFileSystem: FileSystem = {
  exists: p => fs.existsSync(p),
  isDirectory: p => statOrUndefined(p)?.isDirectory() ?? false,
  isFile: p => statOrUndefined(p)?.isFile() ?? false,
  sameEntry(a, b) {
    const sa = statOrUndefined(a);
    const sb = statOrUndefined(b);
    return !!sa && !!sb && sa.dev === sb.dev && sa.ino === sb.ino;
  },
  mkdirp: dir => { fs.mkdirSync(dir, { recursive: true }); },
  move(from, to) {
    try {
      fs.renameSync(from, to);
    } catch (e) {
      if (errorCode(e) !== 'EXDEV') throw e;
      // different volume: copy then delete the source
      log('debug', `move: ${from} -> ${to} crosses devices, copying`);
      if (fs.statSync(from).isDirectory()) {
        fs.cpSync(from, to, { recursive: true, errorOnExist: true, force: false });
        fs.rmSync(from, { recursive: true });
      } else {
        fs.copyFileSync(from, to, fs.constants.COPYFILE_EXCL);
        fs.unlinkSync(from);
      }
    }
  },
  remove: p => { fs.unlinkSync(p); },
};
