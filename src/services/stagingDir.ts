import fs from 'fs';
import path from 'path';
import { describeError } from './errors';
import { logDebug, logWarn } from './logger';

export function stagingDirFor(base: string, component: string, bundleId: string): string {
  return path.join(base, `${component}_${bundleId}`);
}

/** Recursively remove a directory; returns true if something was there. */
export function purgeDir(dir: string): boolean {
  if(!fs.existsSync(dir)) return false;
  fs.rmSync(dir, { recursive: true, force: true });
  return true;
}

/**
 * Scoped acquisition of an exclusively-owned scratch directory.
 * A leftover from an aborted run is purged first; the directory is removed on every exit path of fn.
 */
export async function withStagingDir<T>(dir: string, fn: (dir: string) => Promise<T> | T): Promise<T> {
  if(purgeDir(dir)) logDebug('staging_leftover_purged', { dir });
  fs.mkdirSync(dir, { recursive: true });
  try {
    return await fn(dir);
  } finally {
    try {
      purgeDir(dir);
      logDebug('staging_removed', { dir });
    } catch(e){
      // keep the error from fn, if any, as the one that propagates
      logWarn('staging_remove_failed', { dir, ...describeError(e) });
    }
  }
}
