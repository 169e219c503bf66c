import fs from 'fs';
import path from 'path';
import archiver from 'archiver';
import { InterruptedError } from './errors';

/**
 * Write sourceDir as a gzip-compressed tarball whose single top-level entry is rootName.
 * The destination is truncated, never appended to. Resolves once the file is closed.
 */
export async function writeTarGz(sourceDir: string, archivePath: string, rootName: string, signal?: AbortSignal): Promise<void> {
  if(signal?.aborted) throw new InterruptedError('archive creation interrupted', { archivePath });
  fs.mkdirSync(path.dirname(archivePath), { recursive: true });

  const output = fs.createWriteStream(archivePath, { flags: 'w' });
  const archive = archiver('tar', { gzip: true, gzipOptions: { level: 9 } });

  const done = new Promise<void>((resolve, reject) => {
    const onAbort = () => fail(new InterruptedError('archive creation interrupted', { archivePath }));
    const fail = (err: unknown) => {
      signal?.removeEventListener('abort', onAbort);
      archive.abort();
      output.destroy();
      reject(err);
    };
    output.on('close', () => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    });
    output.on('error', fail);
    archive.on('error', fail);
    // stat/ENOENT races inside the staging tree mean the bundle would be incomplete
    archive.on('warning', fail);
    signal?.addEventListener('abort', onAbort, { once: true });
  });

  archive.pipe(output);
  archive.directory(sourceDir, rootName);
  await Promise.all([archive.finalize(), done]);
}
