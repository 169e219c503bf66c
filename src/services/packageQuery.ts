import { spawnSync } from 'child_process';
import { getRuntimeConfig } from '../config/runtimeConfig';

export interface PackageQueryResult {
  stdout: string;
  stderr: string;
  status: number | null; // null when killed (timeout) or never spawned
  timedOut: boolean;
  error?: string;
}

/** Installed-package inventory. Implementations never throw for a failing command. */
export interface PackageQuery {
  readonly command: string;
  run(): PackageQueryResult;
}

const MAX_OUTPUT_BYTES = 16 * 1024 * 1024;

export class ShellPackageQuery implements PackageQuery {
  constructor(readonly command: string, private readonly timeoutMs: number){}

  run(): PackageQueryResult {
    const res = spawnSync(this.command, {
      shell: true,
      encoding: 'utf8',
      stdio: ['ignore', 'pipe', 'pipe'],
      timeout: this.timeoutMs,
      killSignal: 'SIGKILL',
      maxBuffer: MAX_OUTPUT_BYTES,
      windowsHide: true,
    });
    const errCode = res.error && 'code' in res.error ? res.error.code : undefined;
    return {
      stdout: res.stdout ?? '',
      stderr: res.stderr ?? '',
      status: res.status,
      timedOut: errCode === 'ETIMEDOUT',
      error: res.error?.message,
    };
  }
}

export function defaultPackageQuery(): PackageQuery {
  const cfg = getRuntimeConfig().packageQuery;
  return new ShellPackageQuery(cfg.command, cfg.timeoutMs);
}
