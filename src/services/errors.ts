import os from 'os';

// Well-known code/message pairs for collection failures. Codes are platform errno values so the
// CLI and any wrapping tooling can map them the same way they map filesystem errors.
export type BundleErrorData = Record<string, unknown>;

export abstract class BundleError extends Error {
  abstract readonly code: number;
  readonly data: BundleErrorData;

  constructor(message: string, data?: BundleErrorData){
    super(message);
    this.name = new.target.name;
    this.data = data ?? {};
  }
}

/** Cluster configuration store unreachable or a required key absent. */
export class ConfigurationError extends BundleError {
  readonly code = os.constants.errno.EINVAL;
}

/** An expected source file is absent. */
export class NotFoundError extends BundleError {
  readonly code = os.constants.errno.ENOENT;
  readonly path: string;

  constructor(filePath: string, message?: string){
    super(message ?? `${filePath} not found`, { path: filePath });
    this.path = filePath;
  }
}

/** Malformed command line input. */
export class ArgumentError extends BundleError {
  readonly code = os.constants.errno.EINVAL;
}

/** Operator abort (SIGINT / SIGTERM). */
export class InterruptedError extends BundleError {
  readonly code = os.constants.errno.EINTR;
}

export function isBundleError(e: unknown): e is BundleError {
  return e instanceof BundleError;
}

export function describeError(e: unknown): { code?: number | string; message: string } {
  if(isBundleError(e)) return { code: e.code, message: e.message };
  if(e instanceof Error){
    const errno = 'code' in e && (typeof e.code === 'string' || typeof e.code === 'number') ? e.code : undefined;
    return { code: errno, message: e.message };
  }
  return { message: String(e) };
}
