import { z } from 'zod';
import { ArgumentError } from './errors';

// Used verbatim in the staging directory and archive names, so no separators or leading dots
export const BUNDLE_ID_PATTERN = /^[A-Za-z0-9][A-Za-z0-9._-]*$/;

const ISO_DURATION = /^P(?!$)(?:(\d+)Y)?(?:(\d+)M)?(?:(\d+)W)?(?:(\d+)D)?(?:T(?=\d)(?:(\d+)H)?(?:(\d+)M)?(?:(\d+)S)?)?$/i;
const SIZE_LIMIT = /^(\d+)\s*(B|KB|MB|GB|TB)?$/i;

const SIZE_UNITS: Record<string, number> = { B: 1, KB: 1024, MB: 1024 ** 2, GB: 1024 ** 3, TB: 1024 ** 4 };

const MS_PER = { s: 1000, m: 60_000, h: 3_600_000, d: 86_400_000 };

/** ISO-8601 duration (P5D, PT12H, P1W) to milliseconds; months count 30 days and years 365. */
export function parseIsoDuration(raw: string): number | undefined {
  const m = ISO_DURATION.exec(raw.trim());
  if(!m) return undefined;
  const [y, mo, w, d, h, mi, s] = m.slice(1).map(v => (v ? Number(v) : 0));
  return ((y * 365 + mo * 30 + w * 7 + d) * MS_PER.d) + h * MS_PER.h + mi * MS_PER.m + s * MS_PER.s;
}

/** "500MB" / "2GB" / "1024" (bytes) to a byte count. */
export function parseSizeLimit(raw: string): number | undefined {
  const m = SIZE_LIMIT.exec(raw.trim());
  if(!m) return undefined;
  return Number(m[1]) * SIZE_UNITS[(m[2] ?? 'B').toUpperCase()];
}

const zBundleRequest = z.object({
  bundleId: z.string().min(1).regex(BUNDLE_ID_PATTERN, 'bundle id may contain only letters, digits, ".", "_" and "-"'),
  targetPath: z.string().min(1),
  clusterConf: z.string().regex(/^[A-Za-z][A-Za-z0-9+.-]*:\/\/.+$/, 'expected <scheme>://<path>'),
  coredumps: z.boolean(),
}).strict();

export type BundleRequest = Readonly<z.infer<typeof zBundleRequest>>;

// Options the CLI accepts for compatibility with the cluster-wide support bundle driver.
// They are validated and logged; the collector does not act on them.
const zCollectionOptions = z.object({
  services: z.array(z.string().min(1)),
  duration: z.string().refine(v => parseIsoDuration(v) !== undefined, 'expected an ISO-8601 duration such as P5D'),
  sizeLimit: z.string().refine(v => parseSizeLimit(v) !== undefined, 'expected a size such as 500MB'),
  binlogs: z.boolean(),
  stacktrace: z.boolean(),
  modules: z.string().optional(),
}).strict();

export type CollectionOptions = Readonly<z.infer<typeof zCollectionOptions>>;

function formatIssues(err: z.ZodError): string {
  return err.issues.map(i => `${i.path.join('.') || 'request'}: ${i.message}`).join('; ');
}

export function createBundleRequest(input: { bundleId: string; targetPath: string; clusterConf: string; coredumps?: boolean }): BundleRequest {
  const parsed = zBundleRequest.safeParse({ ...input, coredumps: input.coredumps ?? false });
  if(!parsed.success) throw new ArgumentError(`invalid bundle request: ${formatIssues(parsed.error)}`, { input });
  return Object.freeze(parsed.data);
}

export function validateCollectionOptions(input: CollectionOptions): CollectionOptions {
  const parsed = zCollectionOptions.safeParse(input);
  if(!parsed.success) throw new ArgumentError(`invalid option: ${formatIssues(parsed.error)}`, { input });
  return Object.freeze(parsed.data);
}
