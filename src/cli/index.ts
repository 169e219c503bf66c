#!/usr/bin/env node
/**
 * rgw-support-bundle - collect rgw diagnostics into <target>/rgw/rgw_<bundle_id>.tar.gz
 *
 * stdout: the archive path on success (single line)
 * stderr: structured log lines, help text and the interrupt caution
 */
import fs from 'fs';
import { getRuntimeConfig } from '../config/runtimeConfig';
import { archivePathFor, BundleCollector, BundleCollectorOptions } from '../services/bundleCollector';
import { BundleRequest, createBundleRequest, validateCollectionOptions } from '../services/bundleRequest';
import { ArgumentError, describeError, InterruptedError } from '../services/errors';
import { logError, logInfo } from '../services/logger';
import { parseBooleanFlag } from '../utils/envUtils';

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_INTERRUPTED = 1;
export const EXIT_USAGE = 2;

interface CliConfig {
  bundleId?: string;
  target: string;
  config: string;
  services: string[];
  duration: string;
  sizeLimit: string;
  binlogs: boolean;
  coredumps: boolean;
  stacktrace: boolean;
  modules?: string;
  help: boolean;
}

type ValueFlag = 'bundleId' | 'target' | 'config' | 'duration' | 'sizeLimit' | 'modules';
type BooleanFlag = 'binlogs' | 'coredumps' | 'stacktrace';

const VALUE_FLAGS = new Map<string, ValueFlag>([
  ['-b', 'bundleId'], ['--bundle_id', 'bundleId'],
  ['-t', 'target'], ['--target', 'target'],
  ['-c', 'config'], ['--config', 'config'],
  ['-d', 'duration'], ['--duration', 'duration'],
  ['--size_limit', 'sizeLimit'],
  ['--modules', 'modules'],
]);

const BOOLEAN_FLAGS = new Map<string, BooleanFlag>([
  ['--binlogs', 'binlogs'],
  ['--coredumps', 'coredumps'],
  ['--stacktrace', 'stacktrace'],
]);

const SERVICES_FLAGS = new Set(['-s', '--services']);

function parseArgs(argv: string[]): CliConfig {
  const runtimeCfg = getRuntimeConfig();
  const config: CliConfig = {
    target: runtimeCfg.collection.defaultTarget,
    config: runtimeCfg.cluster.defaultUri,
    services: [],
    duration: 'P5D',
    sizeLimit: '500MB',
    binlogs: false,
    coredumps: false,
    stacktrace: false,
    help: false,
  };

  const args = argv.slice(2);
  for(let i=0;i<args.length;i++){
    const raw = args[i];
    const eq = raw.startsWith('--') ? raw.indexOf('=') : -1;
    const flag = eq > 0 ? raw.slice(0, eq) : raw;
    const inline = eq > 0 ? raw.slice(eq + 1) : undefined;
    const takeValue = (): string => {
      if(inline !== undefined) return inline;
      const v = args[i+1];
      if(v === undefined || (v.startsWith('-') && v.length > 1)) throw new ArgumentError(`${flag} requires a value`, { flag });
      i++;
      return v;
    };

    const valueKey = VALUE_FLAGS.get(flag);
    const boolKey = BOOLEAN_FLAGS.get(flag);
    if(flag === '-h' || flag === '--help') config.help = true;
    else if(valueKey) config[valueKey] = takeValue();
    else if(boolKey) config[boolKey] = parseBooleanFlag(flag, takeValue());
    else if(SERVICES_FLAGS.has(flag)){
      // -s a b c  |  -s a,b  |  --services=a,b
      const values = inline !== undefined ? [inline] : [];
      while(inline === undefined && i+1 < args.length && !args[i+1].startsWith('-')) values.push(args[++i]);
      if(!values.length) throw new ArgumentError(`${flag} requires at least one service name`, { flag });
      config.services.push(...values.flatMap(v => v.split(',')).map(s => s.trim()).filter(Boolean));
    }
    else throw new ArgumentError(`unrecognized argument: ${raw}`, { arg: raw });
  }
  return config;
}

function helpText(): string {
  const cfg = getRuntimeConfig();
  return `rgw-support-bundle - collect ${cfg.component.name} diagnostics into a support bundle

USAGE:
  rgw-support-bundle -b BUNDLE_ID [options]

OPTIONS:
  -b, --bundle_id ID       Bundle id, used verbatim in the archive name (required)
  -t, --target DIR         Output base directory (default ${cfg.collection.defaultTarget})
  -c, --config URI         Cluster configuration store (default ${cfg.cluster.defaultUri})
  -s, --services NAME...   Target service names (accepted, not used by this component)
  -d, --duration ISO8601   Log time window (default P5D; accepted, not enforced)
  --size_limit SIZE        Per-node size cap (default 500MB; accepted, not enforced)
  --binlogs true|false     Include binary logs (default false; accepted, not used)
  --coredumps true|false   Include crash dumps from ${cfg.collection.crashDir} (default false)
  --stacktrace true|false  Include stack traces (default false; accepted, not used)
  --modules TEXT           Module list (accepted, not used)
  -h, --help               Show this help and exit

OUTPUT:
  <target>/${cfg.component.name}/${cfg.component.name}_<bundle_id>.tar.gz

EXIT CODES:
  0 success, 1 failure or interrupt, 2 invalid arguments`;
}

export interface RunDeps extends Omit<BundleCollectorOptions, 'signal'> {
  out?: (line: string) => void;
  err?: (line: string) => void;
}

const INTERRUPT_SIGNALS: NodeJS.Signals[] = ['SIGINT', 'SIGTERM'];

/** Parsed request, or the exit code to return when there is nothing to collect. */
function prepareRequest(argv: string[], err: (line: string) => void): BundleRequest | number {
  try {
    const cli = parseArgs(argv);
    if(cli.help){
      err(helpText());
      return EXIT_OK;
    }
    if(!cli.bundleId) throw new ArgumentError('-b/--bundle_id is required');
    const options = validateCollectionOptions({
      services: cli.services,
      duration: cli.duration,
      sizeLimit: cli.sizeLimit,
      binlogs: cli.binlogs,
      stacktrace: cli.stacktrace,
      modules: cli.modules,
    });
    const request = createBundleRequest({ bundleId: cli.bundleId, targetPath: cli.target, clusterConf: cli.config, coredumps: cli.coredumps });
    logInfo('bundle_request', { ...request, options });
    return request;
  } catch(e){
    if(e instanceof ArgumentError){
      err(`rgw-support-bundle: ${e.message}`);
      err('Try --help for usage.');
      return EXIT_USAGE;
    }
    throw e;
  }
}

/**
 * Parse argv, collect one bundle and map the outcome to an exit code.
 * Interrupts abort the collection; staging and any partial archive are removed before returning.
 */
export async function run(argv: string[], deps: RunDeps = {}): Promise<number> {
  const {
    out = (line: string) => { process.stdout.write(line + '\n'); },
    err = (line: string) => { process.stderr.write(line + '\n'); },
    ...collectorDeps
  } = deps;

  const request = prepareRequest(argv, err);
  if(typeof request === 'number') return request;

  const controller = new AbortController();
  const onSignal = (sig: NodeJS.Signals) => {
    logInfo('signal_received', { signal: sig });
    controller.abort();
  };
  INTERRUPT_SIGNALS.forEach(s => process.on(s, onSignal));

  try {
    const result = await new BundleCollector({ ...collectorDeps, signal: controller.signal }).collect(request);
    if(controller.signal.aborted) throw new InterruptedError('support bundle collection interrupted');
    out(result.archivePath);
    return EXIT_OK;
  } catch(e){
    if(e instanceof InterruptedError || controller.signal.aborted){
      const component = collectorDeps.component ?? getRuntimeConfig().component.name;
      fs.rmSync(archivePathFor(request.targetPath, component, request.bundleId), { force: true });
      err(`WARNING: support bundle ${request.bundleId} was interrupted; the bundle is incomplete and has been discarded. Re-run the collection to produce a usable archive.`);
      return EXIT_INTERRUPTED;
    }
    logError('bundle_failed', { bundleId: request.bundleId, ...describeError(e) });
    return EXIT_FAILURE;
  } finally {
    INTERRUPT_SIGNALS.forEach(s => process.off(s, onSignal));
  }
}

export async function main(): Promise<void> {
  const code = await run(process.argv);
  process.exit(code);
}

if(require.main === module){
  main().catch(e => {
    process.stderr.write(`[fatal] ${describeError(e).message}\n`);
    process.exit(EXIT_FAILURE);
  });
}

// Test-only named exports for coverage of argument parsing
export { parseArgs as _parseArgs, helpText as _helpText };
