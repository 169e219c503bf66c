/**
 * Support bundle collection for the rgw component.
 *
 * One generate() call stages the component config, client/setup logs, optional crash dumps and the
 * installed-package inventory into a scratch directory, tars it up under
 * <target>/<component>/<component>_<bundleId>.tar.gz and removes the scratch directory.
 *
 * Per-step policy:
 *  - config store / machine id / component config file missing: fatal, no archive is written
 *  - log directory missing: skipped with a warning
 *  - crash directory missing or coredumps not requested: skipped
 *  - package query failure (non-zero exit, timeout, spawn error): skipped
 */
import fs from 'fs';
import path from 'path';
import { globSync } from 'glob';
import { getRuntimeConfig } from '../config/runtimeConfig';
import { writeTarGz } from './archive';
import { createBundleRequest, BundleRequest } from './bundleRequest';
import { ConfStoreOpener, openConfStore } from './confStore';
import { describeError, InterruptedError, NotFoundError } from './errors';
import { logDebug, logError, logInfo, logWarn } from './logger';
import { MachineIdProvider, readMachineId } from './machineId';
import { defaultPackageQuery, PackageQuery } from './packageQuery';
import { stagingDirFor, withStagingDir } from './stagingDir';

export type BundleStep =
  | 'resolve_config'
  | 'component_config'
  | 'logs'
  | 'coredumps'
  | 'package_inventory'
  | 'archive';

export type StepStatus = 'ok' | 'skipped' | 'fatal';

export interface StepOutcome {
  step: BundleStep;
  status: StepStatus;
  detail?: string;
}

export interface BundleResult {
  bundleId: string;
  archivePath: string;
  stagingDir: string;
  steps: StepOutcome[];
}

export interface BundleCollectorOptions {
  component?: string;
  stagingBase?: string;
  crashDir?: string;
  openStore?: ConfStoreOpener;
  machineId?: MachineIdProvider;
  packageQuery?: PackageQuery;
  signal?: AbortSignal;
}

interface ResolvedPaths {
  machineId: string;
  logBase: string;
  configBase: string;
}

export const PACKAGE_INVENTORY_FILE = 'cortx-rpms';
export const CRASH_SUBDIR = 'crash';

export function logPatterns(component: string): string[] {
  return [`${component}.client*.log`, `${component}_setup*.log`];
}

export function archivePathFor(targetPath: string, component: string, bundleId: string): string {
  return path.join(targetPath, component, `${component}_${bundleId}.tar.gz`);
}

export class BundleCollector {
  private readonly component: string;
  private readonly stagingBase: string;
  private readonly crashDir: string;
  private readonly openStore: ConfStoreOpener;
  private readonly machineId: MachineIdProvider;
  private readonly packageQuery: PackageQuery;
  private readonly signal?: AbortSignal;

  constructor(opts: BundleCollectorOptions = {}){
    const cfg = getRuntimeConfig();
    this.component = opts.component ?? cfg.component.name;
    this.stagingBase = opts.stagingBase ?? cfg.collection.stagingBase;
    this.crashDir = opts.crashDir ?? cfg.collection.crashDir;
    this.openStore = opts.openStore ?? openConfStore;
    this.machineId = opts.machineId ?? readMachineId;
    this.packageQuery = opts.packageQuery ?? defaultPackageQuery();
    this.signal = opts.signal;
  }

  async generate(bundleId: string, targetPath: string, clusterConf: string, coredumps = false): Promise<BundleResult> {
    const request = createBundleRequest({ bundleId, targetPath, clusterConf, coredumps });
    return this.collect(request);
  }

  async collect(request: BundleRequest): Promise<BundleResult> {
    const steps: StepOutcome[] = [];
    const record = (outcome: StepOutcome) => {
      steps.push(outcome);
      logDebug('bundle_step', { bundleId: request.bundleId, ...outcome });
    };
    const stagingDir = stagingDirFor(this.stagingBase, this.component, request.bundleId);
    const archivePath = archivePathFor(request.targetPath, this.component, request.bundleId);
    logInfo('bundle_start', { bundleId: request.bundleId, component: this.component, stagingDir, archivePath, coredumps: request.coredumps });

    let current: BundleStep = 'resolve_config';
    try {
      const paths = this.resolveConfig(request.clusterConf);
      record({ step: current, status: 'ok', detail: `machine ${paths.machineId}` });

      await withStagingDir(stagingDir, async dir => {
        current = 'component_config';
        this.checkpoint();
        record({ step: current, status: 'ok', detail: this.copyComponentConfig(paths, dir) });

        current = 'logs';
        this.checkpoint();
        record(this.copyLogs(paths, dir));

        current = 'coredumps';
        this.checkpoint();
        record(this.copyCoredumps(request.coredumps, dir));

        current = 'package_inventory';
        this.checkpoint();
        record(this.capturePackageInventory(dir));

        current = 'archive';
        this.checkpoint();
        await this.writeArchive(dir, archivePath);
        record({ step: current, status: 'ok', detail: archivePath });
      });
    } catch(e){
      record({ step: current, status: 'fatal', detail: describeError(e).message });
      logError('bundle_step_failed', { bundleId: request.bundleId, step: current, ...describeError(e) });
      throw e;
    }

    logInfo('bundle_complete', { bundleId: request.bundleId, archivePath });
    return { bundleId: request.bundleId, archivePath, stagingDir, steps };
  }

  private checkpoint(): void {
    if(this.signal?.aborted) throw new InterruptedError('support bundle collection interrupted');
  }

  private resolveConfig(clusterConf: string): ResolvedPaths {
    const cfg = getRuntimeConfig().cluster;
    const machineId = this.machineId();
    const store = this.openStore(clusterConf);
    return {
      machineId,
      logBase: store.get(cfg.logBaseKey),
      configBase: store.get(cfg.configBaseKey),
    };
  }

  private copyComponentConfig(paths: ResolvedPaths, stagingDir: string): string {
    const configDir = path.join(paths.configBase, this.component, paths.machineId);
    const source = path.join(configDir, `${this.component}.conf`);
    if(!fs.existsSync(source)) throw new NotFoundError(source, `component config ${source} not found`);
    fs.copyFileSync(source, path.join(stagingDir, path.basename(source)));
    return source;
  }

  private copyLogs(paths: ResolvedPaths, stagingDir: string): StepOutcome {
    const logDir = path.join(paths.logBase, this.component, paths.machineId);
    if(!fs.existsSync(logDir)){
      logWarn('log_dir_missing', { logDir });
      return { step: 'logs', status: 'skipped', detail: `${logDir} does not exist` };
    }
    const names = globSync(logPatterns(this.component), { cwd: logDir, nodir: true }).sort();
    for(const name of names){
      fs.copyFileSync(path.join(logDir, name), path.join(stagingDir, name));
    }
    return { step: 'logs', status: 'ok', detail: `${names.length} file(s) from ${logDir}` };
  }

  private copyCoredumps(requested: boolean, stagingDir: string): StepOutcome {
    if(!requested) return { step: 'coredumps', status: 'skipped', detail: 'not requested' };
    if(!fs.existsSync(this.crashDir)){
      logDebug('crash_dir_missing', { crashDir: this.crashDir });
      return { step: 'coredumps', status: 'skipped', detail: `${this.crashDir} does not exist` };
    }
    fs.cpSync(this.crashDir, path.join(stagingDir, CRASH_SUBDIR), { recursive: true });
    return { step: 'coredumps', status: 'ok', detail: this.crashDir };
  }

  private capturePackageInventory(stagingDir: string): StepOutcome {
    const res = this.packageQuery.run();
    if(res.status !== 0){
      logDebug('package_query_skipped', { command: this.packageQuery.command, status: res.status, timedOut: res.timedOut, error: res.error, stderr: res.stderr.trim() || undefined });
      const reason = res.timedOut ? 'timed out' : res.error ?? `exit ${res.status}`;
      return { step: 'package_inventory', status: 'skipped', detail: reason };
    }
    fs.writeFileSync(path.join(stagingDir, PACKAGE_INVENTORY_FILE), res.stdout, 'utf8');
    return { step: 'package_inventory', status: 'ok', detail: PACKAGE_INVENTORY_FILE };
  }

  private async writeArchive(stagingDir: string, archivePath: string): Promise<void> {
    try {
      await writeTarGz(stagingDir, archivePath, path.basename(stagingDir), this.signal);
    } catch(e){
      // never leave a truncated tarball behind under the target path
      if(fs.existsSync(archivePath)) fs.rmSync(archivePath, { force: true });
      throw e;
    }
  }
}

/** Convenience wrapper matching the single-call entry point: one collector, one bundle. */
export function generate(bundleId: string, targetPath: string, clusterConf: string, coredumps = false, opts: BundleCollectorOptions = {}): Promise<BundleResult> {
  return new BundleCollector(opts).generate(bundleId, targetPath, clusterConf, coredumps);
}
