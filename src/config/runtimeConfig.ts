/**
 * Unified runtime configuration loader.
 *
 * Goals:
 *  - Provide a single parsed, typed surface for environment driven behavior.
 *  - Keep process.env reads out of the collection steps so tests can swap values with reloadRuntimeConfig().
 *
 * Non-goals:
 *  - Reading the cluster configuration store (see services/confStore).
 */
import os from 'os';
import path from 'path';
import { getBooleanEnv } from '../utils/envUtils';

export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

const LOG_LEVELS: readonly LogLevel[] = ['error', 'warn', 'info', 'debug'];

interface LoggingConfig {
  level: LogLevel;
  json: boolean;
  sync: boolean;
  file?: string;
}

interface ComponentConfig {
  name: string;
  product: string;
}

interface ClusterConfig {
  defaultUri: string;
  logBaseKey: string;
  configBaseKey: string;
}

interface MachineConfig {
  id?: string;
  idFile: string;
}

interface CollectionConfig {
  stagingBase: string;
  crashDir: string;
  defaultTarget: string;
}

interface PackageQueryConfig {
  command: string;
  timeoutMs: number;
}

export interface RuntimeConfig {
  component: ComponentConfig;
  cluster: ClusterConfig;
  machine: MachineConfig;
  collection: CollectionConfig;
  packageQuery: PackageQueryConfig;
  logging: LoggingConfig;
}

const CWD = process.cwd();

function toAbsolute(raw: string | undefined, fallback?: string): string {
  if(raw && raw.trim().length){
    return path.isAbsolute(raw) ? raw : path.resolve(CWD, raw);
  }
  if(fallback && fallback.trim().length){
    return path.isAbsolute(fallback) ? fallback : path.resolve(CWD, fallback);
  }
  return CWD;
}

function numberFromEnv(name: string, defaultValue: number): number {
  const raw = process.env[name];
  if(!raw) return defaultValue;
  const value = Number(raw);
  return Number.isFinite(value) ? value : defaultValue;
}

function stringFromEnv(name: string, defaultValue: string): string {
  const raw = process.env[name];
  if(raw && raw.trim().length) return raw;
  return defaultValue;
}

function optionalStringFromEnv(name: string): string | undefined {
  const raw = process.env[name];
  return raw && raw.trim().length ? raw.trim() : undefined;
}

function isLogLevel(value: string): value is LogLevel {
  return (LOG_LEVELS as readonly string[]).includes(value);
}

function parseLogLevel(): LogLevel {
  const raw = (process.env.RGW_BUNDLE_LOG_LEVEL || '').trim().toLowerCase();
  return isLogLevel(raw) ? raw : 'info';
}

function resolveLogFile(): string | undefined {
  const raw = process.env.RGW_BUNDLE_LOG_FILE;
  if(!raw) return undefined;
  const normalized = raw.trim().toLowerCase();
  if(raw === '1' || ['true','yes','on'].includes(normalized)){
    return toAbsolute(path.join('logs','rgw-support-bundle.log'));
  }
  return toAbsolute(raw);
}

function parseLoggingConfig(): LoggingConfig {
  return {
    level: parseLogLevel(),
    json: getBooleanEnv('RGW_BUNDLE_LOG_JSON'),
    sync: getBooleanEnv('RGW_BUNDLE_LOG_SYNC'),
    file: resolveLogFile(),
  };
}

function parseComponentConfig(): ComponentConfig {
  return { name: 'rgw', product: 'cortx' };
}

function parseClusterConfig(component: ComponentConfig): ClusterConfig {
  return {
    defaultUri: stringFromEnv('RGW_BUNDLE_CLUSTER_CONF', `yaml:///etc/${component.product}/cluster.conf`),
    logBaseKey: stringFromEnv('RGW_BUNDLE_LOG_KEY', `${component.product}>common>storage>log`),
    configBaseKey: stringFromEnv('RGW_BUNDLE_CONFIG_KEY', `${component.product}>common>storage>config`),
  };
}

function parseMachineConfig(): MachineConfig {
  return {
    id: optionalStringFromEnv('RGW_BUNDLE_MACHINE_ID'),
    idFile: toAbsolute(process.env.RGW_BUNDLE_MACHINE_ID_FILE, '/etc/machine-id'),
  };
}

function parseCollectionConfig(component: ComponentConfig): CollectionConfig {
  return {
    stagingBase: toAbsolute(process.env.RGW_BUNDLE_STAGING_DIR, os.tmpdir()),
    crashDir: toAbsolute(process.env.RGW_BUNDLE_CRASH_DIR, '/var/lib/ceph/crash'),
    defaultTarget: stringFromEnv('RGW_BUNDLE_TARGET', `/var/${component.product}/support_bundle/`),
  };
}

function parsePackageQueryConfig(component: ComponentConfig): PackageQueryConfig {
  return {
    command: stringFromEnv('RGW_BUNDLE_PACKAGE_QUERY', `rpm -qa | grep ${component.product}`),
    timeoutMs: Math.max(1, numberFromEnv('RGW_BUNDLE_PACKAGE_QUERY_TIMEOUT_MS', 30000)),
  };
}

export function loadRuntimeConfig(): RuntimeConfig {
  const component = parseComponentConfig();
  return {
    component,
    cluster: parseClusterConfig(component),
    machine: parseMachineConfig(),
    collection: parseCollectionConfig(component),
    packageQuery: parsePackageQueryConfig(component),
    logging: parseLoggingConfig(),
  };
}

let _cached: RuntimeConfig | undefined;
export function getRuntimeConfig(): RuntimeConfig {
  if(!_cached) _cached = loadRuntimeConfig();
  return _cached;
}

export function reloadRuntimeConfig(): RuntimeConfig {
  _cached = loadRuntimeConfig();
  return _cached;
}

if(require.main === module){
  // eslint-disable-next-line no-console
  console.log(JSON.stringify(getRuntimeConfig(), null, 2));
}
