import { describe, it, expect, afterEach } from 'vitest';
import os from 'os';
import path from 'path';
import { getRuntimeConfig, reloadRuntimeConfig } from '../config/runtimeConfig';

const VARS = [
  'RGW_BUNDLE_LOG_LEVEL', 'RGW_BUNDLE_LOG_FILE', 'RGW_BUNDLE_STAGING_DIR', 'RGW_BUNDLE_CRASH_DIR',
  'RGW_BUNDLE_MACHINE_ID', 'RGW_BUNDLE_LOG_JSON', 'RGW_BUNDLE_LOG_SYNC', 'RGW_BUNDLE_PACKAGE_QUERY_TIMEOUT_MS', 'RGW_BUNDLE_TARGET', 'RGW_BUNDLE_CLUSTER_CONF',
];

describe('runtimeConfig', () => {
  afterEach(() => {
    for(const k of VARS) delete process.env[k];
    reloadRuntimeConfig();
  });

  it('provides defaults for an unconfigured environment', () => {
    for(const k of VARS) delete process.env[k];
    const cfg = reloadRuntimeConfig();
    expect(cfg.component).toEqual({ name: 'rgw', product: 'cortx' });
    expect(cfg.cluster).toEqual({
      defaultUri: 'yaml:///etc/cortx/cluster.conf',
      logBaseKey: 'cortx>common>storage>log',
      configBaseKey: 'cortx>common>storage>config',
    });
    expect(cfg.collection).toEqual({
      stagingBase: os.tmpdir(),
      crashDir: '/var/lib/ceph/crash',
      defaultTarget: '/var/cortx/support_bundle/',
    });
    expect(cfg.packageQuery).toEqual({ command: 'rpm -qa | grep cortx', timeoutMs: 30000 });
    expect(cfg.logging.level).toBe('info');
    expect(cfg.logging.file).toBeUndefined();
    expect(cfg.machine.id).toBeUndefined();
  });

  it('reads overrides and caches until reload', () => {
    process.env.RGW_BUNDLE_STAGING_DIR = '/scratch';
    process.env.RGW_BUNDLE_LOG_LEVEL = 'DEBUG';
    process.env.RGW_BUNDLE_PACKAGE_QUERY_TIMEOUT_MS = 'soon';
    process.env.RGW_BUNDLE_MACHINE_ID = '  abc123  ';
    process.env.RGW_BUNDLE_LOG_FILE = 'true';
    const cfg = reloadRuntimeConfig();
    expect(cfg.collection.stagingBase).toBe('/scratch');
    expect(cfg.logging.level).toBe('debug');
    expect(cfg.packageQuery.timeoutMs).toBe(30000);
    expect(cfg.machine.id).toBe('abc123');
    expect(cfg.logging.file).toBe(path.resolve(process.cwd(), 'logs', 'rgw-support-bundle.log'));

    process.env.RGW_BUNDLE_STAGING_DIR = '/elsewhere';
    expect(getRuntimeConfig().collection.stagingBase).toBe('/scratch');
    expect(reloadRuntimeConfig().collection.stagingBase).toBe('/elsewhere');
  });

  it('logging section carries only the resolved log file path', () => {
    process.env.RGW_BUNDLE_LOG_FILE = '/var/log/bundle.log';
    expect(reloadRuntimeConfig().logging).toEqual({ level: 'info', json: false, sync: false, file: '/var/log/bundle.log' });

    delete process.env.RGW_BUNDLE_LOG_FILE;
    expect(Object.keys(reloadRuntimeConfig().logging).sort()).toEqual(['file', 'json', 'level', 'sync']);
  });
});
