import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import fs from 'fs';
import path from 'path';
import { _helpText, _parseArgs, run, RunDeps, EXIT_FAILURE, EXIT_INTERRUPTED, EXIT_OK, EXIT_USAGE } from '../cli/index';
import { ArgumentError } from '../services/errors';
import { BundleFixture, FakePackageQuery, MACHINE_ID, listTarFiles, makeFixture } from './testUtils';

describe('cli argument parsing', () => {
  it('parses short, long and assignment forms', () => {
    const cfg = _parseArgs(['node', 'cli',
      '-b', 'SB1', '-t', '/out', '-c', 'json:///c.json',
      '-s', 's3server', 'haproxy', '--duration=P2D', '--size_limit', '1GB',
      '--coredumps', 'True', '--binlogs=false', '--stacktrace', 'TRUE', '--modules', 'm1 m2']);
    expect(cfg).toEqual({
      bundleId: 'SB1',
      target: '/out',
      config: 'json:///c.json',
      services: ['s3server', 'haproxy'],
      duration: 'P2D',
      sizeLimit: '1GB',
      binlogs: false,
      coredumps: true,
      stacktrace: true,
      modules: 'm1 m2',
      help: false,
    });
  });

  it('applies defaults and splits comma separated services', () => {
    const cfg = _parseArgs(['node', 'cli', '--bundle_id', 'SB2', '--services=a,b']);
    expect(cfg.target).toBe('/var/cortx/support_bundle/');
    expect(cfg.config).toBe('yaml:///etc/cortx/cluster.conf');
    expect(cfg.services).toEqual(['a', 'b']);
    expect(cfg.duration).toBe('P5D');
    expect(cfg.sizeLimit).toBe('500MB');
    expect(cfg.coredumps).toBe(false);
  });

  it('rejects malformed booleans, unknown flags and missing values', () => {
    expect(() => _parseArgs(['node', 'cli', '--coredumps', 'maybe'])).toThrow(ArgumentError);
    expect(() => _parseArgs(['node', 'cli', '--verbose'])).toThrow('unrecognized argument: --verbose');
    expect(() => _parseArgs(['node', 'cli', '-b'])).toThrow('-b requires a value');
    expect(() => _parseArgs(['node', 'cli', '-b', '-t', '/x'])).toThrow('-b requires a value');
  });

  it('help text documents every flag', () => {
    const help = _helpText();
    for(const flag of ['-b', '-t', '-c', '-s', '-d', '--size_limit', '--binlogs', '--coredumps', '--stacktrace', '--modules']){
      expect(help).toContain(flag);
    }
  });
});

describe('cli run', () => {
  let fx: BundleFixture;
  let out: string[];
  let err: string[];

  beforeEach(() => {
    fx = makeFixture();
    out = [];
    err = [];
    vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
  });
  afterEach(() => { vi.restoreAllMocks(); fx.cleanup(); });

  function deps(overrides: RunDeps = {}): RunDeps {
    return {
      out: line => { out.push(line); },
      err: line => { err.push(line); },
      stagingBase: fx.stagingBase,
      crashDir: fx.crashDir,
      machineId: () => MACHINE_ID,
      packageQuery: new FakePackageQuery({ stdout: 'cortx-rgw-2.0.0-1.x86_64\n' }),
      ...overrides,
    };
  }

  it('prints the archive path and exits 0', async () => {
    const code = await run(['node', 'cli', '-b', 'cli1', '-t', fx.target, '-c', fx.confUri, '--coredumps', 'true'], deps());
    const archivePath = path.join(fx.target, 'rgw', 'rgw_cli1.tar.gz');
    expect(code).toBe(EXIT_OK);
    expect(out).toEqual([archivePath]);
    expect(listTarFiles(archivePath)).toContain('rgw_cli1/crash/core.1');
  });

  it('exits 0 after printing help', async () => {
    const code = await run(['node', 'cli', '--help'], deps());
    expect(code).toBe(EXIT_OK);
    expect(err[0]).toMatch(/^rgw-support-bundle - collect rgw diagnostics/);
    expect(out).toEqual([]);
  });

  it('exits 2 on argument errors', async () => {
    expect(await run(['node', 'cli', '-t', fx.target], deps())).toBe(EXIT_USAGE);
    expect(err).toEqual(['rgw-support-bundle: -b/--bundle_id is required', 'Try --help for usage.']);

    err.length = 0;
    expect(await run(['node', 'cli', '-b', 'x', '--coredumps', 'maybe'], deps())).toBe(EXIT_USAGE);
    expect(err[0]).toBe('rgw-support-bundle: --coredumps: expected true or false, got "maybe"');

    expect(await run(['node', 'cli', '-b', 'x', '--duration', 'forever'], deps())).toBe(EXIT_USAGE);
  });

  it('exits 1 without an archive when the component config is missing', async () => {
    fs.rmSync(path.join(fx.configDir, 'rgw.conf'));
    const code = await run(['node', 'cli', '-b', 'cli2', '-t', fx.target, '-c', fx.confUri], deps());
    expect(code).toBe(EXIT_FAILURE);
    expect(out).toEqual([]);
    expect(fs.existsSync(path.join(fx.target, 'rgw', 'rgw_cli2.tar.gz'))).toBe(false);
  });

  it('on SIGINT discards the bundle, prints the caution and exits 1', async () => {
    const before = process.listeners('SIGINT');
    const interrupt = () => {
      for(const l of process.listeners('SIGINT')){
        if(!before.includes(l)) l('SIGINT');
      }
    };
    const code = await run(['node', 'cli', '-b', 'cli3', '-t', fx.target, '-c', fx.confUri], deps({ packageQuery: new FakePackageQuery({}, interrupt) }));
    expect(code).toBe(EXIT_INTERRUPTED);
    expect(out).toEqual([]);
    expect(err).toEqual(['WARNING: support bundle cli3 was interrupted; the bundle is incomplete and has been discarded. Re-run the collection to produce a usable archive.']);
    expect(fs.existsSync(path.join(fx.target, 'rgw', 'rgw_cli3.tar.gz'))).toBe(false);
    expect(fs.existsSync(path.join(fx.stagingBase, 'rgw_cli3'))).toBe(false);
    expect(process.listeners('SIGINT')).toEqual(before);
  });
});
