import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'fs';
import os from 'os';
import path from 'path';
import { reloadRuntimeConfig } from '../config/runtimeConfig';
import { ConfigurationError } from '../services/errors';
import { readMachineId } from '../services/machineId';

describe('readMachineId', () => {
  let dir: string;

  beforeEach(() => { dir = fs.mkdtempSync(path.join(os.tmpdir(), 'machine-id-test-')); });
  afterEach(() => {
    delete process.env.RGW_BUNDLE_MACHINE_ID;
    delete process.env.RGW_BUNDLE_MACHINE_ID_FILE;
    reloadRuntimeConfig();
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('prefers RGW_BUNDLE_MACHINE_ID', () => {
    process.env.RGW_BUNDLE_MACHINE_ID = 'override-id';
    process.env.RGW_BUNDLE_MACHINE_ID_FILE = path.join(dir, 'absent');
    reloadRuntimeConfig();
    expect(readMachineId()).toBe('override-id');
  });

  it('reads the first non-empty line of the machine-id file', () => {
    const file = path.join(dir, 'machine-id');
    fs.writeFileSync(file, '\n  0123456789abcdef0123456789abcdef  \n');
    process.env.RGW_BUNDLE_MACHINE_ID_FILE = file;
    reloadRuntimeConfig();
    expect(readMachineId()).toBe('0123456789abcdef0123456789abcdef');
  });

  it('raises ConfigurationError when no id can be read', () => {
    process.env.RGW_BUNDLE_MACHINE_ID_FILE = path.join(dir, 'absent');
    reloadRuntimeConfig();
    expect(() => readMachineId()).toThrow(ConfigurationError);
    const empty = path.join(dir, 'empty');
    fs.writeFileSync(empty, '\n');
    process.env.RGW_BUNDLE_MACHINE_ID_FILE = empty;
    reloadRuntimeConfig();
    expect(() => readMachineId()).toThrow(`machine id unavailable: ${empty} is empty`);
  });
});
