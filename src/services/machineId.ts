import fs from 'fs';
import { getRuntimeConfig } from '../config/runtimeConfig';
import { ConfigurationError } from './errors';

export type MachineIdProvider = () => string;

/**
 * Stable per-node identifier. RGW_BUNDLE_MACHINE_ID wins; otherwise the first
 * non-empty line of the machine-id file (default /etc/machine-id).
 */
export const readMachineId: MachineIdProvider = () => {
  const cfg = getRuntimeConfig().machine;
  if(cfg.id) return cfg.id;
  let raw: string;
  try {
    raw = fs.readFileSync(cfg.idFile, 'utf8');
  } catch {
    throw new ConfigurationError(`machine id unavailable: cannot read ${cfg.idFile}`, { file: cfg.idFile });
  }
  const id = raw.split(/\r?\n/).map(l => l.trim()).find(Boolean);
  if(!id) throw new ConfigurationError(`machine id unavailable: ${cfg.idFile} is empty`, { file: cfg.idFile });
  return id;
};
