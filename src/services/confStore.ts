import fs from 'fs';
import { parse as parseYaml } from 'yaml';
import { ConfigurationError, describeError } from './errors';

/**
 * Read-only view over the cluster configuration document.
 *
 * URIs take the form `<scheme>://<path>`, e.g. `yaml:///etc/cortx/cluster.conf`.
 * Keys address nested mappings with `>` separators (`cortx>common>storage>log`);
 * a numeric segment indexes into a sequence.
 */
export interface ConfStore {
  readonly uri: string;
  get(key: string): string;
}

export type ConfStoreOpener = (uri: string) => ConfStore;

type Parser = (raw: string) => unknown;

const PARSERS: Record<string, Parser> = {
  yaml: raw => parseYaml(raw),
  json: raw => JSON.parse(raw),
};

const KEY_SEPARATOR = '>';

export function parseConfUri(uri: string): { scheme: string; path: string } {
  const m = /^([A-Za-z][A-Za-z0-9+.-]*):\/\/(.+)$/.exec(uri.trim());
  if(!m) throw new ConfigurationError(`invalid configuration store URI: ${uri}`, { uri });
  return { scheme: m[1].toLowerCase(), path: m[2] };
}

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === 'object' && v !== null && !Array.isArray(v);
}

class DocumentConfStore implements ConfStore {
  constructor(readonly uri: string, private readonly doc: Record<string, unknown>){}

  get(key: string): string {
    let node: unknown = this.doc;
    for(const segment of key.split(KEY_SEPARATOR)){
      if(Array.isArray(node) && /^\d+$/.test(segment)) node = node[Number(segment)];
      else if(isRecord(node) && Object.prototype.hasOwnProperty.call(node, segment)) node = node[segment];
      else node = undefined;
      if(node === undefined) break;
    }
    if(typeof node === 'string' || typeof node === 'number' || typeof node === 'boolean') return String(node);
    if(node === undefined || node === null){
      throw new ConfigurationError(`key ${key} not found in ${this.uri}`, { key, uri: this.uri });
    }
    throw new ConfigurationError(`key ${key} in ${this.uri} is not a scalar value`, { key, uri: this.uri });
  }
}

export const openConfStore: ConfStoreOpener = (uri: string) => {
  const { scheme, path: filePath } = parseConfUri(uri);
  const parser = PARSERS[scheme];
  if(!parser){
    throw new ConfigurationError(`unsupported configuration store scheme "${scheme}" (expected ${Object.keys(PARSERS).join(', ')})`, { uri, scheme });
  }
  let raw: string;
  try {
    raw = fs.readFileSync(filePath, 'utf8');
  } catch(e){
    throw new ConfigurationError(`cannot open configuration store ${uri}: ${describeError(e).message}`, { uri });
  }
  let doc: unknown;
  try {
    doc = parser(raw);
  } catch(e){
    throw new ConfigurationError(`cannot parse configuration store ${uri}: ${describeError(e).message}`, { uri });
  }
  if(!isRecord(doc)){
    throw new ConfigurationError(`configuration store ${uri} is not a mapping`, { uri });
  }
  return new DocumentConfStore(uri, doc);
};
