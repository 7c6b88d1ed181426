import { readFile, readdir } from 'node:fs/promises';
import path from 'node:path';
import * as yaml from 'js-yaml';
import { TUNNEL_REGISTRY_FILE } from './constants.js';
import { InvalidFieldError, formatErrorMessage } from './errors.js';
import type { ZoneSource } from './registry.js';

export interface DocumentStore {
  zones: ZoneSource[];
  /** The global tunnel registry, when the directory has one */
  tunnels?: ZoneSource;
}

/**
 * Read every zone document in `dir` (`*.yml`, `*.yaml`), in file name order.
 * `tunnels.yml` (or `tunnels.yaml`, but not both) is the global tunnel
 * registry rather than a zone.
 */
export async function readDocumentStore(dir: string): Promise<DocumentStore> {
  const entries = await readdir(dir, { withFileTypes: true });
  const files = entries
    .filter((entry) => entry.isFile() && /\.ya?ml$/i.test(entry.name))
    .map((entry) => entry.name)
    .sort();

  const store: DocumentStore = { zones: [] };
  for (const file of files) {
    const document = path.join(dir, file);
    const source = { document, content: decodeYaml(await readFile(document, 'utf8'), document) };
    if (file === TUNNEL_REGISTRY_FILE || file === 'tunnels.yaml') {
      if (store.tunnels) {
        throw new InvalidFieldError(
          document,
          undefined,
          `tunnel registry is already declared in ${store.tunnels.document}`
        );
      }
      store.tunnels = source;
    } else {
      store.zones.push(source);
    }
  }
  return store;
}

/** Decode one YAML document, naming the document on syntax errors */
export function decodeYaml(text: string, document: string): unknown {
  try {
    return yaml.load(text, { filename: document });
  } catch (err) {
    throw new InvalidFieldError(document, undefined, `invalid YAML: ${formatErrorMessage(err)}`);
  }
}
