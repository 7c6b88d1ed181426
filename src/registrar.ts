import { cleanName, isApex } from './domain.js';
import type { Logger } from './logger.js';
import type { RegistrarClient, RegistrarDomain } from './provider.js';
import type { ZoneDefinition } from './types.js';

export interface RegistrarSyncResult {
  domainName: string;
  /** Apex NS values declared in the zone document */
  declared: string[];
  /** Nameservers the registrar had before this run; undefined when not registered there */
  current?: string[];
  /** Registration details, read only */
  domain?: RegistrarDomain;
  /** True when the registrar was (or, on a dry run, would be) updated */
  changed: boolean;
}

export interface RegistrarSyncOptions {
  dryRun?: boolean;
  logger?: Logger;
}

/**
 * Values of the zone's apex NS records, in declaration order. Empty when the
 * zone declares none, meaning the domain is registered elsewhere.
 */
export function findApexNameservers(zone: ZoneDefinition): string[] {
  const values: string[] = [];
  for (const record of zone.records) {
    if (record.type !== 'NS' || record.payload.kind !== 'values') continue;
    if (!isApex(record.name, zone.zoneName)) continue;
    values.push(...record.payload.values);
  }
  return values;
}

function sameNameservers(a: string[], b: string[]): boolean {
  const left = [...new Set(a.map(cleanName))].sort();
  const right = [...new Set(b.map(cleanName))].sort();
  return left.length === right.length && left.every((ns, i) => ns === right[i]);
}

/**
 * Point the domain's registration at the zone's declared apex nameservers.
 *
 * Only nameservers are ever written. A zone without apex NS records causes no
 * registrar call.
 */
export async function syncRegistrarNameservers(
  zone: ZoneDefinition,
  registrar: RegistrarClient,
  options: RegistrarSyncOptions = {}
): Promise<RegistrarSyncResult | undefined> {
  const declared = findApexNameservers(zone);
  if (declared.length === 0) return undefined;

  const domainName = zone.zoneName;
  const domain = await registrar.getDomain(domainName);
  if (!domain) {
    options.logger?.warn('Domain is not registered with the registrar; skipping nameserver sync', {
      domain: domainName,
    });
    return { domainName, declared, changed: false };
  }

  const result: RegistrarSyncResult = {
    domainName,
    declared,
    current: domain.nameservers,
    domain,
    changed: !sameNameservers(domain.nameservers, declared),
  };

  if (result.changed && !options.dryRun) {
    options.logger?.info('Updating registrar nameservers', {
      domain: domainName,
      from: domain.nameservers,
      to: declared,
    });
    await registrar.updateNameservers(domainName, declared);
  }

  return result;
}
