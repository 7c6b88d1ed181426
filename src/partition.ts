import type { ProviderKind, ZoneDefinition } from './types.js';

export type ProviderPartition = Record<ProviderKind, ZoneDefinition[]>;

/**
 * Split zones by the provider(s) hosting them.
 *
 * A zone declared with several providers lands in each subset; that is how a
 * zone is served from both sides while moving between providers.
 */
export function partitionZones(
  zones: Iterable<ZoneDefinition>
): ProviderPartition {
  const partition: ProviderPartition = { route53: [], cloudflare: [] };

  for (const zone of zones) {
    for (const provider of zone.providers) {
      partition[provider].push(zone);
    }
  }

  partition.route53.sort(byZoneName);
  partition.cloudflare.sort(byZoneName);
  return partition;
}

function byZoneName(a: ZoneDefinition, b: ZoneDefinition): number {
  return a.zoneName.localeCompare(b.zoneName);
}
