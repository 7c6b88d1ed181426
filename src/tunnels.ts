import {
  CLOUDFLARE_PROXIED_TTL,
  TUNNEL_CATCH_ALL_SERVICE,
  TUNNEL_CNAME_SUFFIX,
} from './constants.js';
import { recordFqdn, relativeName } from './domain.js';
import { UnknownTunnelError } from './errors.js';
import { identityKey } from './normalize.js';
import type {
  CloudflareRecord,
  TunnelDef,
  TunnelIngressRule,
  TunnelRoute,
  ZoneDefinition,
} from './types.js';

/** Ingress configuration to publish for one tunnel */
export interface TunnelIngress {
  tunnelId: string;
  /** Names the tunnel is referenced by across documents */
  tunnelNames: string[];
  rules: TunnelIngressRule[];
}

export interface TunnelRouting {
  /** Derived CNAME records per zone name */
  records: Map<string, CloudflareRecord[]>;
  /** Ingress configuration per tunnel id, each ending in the catch-all rule */
  ingress: Map<string, TunnelIngress>;
  /** hostname → tunnel it routes through */
  routes: Map<string, TunnelRoute>;
}

/** Zone-scoped tunnels shadow global tunnels of the same name */
export function lookupTunnel(
  name: string,
  zone: ZoneDefinition,
  globalTunnels: ReadonlyMap<string, TunnelDef>
): TunnelDef | undefined {
  return zone.tunnels.get(name) ?? globalTunnels.get(name);
}

/**
 * Turn TUNNEL records into proxied CNAMEs to `<tunnel_id>.cfargotunnel.com`
 * and per-tunnel ingress rules.
 *
 * Rules are collected across all zones in the order given; each tunnel's list
 * then gets exactly one trailing `http_status:404` rule.
 */
export function routeTunnels(
  zones: ZoneDefinition[],
  globalTunnels: ReadonlyMap<string, TunnelDef>
): TunnelRouting {
  const records = new Map<string, CloudflareRecord[]>();
  const ingress = new Map<string, TunnelIngress>();
  const routes = new Map<string, TunnelRoute>();

  for (const zone of zones) {
    const zoneRecords: CloudflareRecord[] = [];

    zone.records.forEach((raw, index) => {
      if (raw.payload.kind !== 'tunnel') return;

      const tunnel = lookupTunnel(raw.payload.name, zone, globalTunnels);
      if (!tunnel) {
        throw new UnknownTunnelError(
          zone.document,
          `records[${index}].tunnel.name`,
          raw.payload.name
        );
      }

      const fqdn = recordFqdn(raw.name, zone.zoneName);
      const name = relativeName(fqdn, zone.zoneName);

      zoneRecords.push({
        provider: 'cloudflare',
        identityKey: identityKey(zone.zoneName, name, 'CNAME', 0),
        zoneName: zone.zoneName,
        name,
        fqdn,
        type: 'CNAME',
        ttl: CLOUDFLARE_PROXIED_TTL,
        content: `${tunnel.tunnelId}.${TUNNEL_CNAME_SUFFIX}`,
        proxied: true,
        tunnel: { name: tunnel.name, tunnelId: tunnel.tunnelId },
      });

      let entry = ingress.get(tunnel.tunnelId);
      if (!entry) {
        entry = { tunnelId: tunnel.tunnelId, tunnelNames: [], rules: [] };
        ingress.set(tunnel.tunnelId, entry);
      }
      if (!entry.tunnelNames.includes(tunnel.name)) {
        entry.tunnelNames.push(tunnel.name);
      }
      entry.rules.push({ hostname: fqdn, service: raw.payload.service });

      routes.set(fqdn, {
        tunnelName: tunnel.name,
        tunnelId: tunnel.tunnelId,
        service: raw.payload.service,
      });
    });

    if (zoneRecords.length > 0) {
      records.set(zone.zoneName, zoneRecords);
    }
  }

  for (const entry of ingress.values()) {
    entry.rules.push({ service: TUNNEL_CATCH_ALL_SERVICE });
  }

  return { records, ingress, routes };
}
