import { PROVIDER_MANAGED_TYPES } from './constants.js';
import { recordFqdn, relativeName } from './domain.js';
import { resolveProxy } from './proxy.js';
import { resolveRoutingPolicy } from './routing-policy.js';
import { decodeTxtValue, quoteTxt } from './txt.js';
import type {
  CloudflareRecord,
  MxEntry,
  RawRecord,
  RecordPayload,
  Route53Record,
  ZoneDefinition,
} from './types.js';

/**
 * Join key between desired and live records: `<zone>_<name>_<type>`, plus a
 * set identifier (Route 53) or value index (Cloudflare) when given.
 */
export function identityKey(
  zoneName: string,
  name: string,
  type: string,
  suffix?: string | number
): string {
  const base = `${zoneName}_${name}_${type}`;
  return suffix === undefined ? base : `${base}_${suffix}`;
}

/** MX targets with explicit priority, whichever form the document used */
export function mxEntries(payload: RecordPayload): MxEntry[] {
  switch (payload.kind) {
    case 'mx':
      return payload.entries;
    case 'values':
      return payload.values.map((value) => {
        const [priority = '0', ...rest] = value.trim().split(/\s+/);
        return { priority: Number(priority), value: rest.join(' ') };
      });
    case 'tunnel':
      return [];
  }
}

function isManaged(record: RawRecord): boolean {
  return PROVIDER_MANAGED_TYPES.has(record.type);
}

function isTxt(type: string): boolean {
  return type === 'TXT' || type === 'SPF';
}

function names(record: RawRecord, zoneName: string) {
  const fqdn = recordFqdn(record.name, zoneName);
  return { fqdn, name: relativeName(fqdn, zoneName) };
}

/**
 * Compile a zone's records into Route 53 record sets.
 *
 * NS/SOA are left to Route 53 and TUNNEL records only exist at Cloudflare.
 * One record set per declared record; MX values become `"priority host"`.
 * TXT values are kept unquoted; the adapter applies wire quoting.
 */
export function normalizeRoute53Zone(zone: ZoneDefinition): Route53Record[] {
  const records: Route53Record[] = [];

  for (const raw of zone.records) {
    if (isManaged(raw) || raw.type === 'TUNNEL') continue;

    const { fqdn, name } = names(raw, zone.zoneName);
    const values =
      raw.type === 'MX'
        ? mxEntries(raw.payload).map((mx) => `${mx.priority} ${mx.value}`)
        : raw.payload.kind === 'values'
          ? raw.payload.values.map((value) => (isTxt(raw.type) ? decodeTxtValue(value) : value))
          : [];
    const routing = resolveRoutingPolicy(raw.routingPolicy, raw.setIdentifier);

    const record: Route53Record = {
      provider: 'route53',
      identityKey: identityKey(zone.zoneName, name, raw.type, routing.setIdentifier),
      zoneName: zone.zoneName,
      name,
      fqdn,
      type: raw.type,
      ttl: raw.ttl,
      values,
      multiValueAnswer: routing.multiValueAnswer,
    };
    if (routing.setIdentifier) record.setIdentifier = routing.setIdentifier;
    if (routing.routing) record.routing = routing.routing;
    records.push(record);
  }

  return records;
}

/**
 * Compile a zone's records into Cloudflare DNS records.
 *
 * Cloudflare stores one object per value, so a record with N values becomes N
 * records keyed by value index. MX and SRV priority moves to its own field,
 * as Cloudflare reports it. TUNNEL records are left to the tunnel router.
 */
export function normalizeCloudflareZone(zone: ZoneDefinition): CloudflareRecord[] {
  const records: CloudflareRecord[] = [];

  zone.records.forEach((raw, index) => {
    if (isManaged(raw) || raw.type === 'TUNNEL') return;

    const { fqdn, name } = names(raw, zone.zoneName);
    const { proxied, ttl } = resolveProxy(raw, zone.document, `records[${index}]`);

    const base = {
      provider: 'cloudflare' as const,
      zoneName: zone.zoneName,
      name,
      fqdn,
      type: raw.type,
      ttl,
      proxied,
    };

    if (raw.type === 'MX' || raw.type === 'SRV') {
      mxEntries(raw.payload).forEach((mx, i) => {
        records.push({
          ...base,
          identityKey: identityKey(zone.zoneName, name, raw.type, i),
          content: mx.value,
          priority: mx.priority,
        });
      });
      return;
    }

    const values = raw.payload.kind === 'values' ? raw.payload.values : [];
    values.forEach((value, i) => {
      records.push({
        ...base,
        identityKey: identityKey(zone.zoneName, name, raw.type, i),
        content: raw.type === 'TXT' ? quoteTxt(value) : value,
      });
    });
  });

  return records;
}
