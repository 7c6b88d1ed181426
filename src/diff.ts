import { EXTERNAL_DNS_OWNER_PREFIX, PROVIDER_MANAGED_TYPES } from './constants.js';
import { identityKey } from './normalize.js';
import type {
  CanonicalRecord,
  Change,
  CloudflareRecord,
  LiveRecord,
  Route53Record,
} from './types.js';

export interface DiffOptions<R extends CanonicalRecord> {
  /** Whether a declaration document exists for the zone; undeclared zones are never touched */
  declared: boolean;
  equals(desired: R, live: LiveRecord<R>): boolean;
  /** Live records matching this are never deleted */
  protect?(live: LiveRecord<R>): boolean;
}

/**
 * Compute the change set that makes `live` match `desired`, joined by
 * identity key.
 *
 * Deletes come first (in live order), then updates and creates (in desired
 * order). NS and SOA records are ignored on both sides.
 */
export function diffRecords<R extends CanonicalRecord>(
  desired: readonly R[],
  live: readonly LiveRecord<R>[],
  options: DiffOptions<R>
): Change<R>[] {
  if (!options.declared) return [];

  const wanted = new Map<string, R>();
  for (const record of desired) {
    if (PROVIDER_MANAGED_TYPES.has(record.type)) continue;
    wanted.set(record.identityKey, record);
  }

  const current = new Map<string, LiveRecord<R>>();
  for (const record of live) {
    if (PROVIDER_MANAGED_TYPES.has(record.type)) continue;
    current.set(record.identityKey, record);
  }

  const deletes: Change<R>[] = [];
  const updates: Change<R>[] = [];
  const creates: Change<R>[] = [];

  for (const [key, record] of current) {
    if (wanted.has(key)) continue;
    if (options.protect?.(record)) continue;
    deletes.push({ action: 'delete', identityKey: key, live: record });
  }

  for (const [key, record] of wanted) {
    const existing = current.get(key);
    if (!existing) {
      creates.push({ action: 'create', identityKey: key, desired: record });
    } else if (!options.equals(record, existing)) {
      updates.push({ action: 'update', identityKey: key, desired: record, live: existing });
    }
  }

  return [...deletes, ...updates, ...creates];
}

/** Hostnames and targets compare without a trailing dot; TXT data is taken literally */
function comparable(type: string, value: string): string {
  if (type === 'TXT' || type === 'SPF') return value;
  return value.endsWith('.') ? value.slice(0, -1) : value;
}

function sameRouting(a: Route53Record['routing'], b: Route53Record['routing']): boolean {
  if (!a || !b) return a === b;
  switch (a.type) {
    case 'weighted':
      return b.type === 'weighted' && a.weight === b.weight;
    case 'latency':
      return b.type === 'latency' && a.region === b.region;
    case 'failover':
      return b.type === 'failover' && a.role === b.role;
    case 'geolocation':
      return (
        b.type === 'geolocation' &&
        a.continent === b.continent &&
        a.country === b.country &&
        a.subdivision === b.subdivision
      );
  }
}

export function route53RecordsEqual(desired: Route53Record, live: Route53Record): boolean {
  if (live.aliasTarget) return false;
  const left = desired.values.map((v) => comparable(desired.type, v)).sort();
  const right = live.values.map((v) => comparable(live.type, v)).sort();
  return (
    desired.ttl === live.ttl &&
    left.length === right.length &&
    left.every((value, i) => value === right[i]) &&
    desired.setIdentifier === live.setIdentifier &&
    desired.multiValueAnswer === live.multiValueAnswer &&
    sameRouting(desired.routing, live.routing)
  );
}

export function cloudflareRecordsEqual(desired: CloudflareRecord, live: CloudflareRecord): boolean {
  return (
    sameContent(desired, live) &&
    desired.ttl === live.ttl &&
    desired.proxied === live.proxied
  );
}

function sameContent(a: CloudflareRecord, b: CloudflareRecord): boolean {
  return comparable(a.type, a.content) === comparable(b.type, b.content) && a.priority === b.priority;
}

/**
 * Give live Cloudflare records the identity keys of the desired records they
 * correspond to. Cloudflare has no notion of a value index, so per name and
 * type:
 *
 * 1. a live record with the same content as a desired one takes its key;
 * 2. the remaining live records take the remaining desired keys in index
 *    order, and will be updated;
 * 3. whatever is left gets a `_live_<id>` key, and will be deleted.
 */
export function assignCloudflareLiveKeys(
  desired: readonly CloudflareRecord[],
  live: readonly LiveRecord<CloudflareRecord>[]
): LiveRecord<CloudflareRecord>[] {
  const desiredGroups = new Map<string, CloudflareRecord[]>();
  for (const record of desired) {
    const group = identityKey(record.zoneName, record.name, record.type);
    const members = desiredGroups.get(group) ?? [];
    members.push(record);
    desiredGroups.set(group, members);
  }

  const assigned = new Map<LiveRecord<CloudflareRecord>, string>();
  const liveGroups = new Map<string, LiveRecord<CloudflareRecord>[]>();
  for (const record of live) {
    const group = identityKey(record.zoneName, record.name, record.type);
    const members = liveGroups.get(group) ?? [];
    members.push(record);
    liveGroups.set(group, members);
  }

  for (const [group, liveMembers] of liveGroups) {
    const open = [...(desiredGroups.get(group) ?? [])];

    const unmatched: LiveRecord<CloudflareRecord>[] = [];
    for (const record of liveMembers) {
      const index = open.findIndex((candidate) => sameContent(candidate, record));
      const match = open[index];
      if (match) {
        assigned.set(record, match.identityKey);
        open.splice(index, 1);
      } else {
        unmatched.push(record);
      }
    }

    for (const record of unmatched) {
      const next = open.shift();
      assigned.set(record, next ? next.identityKey : `${group}_live_${record.providerId}`);
    }
  }

  return live.map((record) => ({
    ...record,
    identityKey: assigned.get(record) ?? record.identityKey,
  }));
}

/**
 * Hostnames an external-dns controller claims through its `_external-dns-`
 * TXT ownership records.
 */
export function externalDnsOwnedNames(live: readonly CloudflareRecord[]): Set<string> {
  const owned = new Set<string>();
  for (const record of live) {
    if (record.type === 'TXT' && record.fqdn.startsWith(EXTERNAL_DNS_OWNER_PREFIX)) {
      owned.add(record.fqdn.slice(EXTERNAL_DNS_OWNER_PREFIX.length));
    }
  }
  return owned;
}

/** Whether a live record belongs to an external-dns controller */
export function isExternalDnsRecord(record: CloudflareRecord, owned: ReadonlySet<string>): boolean {
  if (record.type === 'TXT' && record.fqdn.startsWith(EXTERNAL_DNS_OWNER_PREFIX)) return true;
  return owned.has(record.fqdn);
}
