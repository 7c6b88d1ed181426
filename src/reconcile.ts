/**
 * Zone reconciliation
 *
 * Compiles zone documents into per-provider desired state, reads live state
 * from each provider and computes the change sets that make live state match.
 * Nothing is written until `applyPlan`; any configuration error surfaces
 * before the first provider call. A provider that cannot be read for one
 * zone, tunnel or domain fails only that item.
 */

import {
  assignCloudflareLiveKeys,
  cloudflareRecordsEqual,
  diffRecords,
  externalDnsOwnedNames,
  isExternalDnsRecord,
  route53RecordsEqual,
} from './diff.js';
import { InvalidFieldError, ProviderApplyError } from './errors.js';
import { getComponentLogger, silentLogger, type Logger } from './logger.js';
import { normalizeCloudflareZone, normalizeRoute53Zone } from './normalize.js';
import { partitionZones } from './partition.js';
import type {
  CloudflareProvider,
  DnsProvider,
  ProviderZone,
  RegistrarClient,
  Route53Provider,
  TunnelConfigClient,
} from './provider.js';
import {
  findApexNameservers,
  syncRegistrarNameservers,
  type RegistrarSyncResult,
} from './registrar.js';
import {
  buildZoneRegistry,
  parseTunnelRegistry,
  type RegistryOptions,
  type ZoneSource,
} from './registry.js';
import { routeTunnels, type TunnelRouting } from './tunnels.js';
import type {
  CanonicalRecord,
  Change,
  CloudflareRecord,
  LiveRecord,
  ProviderKind,
  Route53Record,
  TunnelIngressRule,
  TunnelRoute,
  ZoneDefinition,
  ZoneWarning,
} from './types.js';

export interface ReconcileClients {
  route53?: Route53Provider;
  cloudflare?: CloudflareProvider;
  tunnels?: TunnelConfigClient;
  registrar?: RegistrarClient;
}

export interface CompileInput {
  sources: ZoneSource[];
  /** The global tunnel registry document */
  tunnelRegistry?: ZoneSource;
  registry?: RegistryOptions;
}

export interface DesiredZone<R extends CanonicalRecord> {
  zone: ZoneDefinition;
  records: R[];
}

export interface DesiredState {
  zones: ReadonlyMap<string, ZoneDefinition>;
  route53: DesiredZone<Route53Record>[];
  cloudflare: DesiredZone<CloudflareRecord>[];
  tunnels: TunnelRouting;
  warnings: ZoneWarning[];
}

export interface PlanInput extends CompileInput {
  clients: ReconcileClients;
  /** Keep records owned by an external-dns controller out of Cloudflare deletes */
  preserveExternalDns?: boolean;
  concurrency?: number;
  logger?: Logger;
}

export interface ZonePlan<R extends CanonicalRecord> {
  provider: ProviderKind;
  zoneName: string;
  /** The provider's zone; undefined when it has to be created first */
  zone?: ProviderZone;
  changes: Change<R>[];
  /** Why live state could not be read; the zone is skipped on apply */
  error?: unknown;
}

export interface TunnelPlan {
  tunnelId: string;
  tunnelNames: string[];
  current: TunnelIngressRule[];
  desired: TunnelIngressRule[];
  changed: boolean;
  /** Why the current ingress could not be read */
  error?: unknown;
}

export interface RegistrarPlan {
  zone: ZoneDefinition;
  /** Undefined when the registration could not be read */
  sync?: RegistrarSyncResult;
  error?: unknown;
}

export interface ReconciliationPlan {
  route53: ZonePlan<Route53Record>[];
  cloudflare: ZonePlan<CloudflareRecord>[];
  tunnels: TunnelPlan[];
  registrar: RegistrarPlan[];
  routes: ReadonlyMap<string, TunnelRoute>;
  warnings: ZoneWarning[];
}

export interface ApplyOptions {
  clients: ReconcileClients;
  concurrency?: number;
  logger?: Logger;
}

export interface ReconciliationOutputs {
  /** Zone name → nameservers the provider assigned, per provider */
  nameservers: Record<ProviderKind, Record<string, string[]>>;
  /** Domain → nameservers configured at the registrar */
  registrarNameservers: Record<string, string[]>;
  /** Tunnel hostname → tunnel it routes through */
  tunnelRoutes: Record<string, TunnelRoute>;
}

export interface ApplyResult {
  /** Operations the providers accepted */
  applied: number;
  errors: ProviderApplyError[];
  failed: boolean;
  outputs: ReconciliationOutputs;
}

const DEFAULT_CONCURRENCY = 4;

/**
 * Validate and compile every document into per-provider desired records.
 *
 * Throws the first ConfigurationError found.
 */
export function compileDesiredState(input: CompileInput): DesiredState {
  const { zones, warnings } = buildZoneRegistry(input.sources, input.registry);
  const globalTunnels = parseTunnelRegistry(
    input.tunnelRegistry?.content,
    input.tunnelRegistry?.document ?? 'tunnels.yml'
  );

  const partition = partitionZones(zones.values());
  const tunnels = routeTunnels(partition.cloudflare, globalTunnels);

  const route53 = partition.route53.map((zone) => ({
    zone,
    records: unique(zone, normalizeRoute53Zone(zone)),
  }));
  const cloudflare = partition.cloudflare.map((zone) => ({
    zone,
    records: unique(zone, [
      ...normalizeCloudflareZone(zone),
      ...(tunnels.records.get(zone.zoneName) ?? []),
    ]),
  }));

  return { zones, route53, cloudflare, tunnels, warnings };
}

function unique<R extends CanonicalRecord>(zone: ZoneDefinition, records: R[]): R[] {
  const seen = new Set<string>();
  for (const record of records) {
    if (seen.has(record.identityKey)) {
      throw new InvalidFieldError(
        zone.document,
        'records',
        `${record.type} record "${record.name}" is declared more than once (${record.identityKey})`
      );
    }
    seen.add(record.identityKey);
  }
  return records;
}

/**
 * Run `fn` over `items` with at most `limit` calls in flight. Results keep
 * the input order.
 */
export async function mapWithConcurrency<T, U>(
  items: readonly T[],
  limit: number,
  fn: (item: T) => Promise<U>
): Promise<U[]> {
  const results: U[] = new Array<U>(items.length);
  let next = 0;

  async function worker(): Promise<void> {
    while (next < items.length) {
      const index = next++;
      const item = items[index];
      if (item === undefined) continue;
      results[index] = await fn(item);
    }
  }

  const workers = Array.from({ length: Math.max(1, Math.min(limit, items.length)) }, worker);
  await Promise.all(workers);
  return results;
}

function requireClient<T>(client: T | undefined, name: string, needed: number): T {
  if (!client) {
    throw new Error(`${name} is not configured but ${needed} zone(s) need it`);
  }
  return client;
}

function sameIngress(a: TunnelIngressRule[], b: TunnelIngressRule[]): boolean {
  return (
    a.length === b.length &&
    a.every((rule, i) => rule.hostname === b[i]?.hostname && rule.service === b[i]?.service)
  );
}

/**
 * Compute everything a run would change, without changing anything.
 */
export async function planReconciliation(input: PlanInput): Promise<ReconciliationPlan> {
  const logger = getComponentLogger(input.logger ?? silentLogger(), 'reconciler');
  const concurrency = input.concurrency ?? DEFAULT_CONCURRENCY;
  const desired = compileDesiredState(input);

  for (const warning of desired.warnings) {
    logger.warn(warning.message, { document: warning.document, field: warning.field });
  }

  const plan: ReconciliationPlan = {
    route53: [],
    cloudflare: [],
    tunnels: [],
    registrar: [],
    routes: desired.tunnels.routes,
    warnings: desired.warnings,
  };

  if (desired.route53.length > 0) {
    const route53 = requireClient(input.clients.route53, 'route53', desired.route53.length);
    plan.route53 = await mapWithConcurrency(desired.route53, concurrency, ({ zone, records }) =>
      planZone(route53, zone, records, {
        equals: route53RecordsEqual,
        logger,
      })
    );

    const delegated = desired.route53.filter(({ zone }) => findApexNameservers(zone).length > 0);
    for (const { zone } of delegated) {
      const registrar = requireClient(input.clients.registrar, 'registrar', delegated.length);
      try {
        const sync = await syncRegistrarNameservers(zone, registrar, { dryRun: true, logger });
        if (sync) plan.registrar.push({ zone, sync });
      } catch (err) {
        logger.error('Could not read registration', err, { domain: zone.zoneName });
        plan.registrar.push({ zone, error: err });
      }
    }
  }

  if (desired.cloudflare.length > 0) {
    const cloudflare = requireClient(input.clients.cloudflare, 'cloudflare', desired.cloudflare.length);
    plan.cloudflare = await mapWithConcurrency(desired.cloudflare, concurrency, ({ zone, records }) =>
      planZone(cloudflare, zone, records, {
        equals: cloudflareRecordsEqual,
        assignKeys: assignCloudflareLiveKeys,
        preserveExternalDns: input.preserveExternalDns ?? false,
        logger,
      })
    );
  }

  if (desired.tunnels.ingress.size > 0) {
    const tunnels = requireClient(input.clients.tunnels, 'cloudflare tunnel configuration', desired.tunnels.ingress.size);
    for (const ingress of desired.tunnels.ingress.values()) {
      const tunnel: TunnelPlan = {
        tunnelId: ingress.tunnelId,
        tunnelNames: ingress.tunnelNames,
        current: [],
        desired: ingress.rules,
        changed: false,
      };
      try {
        tunnel.current = await tunnels.getIngress(ingress.tunnelId);
        tunnel.changed = !sameIngress(tunnel.current, ingress.rules);
      } catch (err) {
        logger.error('Could not read tunnel ingress', err, { tunnelId: ingress.tunnelId });
        tunnel.error = err;
      }
      plan.tunnels.push(tunnel);
    }
  }

  return plan;
}

interface PlanZoneOptions<R extends CanonicalRecord> {
  equals(desired: R, live: R): boolean;
  assignKeys?(desired: R[], live: LiveRecord<R>[]): LiveRecord<R>[];
  preserveExternalDns?: boolean;
  logger: Logger;
}

async function planZone<R extends CanonicalRecord>(
  provider: DnsProvider<R>,
  zone: ZoneDefinition,
  desired: R[],
  options: PlanZoneOptions<R>
): Promise<ZonePlan<R>> {
  let existing: ProviderZone | undefined;
  let fetched: LiveRecord<R>[] = [];
  try {
    existing = await provider.findZone(zone.zoneName);
    fetched = existing ? await provider.listRecords(existing) : [];
  } catch (err) {
    options.logger.error('Could not read live state', err, {
      provider: provider.kind,
      zone: zone.zoneName,
    });
    return { provider: provider.kind, zoneName: zone.zoneName, changes: [], error: err };
  }
  const live = options.assignKeys ? options.assignKeys(desired, fetched) : fetched;

  let protect: ((record: R) => boolean) | undefined;
  if (options.preserveExternalDns) {
    const owned = externalDnsOwnedNames(
      live.flatMap((record) => (isCloudflareRecord(record) ? [record] : []))
    );
    protect = (record) => isCloudflareRecord(record) && isExternalDnsRecord(record, owned);
  }

  const changes = diffRecords(desired, live, {
    declared: true,
    equals: options.equals,
    protect,
  });

  options.logger.debug('Planned zone', {
    provider: provider.kind,
    zone: zone.zoneName,
    exists: existing !== undefined,
    changes: changes.length,
  });

  const plan: ZonePlan<R> = { provider: provider.kind, zoneName: zone.zoneName, changes };
  if (existing) plan.zone = existing;
  return plan;
}

function isCloudflareRecord(record: CanonicalRecord): record is CloudflareRecord {
  return record.provider === 'cloudflare';
}

/** Number of create, update and delete operations in the plan */
export function countChanges(plan: ReconciliationPlan): {
  create: number;
  update: number;
  delete: number;
} {
  const counts = { create: 0, update: 0, delete: 0 };
  for (const zone of [...plan.route53, ...plan.cloudflare]) {
    for (const change of zone.changes) {
      counts[change.action]++;
    }
  }
  return counts;
}

/**
 * Outputs as they would look once the plan is applied. Zones still to be
 * created have no nameservers yet; zones and domains that could not be read
 * are left out.
 */
export function planOutputs(plan: ReconciliationPlan): ReconciliationOutputs {
  const outputs: ReconciliationOutputs = {
    nameservers: { route53: {}, cloudflare: {} },
    registrarNameservers: {},
    tunnelRoutes: Object.fromEntries(plan.routes),
  };
  for (const zone of [...plan.route53, ...plan.cloudflare]) {
    if (zone.error !== undefined) continue;
    outputs.nameservers[zone.provider][zone.zoneName] = zone.zone?.nameServers ?? [];
  }
  for (const { sync } of plan.registrar) {
    if (!sync) continue;
    outputs.registrarNameservers[sync.domainName] = sync.current ? sync.declared : [];
  }
  return outputs;
}

/**
 * Apply a plan: missing zones are created, then tunnel ingress is
 * configured, then each zone's deletes, updates and creates run in that
 * order, and finally registrar nameservers are updated.
 *
 * A rejected operation is recorded as a ProviderApplyError and the rest of
 * the run continues, as is every zone, tunnel or domain the plan could not
 * read. Zone-level failures use the zone name as identity key; tunnel
 * failures use `tunnel_<id>` and the tunnel names in place of a zone.
 */
export async function applyPlan(
  plan: ReconciliationPlan,
  options: ApplyOptions
): Promise<ApplyResult> {
  const logger = getComponentLogger(options.logger ?? silentLogger(), 'reconciler');
  const concurrency = options.concurrency ?? DEFAULT_CONCURRENCY;
  const errors: ProviderApplyError[] = [];
  const outputs = planOutputs(plan);
  let applied = 0;

  const fail = (provider: ProviderKind, zoneName: string, key: string, err: unknown) => {
    const error = new ProviderApplyError(provider, zoneName, key, err);
    logger.error('Provider operation failed', err, {
      provider,
      zone: zoneName,
      identityKey: key,
    });
    errors.push(error);
  };

  // Zones
  const route53 = plan.route53.length > 0
    ? requireClient(options.clients.route53, 'route53', plan.route53.length)
    : undefined;
  const cloudflare = plan.cloudflare.length > 0
    ? requireClient(options.clients.cloudflare, 'cloudflare', plan.cloudflare.length)
    : undefined;

  const route53Zones = route53
    ? await mapWithConcurrency(plan.route53, concurrency, (zonePlan) => ensureZone(route53, zonePlan))
    : [];
  const cloudflareZones = cloudflare
    ? await mapWithConcurrency(plan.cloudflare, concurrency, (zonePlan) => ensureZone(cloudflare, zonePlan))
    : [];

  for (const [provider, ensured] of [
    ['route53', route53Zones],
    ['cloudflare', cloudflareZones],
  ] as const) {
    for (const result of ensured) {
      if (result.zone) {
        outputs.nameservers[provider][result.zoneName] = result.zone.nameServers;
        if (result.created) applied++;
      } else {
        fail(provider, result.zoneName, result.zoneName, result.error);
      }
    }
  }

  // Tunnel ingress, before the CNAMEs that point at the tunnels
  const failedTunnels = new Set<string>();
  for (const tunnel of plan.tunnels) {
    if (tunnel.error === undefined) continue;
    failedTunnels.add(tunnel.tunnelId);
    fail('cloudflare', tunnel.tunnelNames.join(','), `tunnel_${tunnel.tunnelId}`, tunnel.error);
  }
  const changedTunnels = plan.tunnels.filter((tunnel) => tunnel.changed);
  if (changedTunnels.length > 0) {
    const tunnels = requireClient(options.clients.tunnels, 'cloudflare tunnel configuration', changedTunnels.length);
    for (const tunnel of changedTunnels) {
      try {
        await tunnels.putIngress(tunnel.tunnelId, tunnel.desired);
        logger.info('Updated tunnel ingress', {
          tunnelId: tunnel.tunnelId,
          rules: tunnel.desired.length,
        });
        applied++;
      } catch (err) {
        failedTunnels.add(tunnel.tunnelId);
        fail('cloudflare', tunnel.tunnelNames.join(','), `tunnel_${tunnel.tunnelId}`, err);
      }
    }
  }

  // Records
  const counts = await Promise.all([
    mapWithConcurrency(zip(plan.route53, route53Zones), concurrency, ([zonePlan, ensured]) =>
      route53 && ensured.zone
        ? applyZoneChanges(route53, ensured.zone, zonePlan, { logger, fail })
        : Promise.resolve(0)
    ),
    mapWithConcurrency(zip(plan.cloudflare, cloudflareZones), concurrency, ([zonePlan, ensured]) =>
      cloudflare && ensured.zone
        ? applyZoneChanges(cloudflare, ensured.zone, zonePlan, { logger, fail, failedTunnels })
        : Promise.resolve(0)
    ),
  ]);
  applied += counts.flat().reduce((sum, n) => sum + n, 0);

  // Registrar delegation
  const pending: { zone: ZoneDefinition; sync: RegistrarSyncResult }[] = [];
  for (const { zone, sync, error } of plan.registrar) {
    if (!sync) {
      fail('route53', zone.zoneName, zone.zoneName, error);
    } else if (sync.changed) {
      pending.push({ zone, sync });
    }
  }
  if (pending.length > 0) {
    const registrar = requireClient(options.clients.registrar, 'registrar', pending.length);
    for (const { zone, sync } of pending) {
      try {
        await syncRegistrarNameservers(zone, registrar, { logger });
        applied++;
      } catch (err) {
        outputs.registrarNameservers[sync.domainName] = sync.current ?? [];
        fail('route53', zone.zoneName, zone.zoneName, err);
      }
    }
  }

  const result: ApplyResult = { applied, errors, failed: errors.length > 0, outputs };
  logger.info('Reconciliation finished', { applied, failed: errors.length });
  return result;
}

interface EnsuredZone {
  zoneName: string;
  zone?: ProviderZone;
  created: boolean;
  error?: unknown;
}

async function ensureZone<R extends CanonicalRecord>(
  provider: DnsProvider<R>,
  plan: ZonePlan<R>
): Promise<EnsuredZone> {
  if (plan.error !== undefined) {
    return { zoneName: plan.zoneName, created: false, error: plan.error };
  }
  if (plan.zone) {
    return { zoneName: plan.zoneName, zone: plan.zone, created: false };
  }
  try {
    const zone = await provider.createZone(plan.zoneName);
    return { zoneName: plan.zoneName, zone, created: true };
  } catch (err) {
    return { zoneName: plan.zoneName, created: false, error: err };
  }
}

function zip<A, B>(left: readonly A[], right: readonly B[]): [A, B][] {
  const pairs: [A, B][] = [];
  left.forEach((item, i) => {
    const other = right[i];
    if (other !== undefined) pairs.push([item, other]);
  });
  return pairs;
}

interface ApplyZoneContext {
  logger: Logger;
  fail(provider: ProviderKind, zoneName: string, key: string, err: unknown): void;
  failedTunnels?: ReadonlySet<string>;
}

async function applyZoneChanges<R extends CanonicalRecord>(
  provider: DnsProvider<R>,
  zone: ProviderZone,
  plan: ZonePlan<R>,
  context: ApplyZoneContext
): Promise<number> {
  let applied = 0;

  for (const change of plan.changes) {
    if (change.action !== 'delete') {
      const tunnel = isCloudflareRecord(change.desired) ? change.desired.tunnel : undefined;
      if (tunnel && context.failedTunnels?.has(tunnel.tunnelId)) {
        context.fail(
          provider.kind,
          plan.zoneName,
          change.identityKey,
          new Error(`ingress for tunnel "${tunnel.name}" was not updated`)
        );
        continue;
      }
    }

    try {
      switch (change.action) {
        case 'delete':
          await provider.deleteRecord(zone, change.live);
          break;
        case 'update':
          await provider.updateRecord(zone, change.live, change.desired);
          break;
        case 'create':
          await provider.createRecord(zone, change.desired);
          break;
      }
      context.logger.info('Applied record change', {
        action: change.action,
        provider: provider.kind,
        zone: plan.zoneName,
        identityKey: change.identityKey,
      });
      applied++;
    } catch (err) {
      context.fail(provider.kind, plan.zoneName, change.identityKey, err);
    }
  }

  return applied;
}
