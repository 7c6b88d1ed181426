/**
 * Amazon Route 53 adapter
 *
 * Hosted zones and record sets through `@aws-sdk/client-route-53`, domain
 * nameserver delegation through `@aws-sdk/client-route-53-domains`. Both are
 * global services served from us-east-1.
 */

import {
  Route53Client,
  ChangeResourceRecordSetsCommand,
  CreateHostedZoneCommand,
  GetHostedZoneCommand,
  ListHostedZonesByNameCommand,
  ListResourceRecordSetsCommand,
  RRType,
  ResourceRecordSetRegion,
  type Change,
  type ResourceRecordSet,
} from '@aws-sdk/client-route-53';
import {
  Route53DomainsClient,
  GetDomainDetailCommand,
  UpdateDomainNameserversCommand,
  type GetDomainDetailCommandOutput,
} from '@aws-sdk/client-route-53-domains';
import { PROVIDER_MANAGED_TYPES } from '../constants.js';
import { cleanName, relativeName } from '../domain.js';
import { identityKey } from '../normalize.js';
import type {
  ProviderZone,
  RegistrarClient,
  RegistrarDomain,
  Route53Provider,
} from '../provider.js';
import { withRetry, type RetryOptions } from '../retry.js';
import { decodeTxtValue, encodeTxtValue } from '../txt.js';
import type { LiveRecord, Route53Record, Route53Routing } from '../types.js';

export interface Route53Options {
  /** Any region reaches the global Route 53 endpoint; defaults to us-east-1 */
  region?: string;
  credentials?: {
    accessKeyId: string;
    secretAccessKey: string;
    sessionToken?: string;
  };
  retry?: RetryOptions;
  /** Inject a preconfigured client */
  client?: Route53Client;
}

export interface Route53DomainsOptions {
  credentials?: Route53Options['credentials'];
  retry?: RetryOptions;
  client?: Route53DomainsClient;
}

/** Route 53 and its registrar API only live in us-east-1 */
const GLOBAL_REGION = 'us-east-1';

const TRANSFER_LOCK_STATUS = 'clientTransferProhibited';

function absolute(name: string): string {
  return name.endsWith('.') ? name : `${name}.`;
}

function hostedZoneId(id: string): string {
  return id.replace('/hostedzone/', '');
}

function isTxt(type: string): boolean {
  return type === 'TXT' || type === 'SPF';
}

function toRRType(type: string): RRType {
  const match = Object.values(RRType).find((t) => t === type);
  if (!match) {
    throw new Error(`Route 53 does not support ${type} records`);
  }
  return match;
}

function toRegion(region: string): ResourceRecordSetRegion {
  const match = Object.values(ResourceRecordSetRegion).find((r) => r === region);
  if (!match) {
    throw new Error(`"${region}" is not a Route 53 latency region`);
  }
  return match;
}

/**
 * Render a canonical record as a Route 53 resource record set
 */
export function toResourceRecordSet(record: Route53Record): ResourceRecordSet {
  const set: ResourceRecordSet = {
    Name: absolute(record.fqdn),
    Type: toRRType(record.type),
  };

  if (record.aliasTarget) {
    set.AliasTarget = {
      HostedZoneId: record.aliasTarget.hostedZoneId,
      DNSName: record.aliasTarget.dnsName,
      EvaluateTargetHealth: record.aliasTarget.evaluateTargetHealth,
    };
  } else {
    set.TTL = record.ttl;
    set.ResourceRecords = record.values.map((value) => ({
      Value: isTxt(record.type) ? encodeTxtValue(value) : value,
    }));
  }

  if (record.setIdentifier) set.SetIdentifier = record.setIdentifier;
  if (record.healthCheckId) set.HealthCheckId = record.healthCheckId;
  if (record.multiValueAnswer) set.MultiValueAnswer = true;

  const routing = record.routing;
  if (!routing) return set;

  switch (routing.type) {
    case 'weighted':
      set.Weight = routing.weight;
      break;
    case 'latency':
      set.Region = toRegion(routing.region);
      break;
    case 'geolocation':
      set.GeoLocation = {
        ContinentCode: routing.continent,
        CountryCode: routing.country,
        SubdivisionCode: routing.subdivision,
      };
      break;
    case 'failover':
      set.Failover = routing.role;
      break;
  }

  return set;
}

function routingOf(set: ResourceRecordSet): Route53Routing | undefined {
  if (set.Weight !== undefined) return { type: 'weighted', weight: set.Weight };
  if (set.Region) return { type: 'latency', region: set.Region };
  if (set.Failover) return { type: 'failover', role: set.Failover };
  if (set.GeoLocation) {
    const geo: Extract<Route53Routing, { type: 'geolocation' }> = { type: 'geolocation' };
    if (set.GeoLocation.ContinentCode) geo.continent = set.GeoLocation.ContinentCode;
    if (set.GeoLocation.CountryCode) geo.country = set.GeoLocation.CountryCode;
    if (set.GeoLocation.SubdivisionCode) geo.subdivision = set.GeoLocation.SubdivisionCode;
    return geo;
  }
  return undefined;
}

/**
 * Read a Route 53 resource record set back into canonical form. Returns
 * undefined for NS/SOA and for sets without a name or type.
 */
export function fromResourceRecordSet(
  set: ResourceRecordSet,
  zoneName: string
): LiveRecord<Route53Record> | undefined {
  if (!set.Name || !set.Type || PROVIDER_MANAGED_TYPES.has(set.Type)) {
    return undefined;
  }

  const fqdn = cleanName(set.Name);
  const name = relativeName(fqdn, zoneName);
  const type = set.Type;
  const setIdentifier = set.SetIdentifier;

  const record: LiveRecord<Route53Record> = {
    provider: 'route53',
    providerId: setIdentifier ? `${fqdn}_${type}_${setIdentifier}` : `${fqdn}_${type}`,
    identityKey: identityKey(zoneName, name, type, setIdentifier),
    zoneName,
    name,
    fqdn,
    type,
    ttl: set.TTL ?? 0,
    values: (set.ResourceRecords ?? []).flatMap((rr) =>
      rr.Value === undefined ? [] : [isTxt(type) ? decodeTxtValue(rr.Value) : rr.Value]
    ),
    multiValueAnswer: set.MultiValueAnswer ?? false,
  };

  if (setIdentifier) record.setIdentifier = setIdentifier;
  const routing = routingOf(set);
  if (routing) record.routing = routing;
  if (set.HealthCheckId) record.healthCheckId = set.HealthCheckId;
  if (set.AliasTarget?.HostedZoneId && set.AliasTarget.DNSName) {
    record.aliasTarget = {
      hostedZoneId: set.AliasTarget.HostedZoneId,
      dnsName: set.AliasTarget.DNSName,
      evaluateTargetHealth: set.AliasTarget.EvaluateTargetHealth ?? false,
    };
  }
  return record;
}

/**
 * Route 53 DNS adapter
 */
export class Route53Adapter implements Route53Provider {
  readonly kind = 'route53' as const;
  private client: Route53Client;
  private retryOptions: RetryOptions;

  constructor(options: Route53Options = {}) {
    this.retryOptions = options.retry ?? {};
    this.client =
      options.client ??
      new Route53Client({
        region: options.region ?? GLOBAL_REGION,
        credentials: options.credentials,
      });
  }

  private withRetry<T>(fn: () => Promise<T>, label: string): Promise<T> {
    return withRetry(fn, { ...this.retryOptions, label: `route53 ${label}` });
  }

  async findZone(zoneName: string): Promise<ProviderZone | undefined> {
    const dnsName = absolute(cleanName(zoneName));
    const response = await this.withRetry(
      () => this.client.send(new ListHostedZonesByNameCommand({ DNSName: dnsName, MaxItems: 10 })),
      'ListHostedZonesByName'
    );

    const zone = response.HostedZones?.find(
      (z) => z.Name === dnsName && !z.Config?.PrivateZone
    );
    if (!zone?.Id) return undefined;

    const id = hostedZoneId(zone.Id);
    const detail = await this.withRetry(
      () => this.client.send(new GetHostedZoneCommand({ Id: id })),
      'GetHostedZone'
    );
    return {
      id,
      name: cleanName(zoneName),
      nameServers: detail.DelegationSet?.NameServers ?? [],
    };
  }

  async createZone(zoneName: string): Promise<ProviderZone> {
    const name = cleanName(zoneName);
    const response = await this.withRetry(
      () =>
        this.client.send(
          new CreateHostedZoneCommand({
            Name: name,
            CallerReference: `${name}-${Date.now()}`,
            HostedZoneConfig: { Comment: 'Managed by zone-sync', PrivateZone: false },
          })
        ),
      'CreateHostedZone'
    );
    if (!response.HostedZone?.Id) {
      throw new Error(`Route 53 did not return an id for new zone ${name}`);
    }
    return {
      id: hostedZoneId(response.HostedZone.Id),
      name,
      nameServers: response.DelegationSet?.NameServers ?? [],
    };
  }

  async listRecords(zone: ProviderZone): Promise<LiveRecord<Route53Record>[]> {
    const records: LiveRecord<Route53Record>[] = [];
    let startRecordName: string | undefined;
    let startRecordType: RRType | undefined;
    let startRecordIdentifier: string | undefined;

    do {
      const response = await this.withRetry(
        () =>
          this.client.send(
            new ListResourceRecordSetsCommand({
              HostedZoneId: zone.id,
              StartRecordName: startRecordName,
              StartRecordType: startRecordType,
              StartRecordIdentifier: startRecordIdentifier,
              MaxItems: 300,
            })
          ),
        'ListResourceRecordSets'
      );

      for (const set of response.ResourceRecordSets ?? []) {
        const record = fromResourceRecordSet(set, zone.name);
        if (record) records.push(record);
      }

      if (!response.IsTruncated) break;
      startRecordName = response.NextRecordName;
      startRecordType = response.NextRecordType;
      startRecordIdentifier = response.NextRecordIdentifier;
    } while (startRecordName);

    return records;
  }

  createRecord(zone: ProviderZone, record: Route53Record): Promise<void> {
    return this.changeRecords(zone, [
      { Action: 'CREATE', ResourceRecordSet: toResourceRecordSet(record) },
    ]);
  }

  updateRecord(
    zone: ProviderZone,
    live: LiveRecord<Route53Record>,
    record: Route53Record
  ): Promise<void> {
    // Route 53 cannot UPSERT across routing policies or alias/non-alias;
    // swap the set atomically instead.
    const sameShape =
      live.routing?.type === record.routing?.type &&
      live.multiValueAnswer === record.multiValueAnswer &&
      !live.aliasTarget;
    if (sameShape) {
      return this.changeRecords(zone, [
        { Action: 'UPSERT', ResourceRecordSet: toResourceRecordSet(record) },
      ]);
    }
    return this.changeRecords(zone, [
      { Action: 'DELETE', ResourceRecordSet: toResourceRecordSet(live) },
      { Action: 'CREATE', ResourceRecordSet: toResourceRecordSet(record) },
    ]);
  }

  deleteRecord(zone: ProviderZone, live: LiveRecord<Route53Record>): Promise<void> {
    return this.changeRecords(zone, [
      { Action: 'DELETE', ResourceRecordSet: toResourceRecordSet(live) },
    ]);
  }

  private async changeRecords(zone: ProviderZone, changes: Change[]): Promise<void> {
    await this.withRetry(
      () =>
        this.client.send(
          new ChangeResourceRecordSetsCommand({
            HostedZoneId: zone.id,
            ChangeBatch: { Changes: changes },
          })
        ),
      'ChangeResourceRecordSets'
    );
  }
}

/**
 * Route 53 Domains registrar adapter. Reads registration details; only ever
 * writes nameservers.
 */
export class Route53Registrar implements RegistrarClient {
  private client: Route53DomainsClient;
  private retryOptions: RetryOptions;

  constructor(options: Route53DomainsOptions = {}) {
    this.retryOptions = options.retry ?? {};
    this.client =
      options.client ??
      new Route53DomainsClient({
        region: GLOBAL_REGION,
        credentials: options.credentials,
      });
  }

  private async fetchDetail(domainName: string): Promise<GetDomainDetailCommandOutput | undefined> {
    try {
      return await withRetry(
        () => this.client.send(new GetDomainDetailCommand({ DomainName: domainName })),
        { ...this.retryOptions, label: 'route53domains GetDomainDetail' }
      );
    } catch (err) {
      // Domains registered elsewhere come back as invalid input
      if (err instanceof Error && (err.name === 'InvalidInput' || err.name === 'UnsupportedTLD')) {
        return undefined;
      }
      throw err;
    }
  }

  async getDomain(domainName: string): Promise<RegistrarDomain | undefined> {
    const detail = await this.fetchDetail(domainName);
    if (!detail) return undefined;

    return {
      domainName,
      nameservers: (detail.Nameservers ?? []).flatMap((ns) => (ns.Name ? [ns.Name] : [])),
      autoRenew: detail.AutoRenew,
      transferLock: detail.StatusList?.includes(TRANSFER_LOCK_STATUS) ?? false,
      privacy: {
        admin: detail.AdminPrivacy,
        registrant: detail.RegistrantPrivacy,
        tech: detail.TechPrivacy,
      },
      registrantContact: {
        organization: detail.RegistrantContact?.OrganizationName,
        email: detail.RegistrantContact?.Email,
      },
    };
  }

  async updateNameservers(domainName: string, nameservers: string[]): Promise<void> {
    await withRetry(
      () =>
        this.client.send(
          new UpdateDomainNameserversCommand({
            DomainName: domainName,
            Nameservers: nameservers.map((name) => ({ Name: name.replace(/\.$/, '') })),
          })
        ),
      { ...this.retryOptions, label: 'route53domains UpdateDomainNameservers' }
    );
  }
}
