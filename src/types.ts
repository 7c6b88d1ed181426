/** A DNS provider a zone can be hosted at */
export type ProviderKind = 'route53' | 'cloudflare';

/** Record types a zone document may declare */
export type RecordType =
  | 'A'
  | 'AAAA'
  | 'CAA'
  | 'CNAME'
  | 'MX'
  | 'NS'
  | 'PTR'
  | 'SOA'
  | 'SPF'
  | 'SRV'
  | 'TXT'
  | 'TUNNEL';

/** A mail exchanger with explicit priority */
export interface MxEntry {
  priority: number;
  value: string;
}

/** What a record points at, selected by its type */
export type RecordPayload =
  | { kind: 'values'; values: string[] }
  | { kind: 'mx'; entries: MxEntry[] }
  | { kind: 'tunnel'; name: string; service: string };

/** Route 53 routing policy declared on a record */
export type RoutingPolicy =
  | { type: 'weighted'; weight: number }
  | { type: 'latency'; region: string }
  | {
      type: 'geolocation';
      continent?: string;
      country?: string;
      subdivision?: string;
    }
  | { type: 'failover'; role: 'PRIMARY' | 'SECONDARY' }
  | { type: 'multivalue' };

/** A record exactly as declared in a zone document */
export interface RawRecord {
  name: string;
  type: RecordType;
  ttl: number;
  payload: RecordPayload;
  setIdentifier?: string;
  routingPolicy?: RoutingPolicy;
  proxied: boolean;
}

export interface TunnelDef {
  name: string;
  tunnelId: string;
}

/** A validated zone document */
export interface ZoneDefinition {
  zoneName: string;
  /** Document the zone was read from, used in error messages */
  document: string;
  providers: ProviderKind[];
  /** Zone-scoped tunnels; shadow global tunnels of the same name */
  tunnels: ReadonlyMap<string, TunnelDef>;
  records: RawRecord[];
}

/**
 * Routing block attached to a Route 53 record set. Multivalue answers are a
 * flag on the record rather than a block.
 */
export type Route53Routing = Exclude<RoutingPolicy, { type: 'multivalue' }>;

export interface Route53Record {
  provider: 'route53';
  identityKey: string;
  zoneName: string;
  /** Relative name, or the zone name for the apex */
  name: string;
  fqdn: string;
  type: string;
  ttl: number;
  values: string[];
  setIdentifier?: string;
  routing?: Route53Routing;
  multiValueAnswer: boolean;
  /** Only seen on live record sets; documents cannot declare aliases */
  aliasTarget?: { hostedZoneId: string; dnsName: string; evaluateTargetHealth: boolean };
  /** Only seen on live record sets */
  healthCheckId?: string;
}

export interface CloudflareRecord {
  provider: 'cloudflare';
  identityKey: string;
  zoneName: string;
  /** Relative name, or the zone name for the apex */
  name: string;
  fqdn: string;
  type: string;
  ttl: number;
  content: string;
  priority?: number;
  proxied: boolean;
  /** Set on CNAMEs derived from TUNNEL records */
  tunnel?: { name: string; tunnelId: string };
}

/** A record in the engine's canonical, per-provider form */
export type CanonicalRecord = Route53Record | CloudflareRecord;

/** A record read back from a provider, with the provider's own identifier */
export type LiveRecord<R extends CanonicalRecord> = R & { providerId: string };

export type Change<R extends CanonicalRecord> =
  | { action: 'create'; identityKey: string; desired: R }
  | { action: 'update'; identityKey: string; desired: R; live: LiveRecord<R> }
  | { action: 'delete'; identityKey: string; live: LiveRecord<R> };

export interface TunnelIngressRule {
  hostname?: string;
  service: string;
}

/** Where a tunnel-backed hostname routes to */
export interface TunnelRoute {
  tunnelName: string;
  tunnelId: string;
  service: string;
}

/** A non-fatal configuration smell found while compiling documents */
export interface ZoneWarning {
  document: string;
  field?: string;
  message: string;
}
