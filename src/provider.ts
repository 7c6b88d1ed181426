import type {
  CloudflareRecord,
  LiveRecord,
  ProviderKind,
  Route53Record,
  TunnelIngressRule,
} from './types.js';

/** A hosted zone as the provider knows it */
export interface ProviderZone {
  id: string;
  name: string;
  nameServers: string[];
}

/**
 * Adapter for one DNS provider. Records go in and come out in the engine's
 * canonical form; `listRecords` never returns NS or SOA records.
 */
export interface DnsProvider<R extends Route53Record | CloudflareRecord> {
  readonly kind: ProviderKind;
  /** Find the zone by name; undefined when the provider does not host it */
  findZone(zoneName: string): Promise<ProviderZone | undefined>;
  createZone(zoneName: string): Promise<ProviderZone>;
  listRecords(zone: ProviderZone): Promise<LiveRecord<R>[]>;
  createRecord(zone: ProviderZone, record: R): Promise<void>;
  /** Replace a live record's value with the desired one */
  updateRecord(zone: ProviderZone, live: LiveRecord<R>, record: R): Promise<void>;
  deleteRecord(zone: ProviderZone, live: LiveRecord<R>): Promise<void>;
}

export type Route53Provider = DnsProvider<Route53Record>;
export type CloudflareProvider = DnsProvider<CloudflareRecord>;

/** Cloudflare tunnel ingress configuration */
export interface TunnelConfigClient {
  getIngress(tunnelId: string): Promise<TunnelIngressRule[]>;
  putIngress(tunnelId: string, rules: TunnelIngressRule[]): Promise<void>;
}

/** Registration details read from the registrar; only nameservers are ever written */
export interface RegistrarDomain {
  domainName: string;
  nameservers: string[];
  autoRenew?: boolean;
  transferLock?: boolean;
  privacy?: { admin?: boolean; registrant?: boolean; tech?: boolean };
  registrantContact?: { organization?: string; email?: string };
}

export interface RegistrarClient {
  /** Undefined when the domain is not registered with this registrar */
  getDomain(domainName: string): Promise<RegistrarDomain | undefined>;
  updateNameservers(domainName: string, nameservers: string[]): Promise<void>;
}
