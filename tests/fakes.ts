import { TransientProviderError } from '../src/errors.js';
import type {
  DnsProvider,
  ProviderZone,
  RegistrarClient,
  RegistrarDomain,
  TunnelConfigClient,
} from '../src/provider.js';
import type {
  CanonicalRecord,
  LiveRecord,
  ProviderKind,
  TunnelIngressRule,
} from '../src/types.js';

/**
 * In-memory stand-ins for the provider clients. Every call is appended to a
 * shared log so tests can assert on ordering across clients.
 */

export class FakeProvider<R extends CanonicalRecord> implements DnsProvider<R> {
  readonly zones = new Map<string, ProviderZone>();
  readonly records = new Map<string, LiveRecord<R>[]>();
  readonly rejected = new Set<string>();
  /** Zone name → read call that keeps timing out for it */
  readonly readFailures = new Map<string, 'findZone' | 'listRecords'>();
  failZoneCreation = false;
  private nextId = 0;

  constructor(
    readonly kind: ProviderKind,
    private readonly log: string[]
  ) {}

  seed(zoneName: string, records: LiveRecord<R>[]): void {
    this.zones.set(zoneName, {
      id: `zone-${zoneName}`,
      name: zoneName,
      nameServers: [`ns1.${this.kind}.test`, `ns2.${this.kind}.test`],
    });
    this.records.set(`zone-${zoneName}`, records);
  }

  async findZone(zoneName: string): Promise<ProviderZone | undefined> {
    this.log.push(`${this.kind} findZone ${zoneName}`);
    this.failRead(zoneName, 'findZone');
    return this.zones.get(zoneName);
  }

  async createZone(zoneName: string): Promise<ProviderZone> {
    this.log.push(`${this.kind} createZone ${zoneName}`);
    if (this.failZoneCreation) throw new Error('zone limit reached');
    const zone = { id: `zone-${zoneName}`, name: zoneName, nameServers: [`ns9.${this.kind}.test`] };
    this.zones.set(zoneName, zone);
    this.records.set(zone.id, []);
    return zone;
  }

  async listRecords(zone: ProviderZone): Promise<LiveRecord<R>[]> {
    this.log.push(`${this.kind} listRecords ${zone.name}`);
    this.failRead(zone.name, 'listRecords');
    return [...(this.records.get(zone.id) ?? [])];
  }

  async createRecord(zone: ProviderZone, record: R): Promise<void> {
    this.log.push(`${this.kind} create ${record.identityKey}`);
    this.reject(record.identityKey);
    this.records.get(zone.id)?.push({ ...record, providerId: `rec-${++this.nextId}` });
  }

  async updateRecord(zone: ProviderZone, live: LiveRecord<R>, record: R): Promise<void> {
    this.log.push(`${this.kind} update ${record.identityKey}`);
    this.reject(record.identityKey);
    const records = this.records.get(zone.id) ?? [];
    this.records.set(
      zone.id,
      records.map((r) => (r.providerId === live.providerId ? { ...record, providerId: live.providerId } : r))
    );
  }

  async deleteRecord(zone: ProviderZone, live: LiveRecord<R>): Promise<void> {
    this.log.push(`${this.kind} delete ${live.identityKey}`);
    this.reject(live.identityKey);
    const records = this.records.get(zone.id) ?? [];
    this.records.set(
      zone.id,
      records.filter((r) => r.providerId !== live.providerId)
    );
  }

  private failRead(zoneName: string, call: 'findZone' | 'listRecords'): void {
    if (this.readFailures.get(zoneName) === call) {
      throw new TransientProviderError(`${this.kind} ${call}: gave up after 3 attempts: Throttling`, 3);
    }
  }

  private reject(key: string): void {
    if (this.rejected.has(key)) {
      throw new Error(`record ${key} rejected`);
    }
  }
}

export class FakeTunnels implements TunnelConfigClient {
  readonly ingress = new Map<string, TunnelIngressRule[]>();
  fail = false;
  failRead = false;

  constructor(private readonly log: string[]) {}

  async getIngress(tunnelId: string): Promise<TunnelIngressRule[]> {
    this.log.push(`getIngress ${tunnelId}`);
    if (this.failRead) throw new Error('tunnel configuration unavailable');
    return this.ingress.get(tunnelId) ?? [];
  }

  async putIngress(tunnelId: string, rules: TunnelIngressRule[]): Promise<void> {
    this.log.push(`putIngress ${tunnelId}`);
    if (this.fail) throw new Error('tunnel not found');
    this.ingress.set(tunnelId, rules);
  }
}

export class FakeRegistrar implements RegistrarClient {
  readonly domains = new Map<string, string[]>();
  /** Domains whose registration cannot be read */
  readonly unreadable = new Set<string>();

  constructor(private readonly log: string[]) {}

  async getDomain(domainName: string): Promise<RegistrarDomain | undefined> {
    this.log.push(`getDomain ${domainName}`);
    if (this.unreadable.has(domainName)) throw new Error('registrar unavailable');
    const nameservers = this.domains.get(domainName);
    return nameservers ? { domainName, nameservers } : undefined;
  }

  async updateNameservers(domainName: string, nameservers: string[]): Promise<void> {
    this.log.push(`updateNameservers ${domainName} ${nameservers.join(',')}`);
    this.domains.set(domainName, nameservers);
  }
}
