import { describe, it, expect } from 'vitest';
import { UnsupportedProxyTypeError } from '../src/errors.js';
import {
  identityKey,
  mxEntries,
  normalizeCloudflareZone,
  normalizeRoute53Zone,
} from '../src/normalize.js';
import type { ProviderKind, RawRecord, ZoneDefinition } from '../src/types.js';

function zone(records: RawRecord[], providers: ProviderKind[] = ['route53']): ZoneDefinition {
  return {
    zoneName: 'example.com',
    document: 'example.com.yml',
    providers,
    tunnels: new Map(),
    records,
  };
}

function record(overrides: Partial<RawRecord> & Pick<RawRecord, 'name' | 'type'>): RawRecord {
  return {
    ttl: 300,
    payload: { kind: 'values', values: [] },
    proxied: false,
    ...overrides,
  };
}

const mx = record({
  name: 'example.com',
  type: 'MX',
  payload: {
    kind: 'mx',
    entries: [
      { priority: 1, value: 'mx1.example.com' },
      { priority: 5, value: 'mx2.example.com' },
    ],
  },
});

describe('identityKey', () => {
  it('joins zone, name and type', () => {
    expect(identityKey('example.com', 'www', 'A')).toBe('example.com_www_A');
  });

  it('appends a suffix when given', () => {
    expect(identityKey('example.com', 'www', 'A', 0)).toBe('example.com_www_A_0');
    expect(identityKey('example.com', 'www', 'A', 'blue')).toBe('example.com_www_A_blue');
  });
});

describe('mxEntries', () => {
  it('splits pre-encoded values', () => {
    expect(mxEntries({ kind: 'values', values: ['10 mail.example.com'] })).toEqual([
      { priority: 10, value: 'mail.example.com' },
    ]);
  });
});

describe('normalizeRoute53Zone', () => {
  it('renders mx_records as "priority host" values', () => {
    const [set] = normalizeRoute53Zone(zone([mx]));
    expect(set?.values).toEqual(['1 mx1.example.com', '5 mx2.example.com']);
    expect(set?.identityKey).toBe('example.com_example.com_MX');
    expect(set?.fqdn).toBe('example.com');
  });

  it('never emits NS, SOA or TUNNEL records', () => {
    const records = normalizeRoute53Zone(
      zone([
        record({ name: 'example.com', type: 'NS', payload: { kind: 'values', values: ['ns1.foo.com'] } }),
        record({ name: 'example.com', type: 'SOA', payload: { kind: 'values', values: ['x'] } }),
        record({ name: 'app', type: 'TUNNEL', payload: { kind: 'tunnel', name: 'main', service: 'http://x' } }),
        record({ name: 'www', type: 'A', payload: { kind: 'values', values: ['192.0.2.1'] } }),
      ])
    );
    expect(records.map((r) => r.type)).toEqual(['A']);
  });

  it('keys routed records by set identifier', () => {
    const [set] = normalizeRoute53Zone(
      zone([
        record({
          name: 'api',
          type: 'A',
          payload: { kind: 'values', values: ['192.0.2.1'] },
          setIdentifier: 'eu',
          routingPolicy: { type: 'latency', region: 'eu-west-1' },
        }),
      ])
    );
    expect(set).toEqual({
      provider: 'route53',
      identityKey: 'example.com_api_A_eu',
      zoneName: 'example.com',
      name: 'api',
      fqdn: 'api.example.com',
      type: 'A',
      ttl: 300,
      values: ['192.0.2.1'],
      setIdentifier: 'eu',
      routing: { type: 'latency', region: 'eu-west-1' },
      multiValueAnswer: false,
    });
  });

  it('stores TXT values unquoted', () => {
    const [set] = normalizeRoute53Zone(
      zone([record({ name: '_dmarc', type: 'TXT', payload: { kind: 'values', values: ['"v=DMARC1; p=none"'] } })])
    );
    expect(set?.values).toEqual(['v=DMARC1; p=none']);
  });

  it('ignores proxied', () => {
    const [set] = normalizeRoute53Zone(
      zone([record({ name: 'www', type: 'A', ttl: 600, proxied: true, payload: { kind: 'values', values: ['192.0.2.1'] } })])
    );
    expect(set?.ttl).toBe(600);
  });

  it('is idempotent', () => {
    const input = zone([mx, record({ name: 'www', type: 'CNAME', payload: { kind: 'values', values: ['example.com'] } })]);
    expect(normalizeRoute53Zone(input)).toEqual(normalizeRoute53Zone(input));
  });
});

describe('normalizeCloudflareZone', () => {
  it('splits MX entries into one record per value', () => {
    const records = normalizeCloudflareZone(zone([mx], ['cloudflare']));
    expect(records.map((r) => [r.identityKey, r.priority, r.content])).toEqual([
      ['example.com_example.com_MX_0', 1, 'mx1.example.com'],
      ['example.com_example.com_MX_1', 5, 'mx2.example.com'],
    ]);
  });

  it('moves SRV priority into its own field', () => {
    const records = normalizeCloudflareZone(
      zone(
        [record({ name: '_sip._tcp', type: 'SRV', payload: { kind: 'values', values: ['10 5 5060 sip.example.com'] } })],
        ['cloudflare']
      )
    );
    expect(records.map((r) => [r.identityKey, r.priority, r.content])).toEqual([
      ['example.com__sip._tcp_SRV_0', 10, '5 5060 sip.example.com'],
    ]);
  });

  it('quotes TXT values', () => {
    const [txt] = normalizeCloudflareZone(
      zone([record({ name: 'example.com', type: 'TXT', payload: { kind: 'values', values: ['v=spf1 -all'] } })], ['cloudflare'])
    );
    expect(txt?.content).toBe('"v=spf1 -all"');
  });

  it('forces TTL 1 on proxied records', () => {
    const [a] = normalizeCloudflareZone(
      zone(
        [record({ name: 'www', type: 'A', ttl: 300, proxied: true, payload: { kind: 'values', values: ['192.0.2.1'] } })],
        ['cloudflare']
      )
    );
    expect(a).toEqual({
      provider: 'cloudflare',
      identityKey: 'example.com_www_A_0',
      zoneName: 'example.com',
      name: 'www',
      fqdn: 'www.example.com',
      type: 'A',
      ttl: 1,
      content: '192.0.2.1',
      proxied: true,
    });
  });

  it('rejects proxied MX records', () => {
    expect(() => normalizeCloudflareZone(zone([{ ...mx, proxied: true }], ['cloudflare']))).toThrow(
      UnsupportedProxyTypeError
    );
  });

  it('leaves NS, SOA and TUNNEL records out', () => {
    const records = normalizeCloudflareZone(
      zone(
        [
          record({ name: 'example.com', type: 'NS', payload: { kind: 'values', values: ['ns1.foo.com'] } }),
          record({ name: 'app', type: 'TUNNEL', payload: { kind: 'tunnel', name: 'main', service: 'http://x' } }),
        ],
        ['cloudflare']
      )
    );
    expect(records).toEqual([]);
  });

  it('is idempotent', () => {
    const input = zone([mx], ['cloudflare']);
    expect(normalizeCloudflareZone(input)).toEqual(normalizeCloudflareZone(input));
  });
});
