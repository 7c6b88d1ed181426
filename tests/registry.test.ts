import { describe, it, expect } from 'vitest';
import {
  DuplicateZoneError,
  InvalidFieldError,
  MissingFieldError,
} from '../src/errors.js';
import {
  buildZoneRegistry,
  parseTunnelRegistry,
  parseZoneDocument,
  validateDocuments,
} from '../src/registry.js';

function doc(overrides: Record<string, unknown> = {}) {
  return {
    zone_name: 'example.com',
    provider: 'route53',
    records: [{ name: 'www', type: 'A', values: ['192.0.2.1'] }],
    ...overrides,
  };
}

describe('parseZoneDocument', () => {
  it('compiles a minimal document', () => {
    const { zone, warnings } = parseZoneDocument(doc(), 'zones/example.com.yml');

    expect(zone).toEqual({
      zoneName: 'example.com',
      document: 'zones/example.com.yml',
      providers: ['route53'],
      tunnels: new Map(),
      records: [
        {
          name: 'www',
          type: 'A',
          ttl: 300,
          payload: { kind: 'values', values: ['192.0.2.1'] },
          proxied: false,
        },
      ],
    });
    expect(warnings).toEqual([]);
  });

  it('uses the plural providers field verbatim, without duplicates', () => {
    const { zone } = parseZoneDocument(
      doc({ provider: undefined, providers: ['cloudflare', 'route53', 'cloudflare'] }),
      'example.com.yml'
    );
    expect(zone.providers).toEqual(['cloudflare', 'route53']);
  });

  it('rejects both provider and providers', () => {
    expect(() =>
      parseZoneDocument(doc({ providers: ['cloudflare'] }), 'example.com.yml')
    ).toThrow(new InvalidFieldError('example.com.yml', 'providers', 'cannot be combined with "provider"; use one or the other'));
  });

  it('rejects neither provider nor providers', () => {
    expect(() => parseZoneDocument(doc({ provider: undefined }), 'example.com.yml')).toThrow(
      MissingFieldError
    );
  });

  it('falls back to the default provider when one is configured', () => {
    const { zone } = parseZoneDocument(doc({ provider: undefined }), 'example.com.yml', {
      defaultProvider: 'cloudflare',
    });
    expect(zone.providers).toEqual(['cloudflare']);
  });

  it('names the document and field of a missing value', () => {
    expect(() =>
      parseZoneDocument(doc({ records: [{ type: 'A', values: ['192.0.2.1'] }] }), 'example.com.yml')
    ).toThrow('example.com.yml: records[0].name: is required');
  });

  it('rejects an unknown provider', () => {
    expect(() => parseZoneDocument(doc({ provider: 'bind' }), 'example.com.yml')).toThrow(
      InvalidFieldError
    );
  });

  it('rejects a document that is not a mapping', () => {
    expect(() => parseZoneDocument(['a'], 'example.com.yml')).toThrow(
      'example.com.yml: zone document must be a mapping'
    );
  });

  it('rejects an unrecognized routing policy type', () => {
    const records = [
      {
        name: 'www',
        type: 'A',
        values: ['192.0.2.1'],
        set_identifier: 'a',
        routing_policy: { type: 'weighed', weight: 10 },
      },
    ];
    expect(() => parseZoneDocument(doc({ records }), 'example.com.yml')).toThrow(InvalidFieldError);
  });

  it('normalizes record type and failover role case', () => {
    const records = [
      {
        name: 'www',
        type: 'a',
        values: ['192.0.2.1'],
        set_identifier: 'primary',
        routing_policy: { type: 'failover', role: 'primary' },
      },
    ];
    const { zone } = parseZoneDocument(doc({ records }), 'example.com.yml');
    expect(zone.records[0]?.type).toBe('A');
    expect(zone.records[0]?.routingPolicy).toEqual({ type: 'failover', role: 'PRIMARY' });
  });

  it('stringifies scalar values', () => {
    const records = [{ name: 'ver', type: 'TXT', values: [42, true] }];
    const { zone } = parseZoneDocument(doc({ records }), 'example.com.yml');
    expect(zone.records[0]?.payload).toEqual({ kind: 'values', values: ['42', 'true'] });
  });

  describe('MX records', () => {
    it('accepts mx_records', () => {
      const records = [
        {
          name: 'example.com',
          type: 'MX',
          mx_records: [
            { priority: 1, value: 'mx1.example.com' },
            { priority: 5, value: 'mx2.example.com' },
          ],
        },
      ];
      const { zone } = parseZoneDocument(doc({ records }), 'example.com.yml');
      expect(zone.records[0]?.payload).toEqual({
        kind: 'mx',
        entries: [
          { priority: 1, value: 'mx1.example.com' },
          { priority: 5, value: 'mx2.example.com' },
        ],
      });
    });

    it('parses "priority host" values', () => {
      const records = [{ name: 'example.com', type: 'MX', values: ['10 mail.example.com'] }];
      const { zone } = parseZoneDocument(doc({ records }), 'example.com.yml');
      expect(zone.records[0]?.payload).toEqual({
        kind: 'mx',
        entries: [{ priority: 10, value: 'mail.example.com' }],
      });
    });

    it('rejects values without a priority', () => {
      const records = [{ name: 'example.com', type: 'MX', values: ['mail.example.com'] }];
      expect(() => parseZoneDocument(doc({ records }), 'example.com.yml')).toThrow(
        'example.com.yml: records[0].values[0]: "mail.example.com" is not of the form "<priority> <host>"'
      );
    });

    it('rejects values and mx_records together', () => {
      const records = [
        {
          name: 'example.com',
          type: 'MX',
          values: ['10 a.example.com'],
          mx_records: [{ priority: 1, value: 'b.example.com' }],
        },
      ];
      expect(() => parseZoneDocument(doc({ records }), 'example.com.yml')).toThrow(InvalidFieldError);
    });

    it('rejects mx_records on other types', () => {
      const records = [
        { name: 'www', type: 'A', mx_records: [{ priority: 1, value: 'b.example.com' }] },
      ];
      expect(() => parseZoneDocument(doc({ records }), 'example.com.yml')).toThrow(
        'example.com.yml: records[0].mx_records: is only valid on MX records'
      );
    });
  });

  describe('TUNNEL records', () => {
    it('compiles the tunnel reference', () => {
      const records = [{ name: 'app', type: 'TUNNEL', tunnel: { name: 'main', service: 'http://localhost:8080' } }];
      const { zone } = parseZoneDocument(
        doc({ provider: 'cloudflare', records, tunnels: { main: { tunnel_id: 'tid-1' } } }),
        'example.com.yml'
      );
      expect(zone.records[0]?.payload).toEqual({
        kind: 'tunnel',
        name: 'main',
        service: 'http://localhost:8080',
      });
      expect(zone.tunnels.get('main')).toEqual({ name: 'main', tunnelId: 'tid-1' });
    });

    it('requires the tunnel block', () => {
      const records = [{ name: 'app', type: 'TUNNEL' }];
      expect(() => parseZoneDocument(doc({ provider: 'cloudflare', records }), 'example.com.yml')).toThrow(
        'example.com.yml: records[0].tunnel: is required on TUNNEL records'
      );
    });

    it('rejects tunnel on other types', () => {
      const records = [
        { name: 'app', type: 'CNAME', values: ['x.example.com'], tunnel: { name: 'main', service: 'http://x' } },
      ];
      expect(() => parseZoneDocument(doc({ provider: 'cloudflare', records }), 'example.com.yml')).toThrow(
        InvalidFieldError
      );
    });
  });

  describe('file name check', () => {
    it('accepts <zone_name>.yml', () => {
      expect(() =>
        parseZoneDocument(doc(), 'dns_zones/example.com.yml', { checkFileName: true })
      ).not.toThrow();
    });

    it('rejects a mismatched file name', () => {
      expect(() =>
        parseZoneDocument(doc(), 'dns_zones/other.com.yml', { checkFileName: true })
      ).toThrow('dns_zones/other.com.yml: zone_name: file name does not match zone "example.com" (expected example.com.yml)');
    });
  });

  describe('warnings', () => {
    it('flags proxied records outside cloudflare', () => {
      const records = [{ name: 'www', type: 'A', values: ['192.0.2.1'], proxied: true }];
      const { warnings } = parseZoneDocument(doc({ records }), 'example.com.yml');
      expect(warnings).toEqual([
        {
          document: 'example.com.yml',
          field: 'records[0].proxied',
          message: 'proxied has no effect on zones not hosted at cloudflare',
        },
      ]);
    });

    it('flags routing policies without a set identifier', () => {
      const records = [
        { name: 'www', type: 'A', values: ['192.0.2.1'], routing_policy: { type: 'weighted', weight: 5 } },
      ];
      const { warnings } = parseZoneDocument(doc({ records }), 'example.com.yml');
      expect(warnings).toEqual([
        {
          document: 'example.com.yml',
          field: 'records[0].set_identifier',
          message: 'weighted routing needs a set_identifier; route53 will reject the record',
        },
      ]);
    });

    it('flags routing policies outside route53', () => {
      const records = [
        {
          name: 'www',
          type: 'A',
          values: ['192.0.2.1'],
          set_identifier: 'a',
          routing_policy: { type: 'latency', region: 'eu-west-1' },
        },
      ];
      const { warnings } = parseZoneDocument(doc({ provider: 'cloudflare', records }), 'example.com.yml');
      expect(warnings.map((w) => w.field)).toEqual(['records[0].routing_policy']);
    });
  });
});

describe('buildZoneRegistry', () => {
  it('indexes zones by name', () => {
    const { zones } = buildZoneRegistry([
      { document: 'example.com.yml', content: doc() },
      { document: 'example.org.yml', content: doc({ zone_name: 'example.org' }) },
    ]);
    expect([...zones.keys()]).toEqual(['example.com', 'example.org']);
  });

  it('rejects a zone declared twice', () => {
    expect(() =>
      buildZoneRegistry([
        { document: 'a.yml', content: doc() },
        { document: 'b.yml', content: doc({ zone_name: 'Example.com.' }) },
      ])
    ).toThrow(new DuplicateZoneError('b.yml', 'example.com', 'a.yml'));
  });
});

describe('validateDocuments', () => {
  it('collects every error instead of stopping at the first', () => {
    const result = validateDocuments([
      { document: 'a.yml', content: doc({ provider: undefined }) },
      { document: 'b.yml', content: doc({ zone_name: 'example.org', records: 'nope' }) },
      { document: 'c.yml', content: doc({ zone_name: 'example.net' }) },
      { document: 'd.yml', content: doc({ zone_name: 'example.net' }) },
    ]);

    expect(result.errors.map((e) => e.document)).toEqual(['a.yml', 'b.yml', 'd.yml']);
    expect(result.errors[2]).toBeInstanceOf(DuplicateZoneError);
    expect(result.zoneCount).toBe(1);
  });
});

describe('parseTunnelRegistry', () => {
  it('returns an empty registry for an absent document', () => {
    expect(parseTunnelRegistry(undefined, 'tunnels.yml').size).toBe(0);
  });

  it('reads tunnel ids by name', () => {
    const tunnels = parseTunnelRegistry({ tunnels: { edge: { tunnel_id: 'tid-9' } } }, 'tunnels.yml');
    expect(tunnels.get('edge')).toEqual({ name: 'edge', tunnelId: 'tid-9' });
  });

  it('names the field of an invalid entry', () => {
    expect(() => parseTunnelRegistry({ tunnels: { edge: {} } }, 'tunnels.yml')).toThrow(
      'tunnels.yml: tunnels.edge.tunnel_id: is required'
    );
  });
});
