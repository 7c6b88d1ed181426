import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { createProgram, formatPlan, type CliContext } from '../src/cli.js';
import { loadConfig } from '../src/config.js';
import { silentLogger } from '../src/logger.js';
import type { ReconciliationPlan } from '../src/reconcile.js';
import type { CloudflareRecord, Route53Record } from '../src/types.js';
import { FakeProvider, FakeRegistrar } from './fakes.js';

let dir: string;
let stdout: string[];
let stderr: string[];
let log: string[];
let route53: FakeProvider<Route53Record>;

function context(): CliContext {
  return {
    config: loadConfig({}),
    logger: silentLogger(),
    createClients: () => ({
      route53,
      cloudflare: new FakeProvider<CloudflareRecord>('cloudflare', log),
      registrar: new FakeRegistrar(log),
    }),
    stdout: (line) => stdout.push(line),
    stderr: (line) => stderr.push(line),
  };
}

function run(...args: string[]) {
  return createProgram(context()).parseAsync(['node', 'zone-sync', ...args, '--dir', dir]);
}

beforeEach(async () => {
  dir = await mkdtemp(path.join(tmpdir(), 'zone-sync-cli-'));
  stdout = [];
  stderr = [];
  log = [];
  route53 = new FakeProvider('route53', log);
  await writeFile(
    path.join(dir, 'example.com.yml'),
    ['zone_name: example.com', 'provider: route53', 'records:', '  - name: www', '    type: A', '    values: [192.0.2.1]', ''].join('\n')
  );
});

afterEach(async () => {
  process.exitCode = undefined;
  await rm(dir, { recursive: true, force: true });
});

describe('validate', () => {
  it('reports valid documents', async () => {
    await run('validate');

    expect(stdout).toEqual(['1 zone document(s) valid']);
    expect(stderr).toEqual([]);
    expect(process.exitCode).toBeUndefined();
    expect(log).toEqual([]);
  });

  it('reports every invalid document', async () => {
    await writeFile(path.join(dir, 'example.net.yml'), 'zone_name: example.org\nprovider: cloudflare\nrecords: []\n');
    await writeFile(path.join(dir, 'example.org.yml'), 'zone_name: example.org\nrecords: []\n');

    await run('validate');

    expect(stdout).toEqual([]);
    expect(stderr).toEqual([
      `error: ${path.join(dir, 'example.net.yml')}: zone_name: file name does not match zone "example.org" (expected example.org.yml)`,
      `error: ${path.join(dir, 'example.org.yml')}: provider: one of "provider" or "providers" is required`,
      '2 invalid document(s)',
    ]);
    expect(process.exitCode).toBe(1);
  });

  it('prints warnings', async () => {
    await writeFile(
      path.join(dir, 'example.org.yml'),
      'zone_name: example.org\nprovider: route53\nrecords:\n  - name: www\n    type: A\n    values: [192.0.2.1]\n    proxied: true\n'
    );

    await run('validate');

    expect(stderr).toEqual([
      `warning: ${path.join(dir, 'example.org.yml')}: records[0].proxied: proxied has no effect on zones not hosted at cloudflare`,
    ]);
    expect(stdout).toEqual(['2 zone document(s) valid']);
  });
});

describe('plan', () => {
  it('lists pending changes', async () => {
    await run('plan');

    expect(stdout).toEqual([
      '+ route53 zone example.com',
      '+ route53 example.com example.com_www_A',
      'Plan: 1 to create, 0 to update, 0 to delete.',
    ]);
    expect(log).toEqual(['route53 findZone example.com']);
  });

  it('prints outputs as JSON', async () => {
    await run('plan', '--json');

    expect(JSON.parse(stdout[stdout.length - 1] ?? '')).toEqual({
      nameservers: { route53: { 'example.com': [] }, cloudflare: {} },
      registrarNameservers: {},
      tunnelRoutes: {},
    });
  });
});

describe('apply', () => {
  it('applies the plan', async () => {
    await run('apply');

    expect(stdout[stdout.length - 1]).toBe('Apply complete: 2 applied, 0 failed.');
    expect(log).toEqual([
      'route53 findZone example.com',
      'route53 createZone example.com',
      'route53 create example.com_www_A',
    ]);
    expect(process.exitCode).toBeUndefined();
  });

  it('reports a zone whose live state cannot be read', async () => {
    route53.readFailures.set('example.com', 'findZone');

    await run('apply');

    expect(stdout).toEqual([
      '! route53 example.com: route53 findZone: gave up after 3 attempts: Throttling',
      'Plan: 0 to create, 0 to update, 0 to delete.',
      'Apply failed: 0 applied, 1 failed.',
    ]);
    expect(stderr).toEqual([
      'error: route53 example.com example.com: route53 findZone: gave up after 3 attempts: Throttling',
    ]);
    expect(process.exitCode).toBe(1);
  });

  it('fails the run when a change is rejected', async () => {
    route53.seed('example.com', []);
    route53.rejected.add('example.com_www_A');

    await run('apply');

    expect(stderr).toEqual(['error: route53 example.com example.com_www_A: record example.com_www_A rejected']);
    expect(stdout[stdout.length - 1]).toBe('Apply failed: 0 applied, 1 failed.');
    expect(process.exitCode).toBe(1);
  });
});

describe('formatPlan', () => {
  it('summarizes tunnels and registrar updates', () => {
    const plan: ReconciliationPlan = {
      route53: [],
      cloudflare: [],
      tunnels: [
        {
          tunnelId: 'tid-1',
          tunnelNames: ['edge'],
          current: [],
          desired: [{ hostname: 'app.example.net', service: 'http://localhost:8080' }, { service: 'http_status:404' }],
          changed: true,
        },
      ],
      registrar: [
        {
          zone: {
            zoneName: 'example.com',
            document: 'example.com.yml',
            providers: ['route53'],
            tunnels: new Map(),
            records: [],
          },
          sync: { domainName: 'example.com', declared: ['ns1.foo.com', 'ns2.foo.com'], changed: true },
        },
      ],
      routes: new Map(),
      warnings: [],
    };

    expect(formatPlan(plan)).toEqual([
      '~ cloudflare tunnel edge (tid-1): 2 ingress rules',
      '~ registrar example.com nameservers ns1.foo.com,ns2.foo.com',
      'Plan: 0 to create, 0 to update, 0 to delete.',
    ]);
  });

  it('marks tunnels and domains that could not be read', () => {
    const plan: ReconciliationPlan = {
      route53: [],
      cloudflare: [],
      tunnels: [
        {
          tunnelId: 'tid-1',
          tunnelNames: ['edge'],
          current: [],
          desired: [{ service: 'http_status:404' }],
          changed: false,
          error: new Error('tunnel configuration unavailable'),
        },
      ],
      registrar: [
        {
          zone: {
            zoneName: 'example.com',
            document: 'example.com.yml',
            providers: ['route53'],
            tunnels: new Map(),
            records: [],
          },
          error: new Error('registrar unavailable'),
        },
      ],
      routes: new Map(),
      warnings: [],
    };

    expect(formatPlan(plan)).toEqual([
      '! cloudflare tunnel edge (tid-1): tunnel configuration unavailable',
      '! registrar example.com: registrar unavailable',
      'Plan: 0 to create, 0 to update, 0 to delete.',
    ]);
  });
});
