import { PROVIDER_MANAGED_TYPES } from '../constants.js';
import { cleanName, relativeName } from '../domain.js';
import { ProviderRequestError } from '../errors.js';
import { identityKey } from '../normalize.js';
import type {
  CloudflareProvider,
  ProviderZone,
  TunnelConfigClient,
} from '../provider.js';
import { parseRetryAfter, withRetry, type RetryOptions } from '../retry.js';
import type { CloudflareRecord, LiveRecord, TunnelIngressRule } from '../types.js';

export interface CloudflareOptions {
  apiToken: string;
  /** Account that new zones and tunnels belong to */
  accountId?: string;
  retry?: RetryOptions;
}

interface CloudflareApiResponse<T> {
  success: boolean;
  errors: { code: number; message: string }[];
  result: T;
  result_info?: { page: number; total_pages: number };
}

interface CloudflareZone {
  id: string;
  name: string;
  name_servers?: string[];
}

interface CloudflareDnsRecord {
  id: string;
  type: string;
  name: string;
  content: string;
  ttl: number;
  proxied?: boolean;
  priority?: number;
}

interface CloudflareTunnelConfig {
  config?: {
    ingress?: { hostname?: string; service: string }[];
    [key: string]: unknown;
  } | null;
}

const CF_API = 'https://api.cloudflare.com/client/v4';

async function cfFetchWithToken<T>(
  apiToken: string,
  path: string,
  init?: RequestInit
): Promise<CloudflareApiResponse<T>> {
  const headers = new Headers(init?.headers);
  headers.set('Authorization', `Bearer ${apiToken}`);
  headers.set('Content-Type', 'application/json');

  const res = await fetch(`${CF_API}${path}`, {
    ...init,
    headers,
  });

  if (!res.ok) {
    const text = await res.text();
    throw new ProviderRequestError(
      `Cloudflare API error ${res.status}: ${text}`,
      res.status,
      parseRetryAfter(res.headers.get('retry-after'))
    );
  }

  const data = (await res.json()) as CloudflareApiResponse<T>;

  if (!data.success) {
    const errorDetails =
      data.errors?.map((e) => `${e.code}: ${e.message}`).join(', ') ||
      'unknown error';
    throw new ProviderRequestError(`Cloudflare API error: ${errorDetails}`);
  }

  return data;
}

function toZone(z: CloudflareZone): ProviderZone {
  return { id: z.id, name: cleanName(z.name), nameServers: z.name_servers ?? [] };
}

/** SRV content is `weight port target`; Cloudflare takes it as structured data */
function srvData(record: CloudflareRecord) {
  const [weight = '0', port = '0', target = ''] = record.content.trim().split(/\s+/);
  return {
    priority: record.priority ?? 0,
    weight: Number(weight),
    port: Number(port),
    target,
  };
}

function toBody(record: CloudflareRecord): string {
  if (record.type === 'SRV') {
    return JSON.stringify({
      type: record.type,
      name: record.fqdn,
      ttl: record.ttl,
      proxied: record.proxied,
      data: srvData(record),
    });
  }
  return JSON.stringify({
    type: record.type,
    name: record.fqdn,
    content: record.content,
    ttl: record.ttl,
    proxied: record.proxied,
    priority: record.priority,
  });
}

/**
 * Read a Cloudflare DNS record into canonical form. The identity key assumes
 * value index 0; {@link assignCloudflareLiveKeys} settles the real index.
 */
export function fromCloudflareRecord(
  r: CloudflareDnsRecord,
  zoneName: string
): LiveRecord<CloudflareRecord> {
  const fqdn = cleanName(r.name);
  const name = relativeName(fqdn, zoneName);
  const record: LiveRecord<CloudflareRecord> = {
    provider: 'cloudflare',
    providerId: r.id,
    identityKey: identityKey(zoneName, name, r.type, 0),
    zoneName,
    name,
    fqdn,
    type: r.type,
    ttl: r.ttl,
    content: r.content,
    proxied: r.proxied ?? false,
  };
  if (r.priority !== undefined) record.priority = r.priority;
  return record;
}

/**
 * Create a Cloudflare DNS provider adapter.
 *
 * Uses Cloudflare API v4 with native `fetch` (Node 18+).
 */
export function cloudflare(options: CloudflareOptions): CloudflareProvider {
  const { apiToken } = options;

  if (!apiToken) {
    throw new Error('Cloudflare: apiToken is required');
  }

  function cfFetch<T>(label: string, path: string, init?: RequestInit) {
    return withRetry(() => cfFetchWithToken<T>(apiToken, path, init), {
      ...options.retry,
      label: `cloudflare ${label}`,
    });
  }

  return {
    kind: 'cloudflare',

    async findZone(zoneName: string): Promise<ProviderZone | undefined> {
      const name = cleanName(zoneName);
      const data = await cfFetch<CloudflareZone[]>(
        'list zones',
        `/zones?name=${encodeURIComponent(name)}`
      );
      const zone = data.result.find((z) => cleanName(z.name) === name);
      return zone ? toZone(zone) : undefined;
    },

    async createZone(zoneName: string): Promise<ProviderZone> {
      if (!options.accountId) {
        throw new Error('Cloudflare: accountId is required to create zones');
      }
      const data = await cfFetch<CloudflareZone>('create zone', '/zones', {
        method: 'POST',
        body: JSON.stringify({
          name: cleanName(zoneName),
          account: { id: options.accountId },
          type: 'full',
        }),
      });
      return toZone(data.result);
    },

    async listRecords(zone: ProviderZone): Promise<LiveRecord<CloudflareRecord>[]> {
      const records: LiveRecord<CloudflareRecord>[] = [];
      let page = 1;

      while (true) {
        const data = await cfFetch<CloudflareDnsRecord[]>(
          'list records',
          `/zones/${zone.id}/dns_records?page=${page}&per_page=100`
        );

        for (const r of data.result) {
          if (PROVIDER_MANAGED_TYPES.has(r.type)) continue;
          records.push(fromCloudflareRecord(r, zone.name));
        }

        const info = data.result_info;
        if (!info || page >= info.total_pages) break;
        page++;
      }

      return records;
    },

    async createRecord(zone: ProviderZone, record: CloudflareRecord): Promise<void> {
      await cfFetch<CloudflareDnsRecord>('create record', `/zones/${zone.id}/dns_records`, {
        method: 'POST',
        body: toBody(record),
      });
    },

    async updateRecord(
      zone: ProviderZone,
      live: LiveRecord<CloudflareRecord>,
      record: CloudflareRecord
    ): Promise<void> {
      await cfFetch<CloudflareDnsRecord>(
        'update record',
        `/zones/${zone.id}/dns_records/${live.providerId}`,
        { method: 'PUT', body: toBody(record) }
      );
    },

    async deleteRecord(zone: ProviderZone, live: LiveRecord<CloudflareRecord>): Promise<void> {
      await cfFetch('delete record', `/zones/${zone.id}/dns_records/${live.providerId}`, {
        method: 'DELETE',
      });
    },
  };
}

/**
 * Create a client for Cloudflare tunnel ingress configuration.
 *
 * Writing ingress keeps every other key of the tunnel's remote configuration.
 */
export function cloudflareTunnels(options: CloudflareOptions): TunnelConfigClient {
  const { apiToken, accountId } = options;

  if (!apiToken) {
    throw new Error('Cloudflare: apiToken is required');
  }
  if (!accountId) {
    throw new Error('Cloudflare: accountId is required for tunnel configuration');
  }

  function cfFetch<T>(label: string, path: string, init?: RequestInit) {
    return withRetry(() => cfFetchWithToken<T>(apiToken, path, init), {
      ...options.retry,
      label: `cloudflare ${label}`,
    });
  }

  async function getConfig(tunnelId: string): Promise<CloudflareTunnelConfig> {
    const data = await cfFetch<CloudflareTunnelConfig>(
      'get tunnel configuration',
      `/accounts/${accountId}/cfd_tunnel/${tunnelId}/configurations`
    );
    return data.result;
  }

  return {
    async getIngress(tunnelId: string): Promise<TunnelIngressRule[]> {
      const current = await getConfig(tunnelId);
      return (current.config?.ingress ?? []).map((rule) =>
        rule.hostname ? { hostname: rule.hostname, service: rule.service } : { service: rule.service }
      );
    },

    async putIngress(tunnelId: string, rules: TunnelIngressRule[]): Promise<void> {
      const current = await getConfig(tunnelId);
      await cfFetch(
        'update tunnel configuration',
        `/accounts/${accountId}/cfd_tunnel/${tunnelId}/configurations`,
        {
          method: 'PUT',
          body: JSON.stringify({ config: { ...current.config, ingress: rules } }),
        }
      );
    },
  };
}
