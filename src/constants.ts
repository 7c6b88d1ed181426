import type { ProviderKind } from './types.js';

/** Providers a zone document may name */
export const SUPPORTED_PROVIDERS: readonly ProviderKind[] = ['route53', 'cloudflare'];

/** Record types the providers manage themselves; never created, updated or deleted */
export const PROVIDER_MANAGED_TYPES: ReadonlySet<string> = new Set(['NS', 'SOA']);

/** Record types Cloudflare allows behind its proxy */
export const PROXIABLE_TYPES: ReadonlySet<string> = new Set(['A', 'AAAA', 'CNAME']);

/** TTL Cloudflare requires for proxied records ("automatic") */
export const CLOUDFLARE_PROXIED_TTL = 1;

/** TTL applied when a record omits one */
export const DEFAULT_TTL = 300;

/** Hostname suffix every Cloudflare tunnel is reachable under */
export const TUNNEL_CNAME_SUFFIX = 'cfargotunnel.com';

/** Trailing ingress rule so unmatched tunnel traffic is rejected */
export const TUNNEL_CATCH_ALL_SERVICE = 'http_status:404';

/** File name of the repository-wide tunnel registry inside the zones directory */
export const TUNNEL_REGISTRY_FILE = 'tunnels.yml';

/** Prefix of the TXT ownership records an external-dns controller writes */
export const EXTERNAL_DNS_OWNER_PREFIX = '_external-dns-';
