import { CLOUDFLARE_PROXIED_TTL, PROXIABLE_TYPES } from './constants.js';
import { UnsupportedProxyTypeError } from './errors.js';
import type { RawRecord } from './types.js';

export interface ResolvedProxy {
  proxied: boolean;
  ttl: number;
}

/**
 * Resolve Cloudflare's proxy flag and the TTL that goes with it.
 *
 * Proxied records always get TTL 1 whatever the document says; the declared
 * TTL only applies to DNS-only records.
 */
export function resolveProxy(
  record: Pick<RawRecord, 'type' | 'ttl' | 'proxied'>,
  document: string,
  field: string
): ResolvedProxy {
  if (!record.proxied) {
    return { proxied: false, ttl: record.ttl };
  }
  if (!PROXIABLE_TYPES.has(record.type)) {
    throw new UnsupportedProxyTypeError(document, `${field}.proxied`, record.type);
  }
  return { proxied: true, ttl: CLOUDFLARE_PROXIED_TTL };
}
