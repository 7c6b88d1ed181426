import path from 'node:path';
import type { ZodIssue } from 'zod';
import { DEFAULT_TTL } from './constants.js';
import { cleanName } from './domain.js';
import {
  ConfigurationError,
  DuplicateZoneError,
  InvalidFieldError,
  MissingFieldError,
} from './errors.js';
import {
  formatIssuePath,
  tunnelRegistrySchema,
  zoneDocumentSchema,
  type RawRecordDocument,
} from './schema.js';
import type {
  MxEntry,
  ProviderKind,
  RawRecord,
  RecordPayload,
  TunnelDef,
  ZoneDefinition,
  ZoneWarning,
} from './types.js';

/** A decoded document and the name it was read from */
export interface ZoneSource {
  document: string;
  content: unknown;
}

export interface RegistryOptions {
  /** Provider for documents that name neither `provider` nor `providers` */
  defaultProvider?: ProviderKind;
  /** Require the document file name to be `<zone_name>.yml` */
  checkFileName?: boolean;
}

export interface ParsedZone {
  zone: ZoneDefinition;
  warnings: ZoneWarning[];
}

export interface ZoneRegistry {
  zones: ReadonlyMap<string, ZoneDefinition>;
  warnings: ZoneWarning[];
}

const MX_VALUE = /^\s*(\d+)\s+(\S+)\s*$/;

/**
 * Validate one decoded zone document and compile it into a ZoneDefinition.
 *
 * Throws a ConfigurationError naming the document and field on the first
 * problem found. Non-fatal smells are returned as warnings.
 */
export function parseZoneDocument(
  content: unknown,
  document: string,
  options: RegistryOptions = {}
): ParsedZone {
  if (typeof content !== 'object' || content === null || Array.isArray(content)) {
    throw new InvalidFieldError(document, undefined, 'zone document must be a mapping');
  }

  const parsed = zoneDocumentSchema.safeParse(content);
  if (!parsed.success) {
    throw issueToError(document, parsed.error.issues[0]);
  }
  const doc = parsed.data;
  const zoneName = cleanName(doc.zone_name);

  if (options.checkFileName) {
    const base = path.basename(document);
    if (base !== `${doc.zone_name}.yml` && base !== `${doc.zone_name}.yaml`) {
      throw new InvalidFieldError(
        document,
        'zone_name',
        `file name does not match zone "${doc.zone_name}" (expected ${doc.zone_name}.yml)`
      );
    }
  }

  const providers = resolveProviders(doc.provider, doc.providers, document, options);

  const tunnels = new Map<string, TunnelDef>();
  for (const [name, def] of Object.entries(doc.tunnels ?? {})) {
    tunnels.set(name, { name, tunnelId: def.tunnel_id });
  }

  const records = doc.records.map((record, index) =>
    toRawRecord(record, `records[${index}]`, document)
  );

  const zone: ZoneDefinition = { zoneName, document, providers, tunnels, records };
  return { zone, warnings: collectWarnings(zone) };
}

/**
 * Index zone documents by zone name.
 *
 * Fails on the first invalid document, and with DuplicateZoneError when two
 * documents declare the same zone.
 */
export function buildZoneRegistry(
  sources: ZoneSource[],
  options: RegistryOptions = {}
): ZoneRegistry {
  const zones = new Map<string, ZoneDefinition>();
  const warnings: ZoneWarning[] = [];

  for (const source of sources) {
    const parsed = parseZoneDocument(source.content, source.document, options);
    const existing = zones.get(parsed.zone.zoneName);
    if (existing) {
      throw new DuplicateZoneError(source.document, parsed.zone.zoneName, existing.document);
    }
    zones.set(parsed.zone.zoneName, parsed.zone);
    warnings.push(...parsed.warnings);
  }

  return { zones, warnings };
}

/**
 * Lint every document, collecting all configuration errors instead of stopping
 * at the first one.
 */
export function validateDocuments(
  sources: ZoneSource[],
  options: RegistryOptions = {}
): { errors: ConfigurationError[]; warnings: ZoneWarning[]; zoneCount: number } {
  const errors: ConfigurationError[] = [];
  const warnings: ZoneWarning[] = [];
  const seen = new Map<string, string>();

  for (const source of sources) {
    try {
      const parsed = parseZoneDocument(source.content, source.document, options);
      const first = seen.get(parsed.zone.zoneName);
      if (first) {
        errors.push(new DuplicateZoneError(source.document, parsed.zone.zoneName, first));
        continue;
      }
      seen.set(parsed.zone.zoneName, source.document);
      warnings.push(...parsed.warnings);
    } catch (err) {
      if (!(err instanceof ConfigurationError)) throw err;
      errors.push(err);
    }
  }

  return { errors, warnings, zoneCount: seen.size };
}

/** Parse the repository-wide tunnel registry; an absent document is empty */
export function parseTunnelRegistry(
  content: unknown,
  document: string
): ReadonlyMap<string, TunnelDef> {
  const tunnels = new Map<string, TunnelDef>();
  if (content === undefined || content === null) return tunnels;

  const parsed = tunnelRegistrySchema.safeParse(content);
  if (!parsed.success) {
    throw issueToError(document, parsed.error.issues[0]);
  }
  for (const [name, def] of Object.entries(parsed.data.tunnels)) {
    tunnels.set(name, { name, tunnelId: def.tunnel_id });
  }
  return tunnels;
}

function issueToError(document: string, issue: ZodIssue | undefined): ConfigurationError {
  if (!issue) {
    return new InvalidFieldError(document, undefined, 'invalid document');
  }
  const field = formatIssuePath(issue.path) || undefined;
  if (issue.code === 'invalid_type' && issue.received === 'undefined' && field) {
    return new MissingFieldError(document, field);
  }
  return new InvalidFieldError(document, field, issue.message);
}

function resolveProviders(
  provider: ProviderKind | undefined,
  providers: ProviderKind[] | undefined,
  document: string,
  options: RegistryOptions
): ProviderKind[] {
  if (provider && providers) {
    throw new InvalidFieldError(
      document,
      'providers',
      'cannot be combined with "provider"; use one or the other'
    );
  }
  if (providers) {
    return [...new Set(providers)];
  }
  if (provider) {
    return [provider];
  }
  if (options.defaultProvider) {
    return [options.defaultProvider];
  }
  throw new MissingFieldError(
    document,
    'provider',
    'one of "provider" or "providers" is required'
  );
}

function toRawRecord(record: RawRecordDocument, field: string, document: string): RawRecord {
  const raw: RawRecord = {
    name: record.name,
    type: record.type,
    ttl: record.ttl ?? DEFAULT_TTL,
    payload: toPayload(record, field, document),
    proxied: record.proxied ?? false,
  };
  if (record.set_identifier) raw.setIdentifier = record.set_identifier;
  if (record.routing_policy) raw.routingPolicy = record.routing_policy;
  return raw;
}

function toPayload(record: RawRecordDocument, field: string, document: string): RecordPayload {
  const hasValues = record.values !== undefined;
  const hasMx = record.mx_records !== undefined;

  if (record.type === 'TUNNEL') {
    if (!record.tunnel) {
      throw new MissingFieldError(document, `${field}.tunnel`, 'is required on TUNNEL records');
    }
    if (hasValues || hasMx) {
      throw new InvalidFieldError(document, field, 'TUNNEL records take "tunnel", not values');
    }
    return { kind: 'tunnel', name: record.tunnel.name, service: record.tunnel.service };
  }

  if (record.tunnel) {
    throw new InvalidFieldError(document, `${field}.tunnel`, 'is only valid on TUNNEL records');
  }

  if (record.type === 'MX') {
    if (hasValues && hasMx) {
      throw new InvalidFieldError(document, field, 'use either "values" or "mx_records", not both');
    }
    if (record.mx_records) {
      if (record.mx_records.length === 0) {
        throw new InvalidFieldError(document, `${field}.mx_records`, 'must not be empty');
      }
      return { kind: 'mx', entries: record.mx_records.map((mx) => ({ ...mx })) };
    }
    if (record.values && record.values.length > 0) {
      return {
        kind: 'mx',
        entries: record.values.map((value, i) => parseMxValue(value, `${field}.values[${i}]`, document)),
      };
    }
    throw new MissingFieldError(document, `${field}.values`, 'MX records need "values" or "mx_records"');
  }

  if (hasMx) {
    throw new InvalidFieldError(document, `${field}.mx_records`, 'is only valid on MX records');
  }
  if (!record.values || record.values.length === 0) {
    throw new MissingFieldError(document, `${field}.values`);
  }
  return { kind: 'values', values: [...record.values] };
}

function parseMxValue(value: string, field: string, document: string): MxEntry {
  const match = MX_VALUE.exec(value);
  if (!match || match[1] === undefined || match[2] === undefined) {
    throw new InvalidFieldError(document, field, `"${value}" is not of the form "<priority> <host>"`);
  }
  return { priority: Number(match[1]), value: match[2] };
}

function collectWarnings(zone: ZoneDefinition): ZoneWarning[] {
  const warnings: ZoneWarning[] = [];
  const onCloudflare = zone.providers.includes('cloudflare');
  const onRoute53 = zone.providers.includes('route53');

  zone.records.forEach((record, index) => {
    const field = `records[${index}]`;
    if (!onCloudflare && record.proxied) {
      warnings.push({
        document: zone.document,
        field: `${field}.proxied`,
        message: 'proxied has no effect on zones not hosted at cloudflare',
      });
    }
    if (!onCloudflare && record.type === 'TUNNEL') {
      warnings.push({
        document: zone.document,
        field,
        message: 'TUNNEL records are only published at cloudflare; record is skipped',
      });
    }
    if (!onRoute53 && record.routingPolicy) {
      warnings.push({
        document: zone.document,
        field: `${field}.routing_policy`,
        message: 'routing policies are only applied at route53',
      });
    }
    if (onRoute53 && record.routingPolicy && !record.setIdentifier) {
      warnings.push({
        document: zone.document,
        field: `${field}.set_identifier`,
        message: `${record.routingPolicy.type} routing needs a set_identifier; route53 will reject the record`,
      });
    }
  });

  return warnings;
}
