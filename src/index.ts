export { loadConfig } from './config.js';
export type { ZoneSyncConfig } from './config.js';
export { cleanName, recordFqdn, relativeName, isApex } from './domain.js';
export {
  assignCloudflareLiveKeys,
  cloudflareRecordsEqual,
  diffRecords,
  externalDnsOwnedNames,
  isExternalDnsRecord,
  route53RecordsEqual,
} from './diff.js';
export type { DiffOptions } from './diff.js';
export {
  ConfigurationError,
  MissingFieldError,
  InvalidFieldError,
  DuplicateZoneError,
  UnknownTunnelError,
  UnsupportedProxyTypeError,
  ProviderRequestError,
  TransientProviderError,
  ProviderApplyError,
  formatErrorMessage,
} from './errors.js';
export { createLogger, silentLogger, getComponentLogger } from './logger.js';
export type { Logger, LogLevel } from './logger.js';
export { identityKey, normalizeCloudflareZone, normalizeRoute53Zone } from './normalize.js';
export { partitionZones } from './partition.js';
export type { ProviderPartition } from './partition.js';
export type {
  CloudflareProvider,
  DnsProvider,
  ProviderZone,
  RegistrarClient,
  RegistrarDomain,
  Route53Provider,
  TunnelConfigClient,
} from './provider.js';
export { resolveProxy } from './proxy.js';
export {
  applyPlan,
  compileDesiredState,
  countChanges,
  planOutputs,
  planReconciliation,
} from './reconcile.js';
export type {
  ApplyOptions,
  ApplyResult,
  DesiredState,
  PlanInput,
  ReconcileClients,
  ReconciliationOutputs,
  ReconciliationPlan,
  TunnelPlan,
  ZonePlan,
} from './reconcile.js';
export { findApexNameservers, syncRegistrarNameservers } from './registrar.js';
export type { RegistrarSyncResult } from './registrar.js';
export {
  buildZoneRegistry,
  parseTunnelRegistry,
  parseZoneDocument,
  validateDocuments,
} from './registry.js';
export type { RegistryOptions, ZoneSource } from './registry.js';
export { withRetry, isTransientError } from './retry.js';
export type { RetryOptions } from './retry.js';
export { resolveRoutingPolicy } from './routing-policy.js';
export { readDocumentStore } from './store.js';
export { routeTunnels } from './tunnels.js';
export type { TunnelIngress, TunnelRouting } from './tunnels.js';
export type {
  CanonicalRecord,
  Change,
  CloudflareRecord,
  LiveRecord,
  ProviderKind,
  RawRecord,
  RecordType,
  Route53Record,
  RoutingPolicy,
  TunnelDef,
  TunnelIngressRule,
  TunnelRoute,
  ZoneDefinition,
  ZoneWarning,
} from './types.js';
