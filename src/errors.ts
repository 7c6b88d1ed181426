import type { ProviderKind } from './types.js';

/**
 * A zone document that cannot be compiled. Always raised before any change is
 * applied, and always names the offending document (and field when known).
 */
export class ConfigurationError extends Error {
  readonly document: string;
  readonly field?: string;

  constructor(document: string, field: string | undefined, problem: string) {
    super(field ? `${document}: ${field}: ${problem}` : `${document}: ${problem}`);
    this.name = 'ConfigurationError';
    this.document = document;
    this.field = field;
  }
}

export class MissingFieldError extends ConfigurationError {
  constructor(document: string, field: string, problem = 'is required') {
    super(document, field, problem);
    this.name = 'MissingFieldError';
  }
}

export class InvalidFieldError extends ConfigurationError {
  constructor(document: string, field: string | undefined, problem: string) {
    super(document, field, problem);
    this.name = 'InvalidFieldError';
  }
}

export class DuplicateZoneError extends ConfigurationError {
  readonly zoneName: string;

  constructor(document: string, zoneName: string, firstDocument: string) {
    super(
      document,
      'zone_name',
      `zone "${zoneName}" is already declared in ${firstDocument}`
    );
    this.name = 'DuplicateZoneError';
    this.zoneName = zoneName;
  }
}

export class UnknownTunnelError extends ConfigurationError {
  readonly tunnelName: string;

  constructor(document: string, field: string, tunnelName: string) {
    super(document, field, `tunnel "${tunnelName}" is not defined`);
    this.name = 'UnknownTunnelError';
    this.tunnelName = tunnelName;
  }
}

export class UnsupportedProxyTypeError extends ConfigurationError {
  constructor(document: string, field: string, type: string) {
    super(
      document,
      field,
      `${type} records cannot be proxied (only A, AAAA and CNAME)`
    );
    this.name = 'UnsupportedProxyTypeError';
  }
}

/** A provider answered with a status that retrying will not fix */
export class ProviderRequestError extends Error {
  readonly status?: number;
  /** Wait the provider asked for, from a `Retry-After` header */
  readonly retryAfterMs?: number;

  constructor(message: string, status?: number, retryAfterMs?: number) {
    super(message);
    this.name = 'ProviderRequestError';
    this.status = status;
    this.retryAfterMs = retryAfterMs;
  }
}

/** A provider kept failing with rate limits or timeouts until retries ran out */
export class TransientProviderError extends Error {
  readonly attempts: number;

  constructor(message: string, attempts: number, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'TransientProviderError';
    this.attempts = attempts;
  }
}

/**
 * A create/update/delete the provider rejected. Isolated to one record (or one
 * zone-level operation); the rest of the run continues.
 */
export class ProviderApplyError extends Error {
  readonly provider: ProviderKind;
  readonly zoneName: string;
  readonly identityKey: string;
  readonly reason: string;

  constructor(
    provider: ProviderKind,
    zoneName: string,
    identityKey: string,
    cause: unknown
  ) {
    const reason = formatErrorMessage(cause);
    super(`${provider} ${zoneName} ${identityKey}: ${reason}`, { cause });
    this.name = 'ProviderApplyError';
    this.provider = provider;
    this.zoneName = zoneName;
    this.identityKey = identityKey;
    this.reason = reason;
  }
}

/**
 * Format error message from any error type
 */
export function formatErrorMessage(err: unknown): string {
  if (err instanceof Error) {
    return err.message || err.name || 'Error';
  }
  if (typeof err === 'string') return err;
  try {
    return JSON.stringify(err);
  } catch {
    return Object.prototype.toString.call(err);
  }
}
