/**
 * Normalize a zone or host name for comparison.
 *
 * Examples:
 * - `Example.COM.` → `example.com`
 * - `\052.example.com.` → `*.example.com` (Route 53 escapes wildcards)
 */
export function cleanName(input: string): string {
  let name = input.trim().toLowerCase().replace(/\\052/g, '*');

  // Remove trailing dot (FQDN notation)
  if (name.endsWith('.')) {
    name = name.slice(0, -1);
  }

  return name;
}

/**
 * Render a record name as a fully qualified hostname.
 *
 * The apex (`zone`, or `@`) renders as the bare zone name, names already
 * inside the zone are kept, anything else is suffixed with the zone.
 */
export function recordFqdn(name: string, zoneName: string): string {
  const zone = cleanName(zoneName);
  const host = cleanName(name);

  if (host === zone || host === '@' || host === '') {
    return zone;
  }
  if (host.endsWith(`.${zone}`)) {
    return host;
  }
  return `${host}.${zone}`;
}

/**
 * Inverse of {@link recordFqdn}: the name relative to the zone, or the zone
 * name itself for the apex.
 */
export function relativeName(fqdn: string, zoneName: string): string {
  const zone = cleanName(zoneName);
  const host = cleanName(fqdn);

  if (host === zone) {
    return zone;
  }
  if (host.endsWith(`.${zone}`)) {
    return host.slice(0, -(zone.length + 1));
  }
  return host;
}

/** True when `name` addresses the zone apex */
export function isApex(name: string, zoneName: string): boolean {
  return recordFqdn(name, zoneName) === cleanName(zoneName);
}
