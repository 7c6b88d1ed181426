/**
 * Live test: plan a reconciliation against real accounts without applying it.
 *
 * Usage:
 *   AWS_PROFILE=dns CLOUDFLARE_API_TOKEN=xxx npx tsx examples/plan.ts examples/dns_zones
 */

import {
  compileDesiredState,
  countChanges,
  formatErrorMessage,
  planReconciliation,
  readDocumentStore,
} from '../src/index.js';
import { cloudflare } from '../src/providers/cloudflare.js';
import { Route53Adapter, Route53Registrar } from '../src/providers/route53.js';

const dir = process.argv[2] ?? 'examples/dns_zones';
const apiToken = process.env.CLOUDFLARE_API_TOKEN;

async function main() {
  const store = await readDocumentStore(dir);
  const input = { sources: store.zones, tunnelRegistry: store.tunnels };

  const desired = compileDesiredState(input);
  console.log(`Compiled ${desired.zones.size} zone(s) from ${dir}`);
  for (const { zone, records } of [...desired.route53, ...desired.cloudflare]) {
    console.log(`  ${zone.zoneName} (${zone.providers.join(', ')}): ${records.length} record(s)`);
  }

  if (desired.cloudflare.length > 0 && !apiToken) {
    console.error('\nMissing CLOUDFLARE_API_TOKEN environment variable.');
    console.error('Required permission: Zone > DNS > Read');
    process.exit(1);
  }

  const plan = await planReconciliation({
    ...input,
    clients: {
      route53: new Route53Adapter(),
      registrar: new Route53Registrar(),
      cloudflare: apiToken ? cloudflare({ apiToken }) : undefined,
    },
  });

  for (const zone of [...plan.route53, ...plan.cloudflare]) {
    if (zone.error !== undefined) {
      console.log(`\n${zone.provider} ${zone.zoneName}: could not read live state (${formatErrorMessage(zone.error)})`);
      continue;
    }
    console.log(`\n${zone.provider} ${zone.zoneName}${zone.zone ? '' : ' (new zone)'}`);
    for (const change of zone.changes) {
      console.log(`  ${change.action} ${change.identityKey}`);
    }
  }

  const counts = countChanges(plan);
  console.log(`\nDone! ${counts.create} to create, ${counts.update} to update, ${counts.delete} to delete.`);
}

main().catch((err: unknown) => {
  console.error('\nError:', err instanceof Error ? err.message : err);
  process.exit(1);
});
