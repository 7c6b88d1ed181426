#!/usr/bin/env node
/**
 * zone-sync command line
 *
 *   zone-sync validate [--dir <path>]
 *   zone-sync plan     [--dir <path>] [--json]
 *   zone-sync apply    [--dir <path>] [--json]
 *
 * Configuration comes from the environment (see config.ts). Exits 1 on
 * configuration errors and when any provider operation failed.
 */

import { realpathSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { Command } from 'commander';
import { loadConfig, type ZoneSyncConfig } from './config.js';
import { ConfigurationError, formatErrorMessage } from './errors.js';
import { createLogger, type Logger } from './logger.js';
import { cloudflare, cloudflareTunnels } from './providers/cloudflare.js';
import { Route53Adapter, Route53Registrar } from './providers/route53.js';
import {
  applyPlan,
  compileDesiredState,
  countChanges,
  planOutputs,
  planReconciliation,
  type ReconcileClients,
  type ReconciliationPlan,
} from './reconcile.js';
import { validateDocuments } from './registry.js';
import { readDocumentStore } from './store.js';
import type { ZoneWarning } from './types.js';

export interface CliContext {
  config: ZoneSyncConfig;
  logger: Logger;
  createClients(config: ZoneSyncConfig): ReconcileClients;
  stdout(line: string): void;
  stderr(line: string): void;
}

/** Provider clients for whatever credentials the configuration carries */
export function createClients(config: ZoneSyncConfig): ReconcileClients {
  const retry = { attempts: config.retryAttempts };
  const clients: ReconcileClients = {
    route53: new Route53Adapter({ region: config.aws.region, retry }),
    registrar: new Route53Registrar({ retry }),
  };
  const { apiToken, accountId } = config.cloudflare;
  if (apiToken) {
    clients.cloudflare = cloudflare({ apiToken, accountId, retry });
    if (accountId) {
      clients.tunnels = cloudflareTunnels({ apiToken, accountId, retry });
    }
  }
  return clients;
}

function formatWarning(warning: ZoneWarning): string {
  const where = warning.field ? `${warning.document}: ${warning.field}` : warning.document;
  return `warning: ${where}: ${warning.message}`;
}

/**
 * One line per pending operation, `+` create, `~` update, `-` delete. Items
 * whose live state could not be read are marked `!`.
 */
export function formatPlan(plan: ReconciliationPlan): string[] {
  const lines: string[] = [];

  for (const zone of [...plan.route53, ...plan.cloudflare]) {
    if (zone.error !== undefined) {
      lines.push(`! ${zone.provider} ${zone.zoneName}: ${formatErrorMessage(zone.error)}`);
      continue;
    }
    if (!zone.zone) {
      lines.push(`+ ${zone.provider} zone ${zone.zoneName}`);
    }
    for (const change of zone.changes) {
      const marker = change.action === 'create' ? '+' : change.action === 'update' ? '~' : '-';
      lines.push(`${marker} ${zone.provider} ${zone.zoneName} ${change.identityKey}`);
    }
  }
  for (const tunnel of plan.tunnels) {
    if (tunnel.error !== undefined) {
      lines.push(
        `! cloudflare tunnel ${tunnel.tunnelNames.join(',')} (${tunnel.tunnelId}): ${formatErrorMessage(tunnel.error)}`
      );
      continue;
    }
    if (!tunnel.changed) continue;
    lines.push(
      `~ cloudflare tunnel ${tunnel.tunnelNames.join(',')} (${tunnel.tunnelId}): ${tunnel.desired.length} ingress rules`
    );
  }
  for (const { zone, sync, error } of plan.registrar) {
    if (!sync) {
      lines.push(`! registrar ${zone.zoneName}: ${formatErrorMessage(error)}`);
      continue;
    }
    if (!sync.changed) continue;
    lines.push(`~ registrar ${sync.domainName} nameservers ${sync.declared.join(',')}`);
  }

  const counts = countChanges(plan);
  lines.push(
    `Plan: ${counts.create} to create, ${counts.update} to update, ${counts.delete} to delete.`
  );
  return lines;
}

async function loadDocuments(dir: string) {
  const store = await readDocumentStore(dir);
  return { sources: store.zones, tunnelRegistry: store.tunnels };
}

export function createProgram(context: CliContext): Command {
  const { config, logger } = context;
  const program = new Command();

  program
    .name('zone-sync')
    .description('Reconcile Route 53 and Cloudflare zones with declarative zone documents');

  program
    .command('validate')
    .description('Validate zone documents without contacting any provider')
    .option('--dir <path>', 'Directory of zone documents', config.zonesDir)
    .action(async (opts: { dir: string }) => {
      const documents = await loadDocuments(opts.dir);
      const registry = { defaultProvider: config.defaultProvider, checkFileName: true };
      const result = validateDocuments(documents.sources, registry);

      for (const warning of result.warnings) context.stderr(formatWarning(warning));
      for (const error of result.errors) context.stderr(`error: ${error.message}`);

      if (result.errors.length > 0) {
        context.stderr(`${result.errors.length} invalid document(s)`);
        process.exitCode = 1;
        return;
      }

      // Cross-document checks: tunnels, proxy types, duplicate records
      compileDesiredState({ ...documents, registry });
      context.stdout(`${result.zoneCount} zone document(s) valid`);
    });

  program
    .command('plan')
    .description('Show the changes apply would make')
    .option('--dir <path>', 'Directory of zone documents', config.zonesDir)
    .option('--json', 'Print the planned outputs as JSON')
    .action(async (opts: { dir: string; json?: boolean }) => {
      const plan = await planReconciliation({
        ...(await loadDocuments(opts.dir)),
        registry: { defaultProvider: config.defaultProvider, checkFileName: true },
        clients: context.createClients(config),
        preserveExternalDns: config.preserveExternalDns,
        concurrency: config.concurrency,
        logger,
      });

      for (const warning of plan.warnings) context.stderr(formatWarning(warning));
      for (const line of formatPlan(plan)) context.stdout(line);
      if (opts.json) {
        context.stdout(JSON.stringify(planOutputs(plan), null, 2));
      }
    });

  program
    .command('apply')
    .description('Apply the planned changes')
    .option('--dir <path>', 'Directory of zone documents', config.zonesDir)
    .option('--json', 'Print the outputs as JSON')
    .action(async (opts: { dir: string; json?: boolean }) => {
      const clients = context.createClients(config);
      const plan = await planReconciliation({
        ...(await loadDocuments(opts.dir)),
        registry: { defaultProvider: config.defaultProvider, checkFileName: true },
        clients,
        preserveExternalDns: config.preserveExternalDns,
        concurrency: config.concurrency,
        logger,
      });

      for (const warning of plan.warnings) context.stderr(formatWarning(warning));
      for (const line of formatPlan(plan)) context.stdout(line);

      const result = await applyPlan(plan, {
        clients,
        concurrency: config.concurrency,
        logger,
      });

      for (const error of result.errors) context.stderr(`error: ${error.message}`);
      context.stdout(
        `Apply ${result.failed ? 'failed' : 'complete'}: ${result.applied} applied, ${result.errors.length} failed.`
      );
      if (opts.json) {
        context.stdout(JSON.stringify(result.outputs, null, 2));
      }
      if (result.failed) process.exitCode = 1;
    });

  return program;
}

export async function main(argv: string[] = process.argv): Promise<void> {
  let config: ZoneSyncConfig;
  try {
    config = loadConfig();
  } catch (err) {
    console.error(formatErrorMessage(err));
    process.exitCode = 1;
    return;
  }

  const logger = createLogger(config.logLevel);
  const program = createProgram({
    config,
    logger,
    createClients,
    stdout: (line) => console.log(line),
    stderr: (line) => console.error(line),
  });

  try {
    await program.parseAsync(argv);
  } catch (err) {
    if (err instanceof ConfigurationError) {
      console.error(`error: ${err.message}`);
    } else {
      logger.error('Run failed', err);
      console.error(formatErrorMessage(err));
    }
    process.exitCode = 1;
  }
}

function invokedDirectly(): boolean {
  const entry = process.argv[1];
  if (!entry) return false;
  try {
    return realpathSync(entry) === fileURLToPath(import.meta.url);
  } catch {
    return false;
  }
}

if (invokedDirectly()) {
  await main();
}
