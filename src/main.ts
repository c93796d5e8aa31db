#!/usr/bin/env node
import { Command } from 'commander';
import { fromEnv, loadProjectConfig, parseList } from './config';
import { SessionOpener, testConnection } from './connection_test';
import { SqlGovernorServer } from './governor';
import { Logger, logger as defaultLogger } from './logger';
import { copyResourceGovernor } from './migrator';
import { countByStatus, logSummary } from './report';
import { ServerSession, openSession } from './session';
import { MigrationResult } from './types';

export type CopyCommandOptions = {
  source?: string;
  sourceUser?: string;
  sourcePassword?: string;
  destination?: string;
  destinationUser?: string;
  destinationPassword?: string;
  resourcePool?: string[];
  excludeResourcePool?: string[];
  reservedPools?: string;
  force?: boolean;
  dryRun?: boolean;
};

export type TestCommandOptions = {
  sourceOnly?: boolean;
  destinationOnly?: boolean;
};

export type CliDeps = {
  open: SessionOpener;
  logger: Logger;
};

/** Exit code when the run finished but at least one object failed to copy. */
export const EXIT_PARTIAL_FAILURE = 2;

export async function runCopy(opts: CopyCommandOptions, deps: CliDeps): Promise<MigrationResult[]> {
  const { logger } = deps;
  const cfg = loadProjectConfig({
    source: { server: opts.source, user: opts.sourceUser, password: opts.sourcePassword },
    destination: { server: opts.destination, user: opts.destinationUser, password: opts.destinationPassword },
    reservedPools: opts.reservedPools,
  });

  const sourceSession: ServerSession = await deps.open(cfg.source, logger);
  try {
    const destinationSession: ServerSession = await deps.open(cfg.destination, logger);
    try {
      return await copyResourceGovernor(new SqlGovernorServer(sourceSession), new SqlGovernorServer(destinationSession), {
        resourcePools: parseList(opts.resourcePool),
        excludeResourcePools: parseList(opts.excludeResourcePool),
        reservedPools: cfg.reservedPools,
        force: opts.force ?? false,
        dryRun: opts.dryRun ?? false,
        minimumVersion: cfg.minimumVersion,
        logger,
      });
    } finally {
      await destinationSession.close();
    }
  } finally {
    await sourceSession.close();
  }
}

export function buildProgram(deps: CliDeps = { open: openSession, logger: defaultLogger }): Command {
  const { logger } = deps;
  const program = new Command();

  program
    .name('rgmigrate')
    .description('Copy SQL Server Resource Governor pools, workload groups and settings between instances')
    .version('0.1.0');

  program.command('copy')
    .description('Copy Resource Governor configuration from source to destination')
    .option('--source <server>', 'Source server (host, host\\instance or host,port); defaults to SOURCE_SERVER')
    .option('--source-user <user>', 'Source login; DOMAIN\\user for Windows authentication')
    .option('--source-password <password>', 'Source password')
    .option('--destination <server>', 'Destination server; defaults to DESTINATION_SERVER')
    .option('--destination-user <user>', 'Destination login')
    .option('--destination-password <password>', 'Destination password')
    .option('--resource-pool <names...>', 'Only copy these pools')
    .option('--exclude-resource-pool <names...>', 'Skip these pools')
    .option('--reserved-pools <list>', 'Comma separated pools owned by the engine (default internal,default)')
    .option('--force', 'Drop and recreate pools that already exist on the destination')
    .option('--dry-run', 'Describe the changes without executing them')
    .action(async (opts: CopyCommandOptions) => {
      const results = await runCopy(opts, deps);
      logSummary(results, logger);
      if (countByStatus(results).Failed > 0) process.exitCode = EXIT_PARTIAL_FAILURE;
    });

  program.command('test')
    .description('Test connections')
    .option('--source-only', 'Only source')
    .option('--destination-only', 'Only destination')
    .action(async (opts: TestCommandOptions) => {
      let ok = true;
      if (!opts.destinationOnly) {
        const r = await testConnection(fromEnv('SOURCE'), 'source', logger, deps.open);
        logger.info(JSON.stringify(r, null, 2));
        ok = ok && r.success;
      }
      if (!opts.sourceOnly) {
        const r = await testConnection(fromEnv('DESTINATION'), 'destination', logger, deps.open);
        logger.info(JSON.stringify(r, null, 2));
        ok = ok && r.success;
      }
      if (!ok) process.exitCode = 1;
    });

  return program;
}

if (require.main === module) {
  buildProgram().parseAsync(process.argv).catch((err: unknown) => {
    defaultLogger.error(err instanceof Error ? err.message : String(err));
    process.exit(1);
  });
}
