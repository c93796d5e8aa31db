import { DEFAULT_MINIMUM_VERSION, DEFAULT_RESERVED_POOLS } from './config';
import { errorMessage } from './errors';
import { GovernorServer } from './governor';
import { Logger, logger as defaultLogger } from './logger';
import {
  RECONFIGURE_SQL,
  classifierName,
  isReservedName,
  retargetScript,
  scriptClassifierFunction,
  scriptDropResourcePool,
  scriptGovernorSettings,
  scriptResourcePool,
  scriptWorkloadGroup,
} from './scripter';
import { GovernorSettings, MigrationObjectType, MigrationResult, MigrationStatus, ResourcePool } from './types';
import { EditionSupport, checkCompatibility } from './version_gate';

export type CopyOptions = {
  /** Only these source pools; takes precedence over excludeResourcePools */
  resourcePools?: string[];
  excludeResourcePools?: string[];
  /** Pools owned by the engine; never copied */
  reservedPools?: string[];
  force?: boolean;
  dryRun?: boolean;
  minimumVersion?: number;
  logger?: Logger;
};

/**
 * Picks the source pools to copy. Reserved pools are never selected, even
 * when named in the include list.
 */
export function selectPools(
  pools: ResourcePool[],
  options: Pick<CopyOptions, 'resourcePools' | 'excludeResourcePools' | 'reservedPools'>,
  logger: Logger = defaultLogger,
): ResourcePool[] {
  const reserved = options.reservedPools ?? DEFAULT_RESERVED_POOLS;
  const include = options.resourcePools ?? [];
  const exclude = options.excludeResourcePools ?? [];

  if (include.length) {
    for (const name of include) {
      if (isReservedName(name, reserved)) {
        logger.warn(`Pool '${name}' is reserved by the engine and will not be copied`);
      } else if (!pools.some(p => p.name.toLowerCase() === name.toLowerCase())) {
        logger.warn(`Pool '${name}' does not exist on the source`);
      }
    }
    return pools.filter(p => isReservedName(p.name, include) && !isReservedName(p.name, reserved));
  }
  return pools.filter(p => !isReservedName(p.name, reserved) && !isReservedName(p.name, exclude));
}

class ResourceGovernorMigrator {
  private readonly results: MigrationResult[] = [];
  private readonly logger: Logger;
  private readonly force: boolean;
  private readonly dryRun: boolean;

  constructor(
    private readonly source: GovernorServer,
    private readonly destination: GovernorServer,
    private readonly options: CopyOptions,
  ) {
    this.logger = options.logger ?? defaultLogger;
    this.force = options.force ?? false;
    this.dryRun = options.dryRun ?? false;
  }

  async run(): Promise<MigrationResult[]> {
    const support = checkCompatibility(
      this.source,
      this.destination,
      this.logger,
      this.options.minimumVersion ?? DEFAULT_MINIMUM_VERSION,
    );

    if (support.source === 'none' || support.destination === 'none') {
      this.logger.warn('Resource Governor is not available in this edition; server settings are not copied');
      this.record('Resource Governor Settings', 'Resource Governor Settings', 'Skipped', 'Not supported by edition');
    } else {
      await this.copySettings();
    }

    await this.copyPools();
    await this.reconfigure(support.destination);
    return this.results;
  }

  private record(name: string, type: MigrationObjectType, status: MigrationStatus, notes?: string): void {
    this.results.push({
      sourceServer: this.source.name,
      destinationServer: this.destination.name,
      name,
      type,
      status,
      notes,
      dateTime: new Date(),
    });
  }

  private retarget(sql: string): string {
    return retargetScript(sql, this.source.name, this.destination.name);
  }

  private async apply(sql: string): Promise<void> {
    const script = this.retarget(sql);
    this.logger.debug(script);
    await this.destination.execute(script);
  }

  private async copySettings(): Promise<void> {
    let settings: GovernorSettings;
    try {
      settings = await this.source.readSettings();
    } catch (e) {
      this.logger.error(`Unable to read Resource Governor settings from ${this.source.name}: ${errorMessage(e)}`);
      this.record('Resource Governor Settings', 'Resource Governor Settings', 'Failed', errorMessage(e));
      return;
    }

    if (settings.classifierFunction) await this.copyClassifier(settings);

    if (this.dryRun) {
      this.logger.info(`[dry-run] Would update Resource Governor settings on ${this.destination.name}`);
      this.record('Resource Governor Settings', 'Resource Governor Settings', 'DryRun');
      return;
    }
    try {
      this.logger.info('Updating Resource Governor settings');
      await this.apply(scriptGovernorSettings(settings));
      this.record('Resource Governor Settings', 'Resource Governor Settings', 'Successful');
    } catch (e) {
      this.logger.error(`Not able to update settings: ${errorMessage(e)}`);
      this.record('Resource Governor Settings', 'Resource Governor Settings', 'Failed', errorMessage(e));
    }
  }

  private async copyClassifier(settings: GovernorSettings): Promise<void> {
    const fn = settings.classifierFunction;
    if (!fn) return;
    const name = classifierName(fn);
    const type: MigrationObjectType = 'Resource Governor Classifier Function';

    try {
      const exists = await this.destination.functionExists(fn.schema, fn.name);
      if (exists && !this.force) {
        this.logger.warn(`Classifier function ${name} was skipped because it already exists on ${this.destination.name}. Use --force to drop and recreate.`);
        this.record(name, type, 'Skipped', 'Already exists on destination');
        return;
      }
      if (this.dryRun) {
        this.logger.info(`[dry-run] Would ${exists ? 'drop and recreate' : 'create'} classifier function ${name} on ${this.destination.name}`);
        this.record(name, type, 'DryRun');
        return;
      }
      this.logger.info(`Copying classifier function ${name}`);
      await this.apply(scriptClassifierFunction(fn, exists));
      this.record(name, type, 'Successful');
    } catch (e) {
      this.logger.error(`Unable to copy classifier function ${name}: ${errorMessage(e)}`);
      this.record(name, type, 'Failed', errorMessage(e));
    }
  }

  private async copyPools(): Promise<void> {
    let pools: ResourcePool[];
    try {
      pools = selectPools(await this.source.listResourcePools(), this.options, this.logger);
    } catch (e) {
      this.logger.error(`Unable to list resource pools on ${this.source.name}: ${errorMessage(e)}`);
      this.record('Resource pools', 'Resource Governor Pool', 'Failed', errorMessage(e));
      return;
    }

    this.logger.info(`Migrating ${pools.length} resource pool(s)`);
    for (const pool of pools) {
      await this.copyPool(pool);
    }
  }

  /**
   * Returns false when the pool must not be created: it exists and force is
   * off, or the forced drop failed.
   */
  private async resolveConflict(pool: ResourcePool): Promise<boolean> {
    const existing = await this.destination.findResourcePool(pool.name);
    if (!existing) return true;

    if (!this.force) {
      this.logger.warn(`Pool '${pool.name}' was skipped because it already exists on ${this.destination.name}. Use --force to drop and recreate.`);
      this.record(pool.name, 'Resource Governor Pool', 'Skipped', 'Already exists on destination');
      return false;
    }
    if (this.dryRun) {
      this.logger.info(`[dry-run] Would drop pool '${existing.name}' and its ${existing.workloadGroups.length} workload group(s) on ${this.destination.name}`);
      return true;
    }

    this.logger.info(`Pool '${pool.name}' exists on ${this.destination.name}. Force specified. Dropping ${pool.name}.`);
    try {
      await this.apply(scriptDropResourcePool(existing));
      return true;
    } catch (e) {
      this.logger.error(`Unable to drop pool '${pool.name}': ${errorMessage(e)}. Moving on.`);
      this.record(pool.name, 'Resource Governor Pool', 'Failed', errorMessage(e));
      return false;
    }
  }

  private async copyPool(pool: ResourcePool): Promise<void> {
    let proceed: boolean;
    try {
      proceed = await this.resolveConflict(pool);
    } catch (e) {
      this.logger.error(`Unable to check pool '${pool.name}' on ${this.destination.name}: ${errorMessage(e)}`);
      this.record(pool.name, 'Resource Governor Pool', 'Failed', errorMessage(e));
      return;
    }
    if (!proceed) return;

    if (this.dryRun) {
      this.logger.info(`[dry-run] Would create pool '${pool.name}' with ${pool.workloadGroups.length} workload group(s) on ${this.destination.name}`);
      this.record(pool.name, 'Resource Governor Pool', 'DryRun');
      for (const group of pool.workloadGroups) this.record(group.name, 'Resource Governor Pool Workgroup', 'DryRun');
      return;
    }

    try {
      this.logger.info(`Copying pool '${pool.name}'`);
      await this.apply(scriptResourcePool(pool));
      this.record(pool.name, 'Resource Governor Pool', 'Successful');
    } catch (e) {
      this.logger.error(`Unable to migrate pool '${pool.name}': ${errorMessage(e)}`);
      this.record(pool.name, 'Resource Governor Pool', 'Failed', errorMessage(e));
      for (const group of pool.workloadGroups) {
        this.record(group.name, 'Resource Governor Pool Workgroup', 'Skipped', 'Pool was not created');
      }
      return;
    }

    for (const group of pool.workloadGroups) {
      try {
        this.logger.info(`Copying workload group '${group.name}'`);
        await this.apply(scriptWorkloadGroup(group));
        this.record(group.name, 'Resource Governor Pool Workgroup', 'Successful');
      } catch (e) {
        this.logger.error(`Unable to migrate workload group '${group.name}' in pool '${pool.name}': ${errorMessage(e)}`);
        this.record(group.name, 'Resource Governor Pool Workgroup', 'Failed', errorMessage(e));
      }
    }
  }

  private async reconfigure(destinationSupport: EditionSupport): Promise<void> {
    const name = 'Reconfigure Resource Governor';
    if (destinationSupport === 'none') {
      this.logger.warn(`Resource Governor cannot be reconfigured on the ${this.destination.edition} edition`);
      this.record(name, name, 'Skipped', 'Not supported by edition');
      return;
    }
    if (this.dryRun) {
      this.logger.info(`[dry-run] Would reconfigure Resource Governor on ${this.destination.name}`);
      this.record(name, name, 'DryRun');
      return;
    }
    try {
      this.logger.info('Reconfiguring Resource Governor');
      await this.apply(RECONFIGURE_SQL);
      this.record(name, name, 'Successful');
    } catch (e) {
      this.logger.error(`Unable to reconfigure Resource Governor: ${errorMessage(e)}`);
      this.record(name, name, 'Failed', errorMessage(e));
    }
  }
}

/**
 * Copies server settings, the classifier function and the selected resource
 * pools with their workload groups, then reconfigures the destination.
 * Throws only when the version gate fails; every other error ends up as a
 * Failed result.
 */
export function copyResourceGovernor(
  source: GovernorServer,
  destination: GovernorServer,
  options: CopyOptions = {},
): Promise<MigrationResult[]> {
  return new ResourceGovernorMigrator(source, destination, options).run();
}
