import { ExecutionError } from './errors';
import { ClassifierFunction, GovernorSettings, ResourcePool, WorkloadGroup } from './types';

export const RECONFIGURE_SQL = 'ALTER RESOURCE GOVERNOR RECONFIGURE;';

/** Workload groups the engine creates on every server. Not configurable. */
export const RESERVED_WORKLOAD_GROUPS: readonly string[] = ['internal', 'default'];

/** Brackets an identifier the way QUOTENAME does. */
export function quoteName(name: string): string {
  return `[${name.replace(/]/g, ']]')}]`;
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Replaces every quoted occurrence of the source server name ('SRC') with
 * the destination name, ignoring case as instance names do. Unquoted text is
 * left alone.
 */
export function retargetScript(sql: string, sourceName: string, destinationName: string): string {
  if (!sourceName || sourceName.toLowerCase() === destinationName.toLowerCase()) return sql;
  const pattern = new RegExp(escapeRegExp(`'${sourceName}'`), 'gi');
  return sql.replace(pattern, () => `'${destinationName}'`);
}

export function classifierName(fn: Pick<ClassifierFunction, 'schema' | 'name'>): string {
  return `${quoteName(fn.schema)}.${quoteName(fn.name)}`;
}

export function scriptGovernorSettings(settings: GovernorSettings): string {
  const classifier = settings.classifierFunction ? classifierName(settings.classifierFunction) : 'NULL';
  return [
    `ALTER RESOURCE GOVERNOR WITH (CLASSIFIER_FUNCTION = ${classifier});`,
    settings.enabled ? RECONFIGURE_SQL : 'ALTER RESOURCE GOVERNOR DISABLE;',
  ].join('\n');
}

export function scriptResourcePool(pool: ResourcePool): string {
  const options = [
    `min_cpu_percent=${pool.minCpuPercent}`,
    `max_cpu_percent=${pool.maxCpuPercent}`,
    `min_memory_percent=${pool.minMemoryPercent}`,
    `max_memory_percent=${pool.maxMemoryPercent}`,
  ];
  if (pool.capCpuPercent !== undefined) options.push(`cap_cpu_percent=${pool.capCpuPercent}`);
  if (pool.minIopsPerVolume !== undefined) options.push(`min_iops_per_volume=${pool.minIopsPerVolume}`);
  if (pool.maxIopsPerVolume !== undefined) options.push(`max_iops_per_volume=${pool.maxIopsPerVolume}`);
  return `CREATE RESOURCE POOL ${quoteName(pool.name)} WITH(${options.join(', ')});`;
}

function workloadGroupBody(group: WorkloadGroup): string {
  const options = [
    `group_max_requests=${group.groupMaxRequests}`,
    `importance=${group.importance}`,
    `request_max_cpu_time_sec=${group.requestMaxCpuTimeSec}`,
    `request_max_memory_grant_percent=${group.requestMaxMemoryGrantPercent}`,
    `request_memory_grant_timeout_sec=${group.requestMemoryGrantTimeoutSec}`,
    `max_dop=${group.maxDop}`,
  ];
  let using = `USING ${quoteName(group.poolName)}`;
  if (group.externalPoolName !== undefined) using += `, EXTERNAL ${quoteName(group.externalPoolName)}`;
  return `WITH(${options.join(', ')}) ${using}`;
}

/**
 * Reserved groups (the engine's "default" group) already exist on every
 * server and can only be altered onto a pool, never created.
 */
export function scriptWorkloadGroup(group: WorkloadGroup, reservedGroups: readonly string[] = RESERVED_WORKLOAD_GROUPS): string {
  const verb = isReservedName(group.name, reservedGroups) ? 'ALTER' : 'CREATE';
  return `${verb} WORKLOAD GROUP ${quoteName(group.name)} ${workloadGroupBody(group)};`;
}

/**
 * Drops a destination pool and its groups. Reserved groups cannot be dropped,
 * so they are moved back to the default pool first.
 */
export function scriptDropResourcePool(pool: ResourcePool, reservedGroups: readonly string[] = RESERVED_WORKLOAD_GROUPS): string {
  const statements: string[] = [];
  for (const group of pool.workloadGroups) {
    if (isReservedName(group.name, reservedGroups)) {
      statements.push(`ALTER WORKLOAD GROUP ${quoteName(group.name)} USING ${quoteName('default')};`);
    } else {
      statements.push(`DROP WORKLOAD GROUP ${quoteName(group.name)};`);
    }
  }
  statements.push(`DROP RESOURCE POOL ${quoteName(pool.name)};`);
  statements.push(RECONFIGURE_SQL);
  return statements.join('\n');
}

/**
 * Recreates the classifier function in master. The body goes in its own
 * batch since CREATE FUNCTION must start one.
 */
export function scriptClassifierFunction(fn: ClassifierFunction, replaceExisting: boolean): string {
  if (fn.definition === null) {
    throw new ExecutionError(`Definition of classifier function ${classifierName(fn)} is not visible to this login`);
  }
  const batches: string[] = [];
  if (replaceExisting) {
    batches.push(
      [
        'ALTER RESOURCE GOVERNOR WITH (CLASSIFIER_FUNCTION = NULL);',
        RECONFIGURE_SQL,
        `DROP FUNCTION ${classifierName(fn)};`,
      ].join('\n'),
    );
  }
  batches.push(fn.definition.trim());
  return batches.join('\nGO\n');
}

export function isReservedName(name: string, reserved: readonly string[]): boolean {
  const lower = name.toLowerCase();
  return reserved.some(r => r.toLowerCase() === lower);
}
