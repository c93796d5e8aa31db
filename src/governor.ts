import { ExecutionError } from './errors';
import { classifierName } from './scripter';
import { ServerSession, ServerVersion } from './session';
import { GovernorSettings, Importance, ResourcePool, WorkloadGroup } from './types';

/**
 * Resource Governor view of one server: live catalog reads plus DDL execution.
 * Nothing is cached, every call queries the server again.
 */
export interface GovernorServer {
  readonly name: string;
  readonly version: ServerVersion;
  readonly edition: string;
  readonly engineEdition: number;
  readSettings(): Promise<GovernorSettings>;
  listResourcePools(): Promise<ResourcePool[]>;
  findResourcePool(name: string): Promise<ResourcePool | null>;
  functionExists(schema: string, name: string): Promise<boolean>;
  execute(sql: string): Promise<void>;
}

type SettingsRow = {
  is_enabled: boolean;
  classifier_schema: string | null;
  classifier_name: string | null;
  classifier_definition: string | null;
};

type PoolRow = {
  pool_id: number;
  name: string;
  min_cpu_percent: number;
  max_cpu_percent: number;
  min_memory_percent: number;
  max_memory_percent: number;
  cap_cpu_percent?: number;
  min_iops_per_volume?: number;
  max_iops_per_volume?: number;
};

type GroupRow = {
  group_id: number;
  name: string;
  pool_name: string;
  importance: string;
  request_max_memory_grant_percent: number;
  request_max_cpu_time_sec: number;
  request_memory_grant_timeout_sec: number;
  max_dop: number;
  group_max_requests: number;
  external_pool_name?: string | null;
};

const SETTINGS_SQL = `SELECT c.is_enabled,
       OBJECT_SCHEMA_NAME(c.classifier_function_id) AS classifier_schema,
       OBJECT_NAME(c.classifier_function_id) AS classifier_name,
       OBJECT_DEFINITION(c.classifier_function_id) AS classifier_definition
FROM sys.resource_governor_configuration AS c`;

// cap_cpu_percent arrived in 2012 (11), IOPS limits in 2014 (12), external pools in 2016 (13),
// fractional memory grant percentages in 2019 (15)
export function poolQuery(major: number, byName: boolean): string {
  const columns = ['p.pool_id', 'p.name', 'p.min_cpu_percent', 'p.max_cpu_percent', 'p.min_memory_percent', 'p.max_memory_percent'];
  if (major >= 11) columns.push('p.cap_cpu_percent');
  if (major >= 12) columns.push('p.min_iops_per_volume', 'p.max_iops_per_volume');
  return [
    `SELECT ${columns.join(', ')}`,
    'FROM sys.resource_governor_resource_pools AS p',
    byName ? 'WHERE p.name = @name' : null,
    'ORDER BY p.pool_id',
  ].filter(Boolean).join('\n');
}

export function groupQuery(major: number, byPoolName: boolean): string {
  const columns = [
    'g.group_id',
    'g.name',
    'p.name AS pool_name',
    'g.importance',
    major >= 15
      ? 'g.request_max_memory_grant_percent_numeric AS request_max_memory_grant_percent'
      : 'g.request_max_memory_grant_percent',
    'g.request_max_cpu_time_sec',
    'g.request_memory_grant_timeout_sec',
    'g.max_dop',
    'g.group_max_requests',
  ];
  const joins = ['JOIN sys.resource_governor_resource_pools AS p ON p.pool_id = g.pool_id'];
  if (major >= 13) {
    columns.push('e.name AS external_pool_name');
    joins.push('LEFT JOIN sys.resource_governor_external_resource_pools AS e ON e.external_pool_id = g.external_pool_id');
  }
  return [
    `SELECT ${columns.join(', ')}`,
    'FROM sys.resource_governor_workload_groups AS g',
    ...joins,
    byPoolName ? 'WHERE p.name = @name' : null,
    'ORDER BY g.group_id',
  ].filter(Boolean).join('\n');
}

const FUNCTION_EXISTS_SQL = `SELECT OBJECT_ID(@name, N'FN') AS object_id`;

export function toImportance(value: string): Importance {
  const upper = value.trim().toUpperCase();
  if (upper === 'LOW' || upper === 'MEDIUM' || upper === 'HIGH') return upper;
  throw new ExecutionError(`Unknown workload group importance "${value}"`);
}

function toWorkloadGroup(row: GroupRow): WorkloadGroup {
  const group: WorkloadGroup = {
    id: row.group_id,
    name: row.name,
    poolName: row.pool_name,
    importance: toImportance(row.importance),
    requestMaxMemoryGrantPercent: row.request_max_memory_grant_percent,
    requestMaxCpuTimeSec: row.request_max_cpu_time_sec,
    requestMemoryGrantTimeoutSec: row.request_memory_grant_timeout_sec,
    maxDop: row.max_dop,
    groupMaxRequests: row.group_max_requests,
  };
  if (row.external_pool_name !== undefined && row.external_pool_name !== null) {
    group.externalPoolName = row.external_pool_name;
  }
  return group;
}

function toResourcePool(row: PoolRow, groups: WorkloadGroup[]): ResourcePool {
  const pool: ResourcePool = {
    id: row.pool_id,
    name: row.name,
    minCpuPercent: row.min_cpu_percent,
    maxCpuPercent: row.max_cpu_percent,
    minMemoryPercent: row.min_memory_percent,
    maxMemoryPercent: row.max_memory_percent,
    workloadGroups: groups.filter(g => g.poolName === row.name),
  };
  if (row.cap_cpu_percent !== undefined) pool.capCpuPercent = row.cap_cpu_percent;
  if (row.min_iops_per_volume !== undefined) pool.minIopsPerVolume = row.min_iops_per_volume;
  if (row.max_iops_per_volume !== undefined) pool.maxIopsPerVolume = row.max_iops_per_volume;
  return pool;
}

export class SqlGovernorServer implements GovernorServer {
  constructor(private readonly session: ServerSession) {}

  get name(): string {
    return this.session.name;
  }

  get version(): ServerVersion {
    return this.session.version;
  }

  get edition(): string {
    return this.session.edition;
  }

  get engineEdition(): number {
    return this.session.engineEdition;
  }

  async readSettings(): Promise<GovernorSettings> {
    const [row] = await this.session.query<SettingsRow>(SETTINGS_SQL);
    if (!row) throw new ExecutionError(`${this.name} returned no Resource Governor configuration`);
    return {
      enabled: Boolean(row.is_enabled),
      classifierFunction:
        row.classifier_schema && row.classifier_name
          ? { schema: row.classifier_schema, name: row.classifier_name, definition: row.classifier_definition }
          : null,
    };
  }

  async listResourcePools(): Promise<ResourcePool[]> {
    const major = this.version.major;
    const pools = await this.session.query<PoolRow>(poolQuery(major, false));
    const groups = (await this.session.query<GroupRow>(groupQuery(major, false))).map(toWorkloadGroup);
    return pools.map(p => toResourcePool(p, groups));
  }

  async findResourcePool(name: string): Promise<ResourcePool | null> {
    const major = this.version.major;
    const [row] = await this.session.query<PoolRow>(poolQuery(major, true), { name });
    if (!row) return null;
    const groups = (await this.session.query<GroupRow>(groupQuery(major, true), { name: row.name })).map(toWorkloadGroup);
    return toResourcePool(row, groups);
  }

  async functionExists(schema: string, name: string): Promise<boolean> {
    const [row] = await this.session.query<{ object_id: number | null }>(FUNCTION_EXISTS_SQL, {
      name: classifierName({ schema, name }),
    });
    return row !== undefined && row.object_id !== null;
  }

  execute(sql: string): Promise<void> {
    return this.session.execute(sql);
  }
}
