export type Importance = 'LOW' | 'MEDIUM' | 'HIGH';

export type ClassifierFunction = {
  schema: string;
  name: string;
  /** Body from OBJECT_DEFINITION; null when the login cannot see it */
  definition: string | null;
};

export type GovernorSettings = {
  enabled: boolean;
  classifierFunction: ClassifierFunction | null;
};

export type WorkloadGroup = {
  id: number;
  name: string;
  poolName: string;
  importance: Importance;
  requestMaxMemoryGrantPercent: number;
  requestMaxCpuTimeSec: number;
  requestMemoryGrantTimeoutSec: number;
  maxDop: number;
  groupMaxRequests: number;
  /** SQL Server 2016 and later */
  externalPoolName?: string;
};

export type ResourcePool = {
  id: number;
  name: string;
  minCpuPercent: number;
  maxCpuPercent: number;
  minMemoryPercent: number;
  maxMemoryPercent: number;
  /** SQL Server 2012 and later */
  capCpuPercent?: number;
  /** SQL Server 2014 and later */
  minIopsPerVolume?: number;
  maxIopsPerVolume?: number;
  workloadGroups: WorkloadGroup[];
};

export type MigrationStatus = 'Successful' | 'Skipped' | 'Failed' | 'DryRun';

export type MigrationObjectType =
  | 'Resource Governor Settings'
  | 'Resource Governor Classifier Function'
  | 'Resource Governor Pool'
  | 'Resource Governor Pool Workgroup'
  | 'Reconfigure Resource Governor';

export type MigrationResult = {
  sourceServer: string;
  destinationServer: string;
  name: string;
  type: MigrationObjectType;
  status: MigrationStatus;
  notes?: string;
  dateTime: Date;
};
