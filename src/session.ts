import * as mssql from 'mssql';
import { ServerConfig } from './config';
import {
  ConnectionFailedError,
  ExecutionError,
  MigrationErrorCode,
  SqlServerErrorNumber,
  errorMessage,
  toMigrationError,
} from './errors';
import { Logger, logger as defaultLogger } from './logger';

export type ServerVersion = {
  major: number;
  minor: number;
  build: number;
  text: string;
};

export type QueryParams = Record<string, string | number | null>;

/**
 * An open connection to one SQL Server instance.
 */
export interface ServerSession {
  /** Domain instance name as reported by the server */
  readonly name: string;
  readonly version: ServerVersion;
  readonly edition: string;
  /** SERVERPROPERTY('EngineEdition'); 5 is Azure SQL Database */
  readonly engineEdition: number;
  query<T extends object>(sql: string, params?: QueryParams): Promise<T[]>;
  execute(sql: string): Promise<void>;
  close(): Promise<void>;
}

export function parseProductVersion(text: string): ServerVersion {
  const match = /^(\d+)\.(\d+)\.(\d+)/.exec(text.trim());
  if (!match) throw new ExecutionError(`Unrecognized product version "${text}"`);
  return { major: Number(match[1]), minor: Number(match[2]), build: Number(match[3]), text: text.trim() };
}

/**
 * Splits a script into batches on GO separator lines. Statements inside a
 * batch stay together so CREATE FUNCTION keeps its own batch.
 */
export function splitBatches(script: string): string[] {
  const text = script.replace(/^\ufeff/, '').replace(/\r\n?/g, '\n');
  const batches: string[] = [];
  let current: string[] = [];
  for (const line of text.split('\n')) {
    if (/^\s*GO\s*(--.*)?$/i.test(line)) {
      const batch = current.join('\n').trim();
      if (batch) batches.push(batch);
      current = [];
    } else {
      current.push(line);
    }
  }
  const last = current.join('\n').trim();
  if (last) batches.push(last);
  return batches;
}

export function toMssqlConfig(config: ServerConfig): mssql.config {
  const base: mssql.config = {
    server: config.host,
    port: config.port,
    database: config.database,
    options: {
      instanceName: config.instanceName,
      encrypt: config.encrypt,
      trustServerCertificate: config.trustServerCertificate,
      appName: 'rgmigrate',
    },
  };
  // mssql switches to NTLM once domain is set
  return { ...base, user: config.user, password: config.password, domain: config.domain };
}

type ServerPropertiesRow = {
  server_name: string | null;
  product_version: string;
  edition: string;
  engine_edition: number;
};

const SERVER_PROPERTIES_SQL = `SELECT CAST(SERVERPROPERTY('ServerName') AS nvarchar(256)) AS server_name,
       CAST(SERVERPROPERTY('ProductVersion') AS nvarchar(128)) AS product_version,
       CAST(SERVERPROPERTY('Edition') AS nvarchar(128)) AS edition,
       CAST(SERVERPROPERTY('EngineEdition') AS int) AS engine_edition`;

export class MssqlSession implements ServerSession {
  private constructor(
    private readonly pool: mssql.ConnectionPool,
    readonly name: string,
    readonly version: ServerVersion,
    readonly edition: string,
    readonly engineEdition: number,
  ) {}

  static async open(pool: mssql.ConnectionPool, fallbackName: string): Promise<MssqlSession> {
    const result = await pool.request().query<ServerPropertiesRow>(SERVER_PROPERTIES_SQL);
    const row = result.recordset[0];
    if (!row) throw new ExecutionError(`${fallbackName} returned no server properties`);
    return new MssqlSession(
      pool,
      row.server_name || fallbackName,
      parseProductVersion(row.product_version),
      row.edition,
      row.engine_edition,
    );
  }

  async query<T extends object>(sql: string, params: QueryParams = {}): Promise<T[]> {
    const request = this.pool.request();
    for (const [key, value] of Object.entries(params)) request.input(key, value);
    try {
      const result = await request.query<T>(sql);
      return result.recordset ? [...result.recordset] : [];
    } catch (e) {
      throw toMigrationError(e);
    }
  }

  async execute(sql: string): Promise<void> {
    for (const batch of splitBatches(sql)) {
      try {
        await this.pool.request().batch(batch);
      } catch (e) {
        throw toMigrationError(e);
      }
    }
  }

  async close(): Promise<void> {
    await this.pool.close();
  }
}

function describeConnectionError(config: ServerConfig, e: unknown): ConnectionFailedError {
  const code = typeof e === 'object' && e !== null && 'code' in e ? String(e.code) : undefined;
  const inner = e instanceof mssql.ConnectionError ? e.originalError : undefined;
  const number = typeof inner === 'object' && inner !== null && 'number' in inner && typeof inner.number === 'number'
    ? inner.number
    : undefined;

  if (number === SqlServerErrorNumber.LoginFailed || code === 'ELOGIN') {
    return new ConnectionFailedError(config.server, `login failed for ${config.domain ? `${config.domain}\\` : ''}${config.user}`, {
      code: MigrationErrorCode.LoginFailed,
      errorNumber: number,
      cause: e,
    });
  }
  if (code === 'ESOCKET' || code === 'ETIMEOUT' || code === 'EINSTLOOKUP') {
    return new ConnectionFailedError(config.server, `server unreachable (${code}): ${errorMessage(e)}`, {
      code: MigrationErrorCode.NetworkError,
      cause: e,
    });
  }
  return new ConnectionFailedError(config.server, errorMessage(e), { errorNumber: number, cause: e });
}

export async function openSession(config: ServerConfig, logger: Logger = defaultLogger): Promise<ServerSession> {
  const pool = new mssql.ConnectionPool(toMssqlConfig(config));
  try {
    await pool.connect();
  } catch (e) {
    const err = describeConnectionError(config, e);
    logger.error(err.message);
    throw err;
  }

  try {
    const session = await MssqlSession.open(pool, config.server);
    logger.info(`Connected to ${session.name} (${session.edition}, ${session.version.text})`);
    return session;
  } catch (e) {
    await pool.close();
    throw toMigrationError(e);
  }
}
