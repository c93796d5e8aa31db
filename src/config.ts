import { config as loadEnv } from 'dotenv';
import { ConfigurationError } from './errors';
loadEnv();

export const DEFAULT_RESERVED_POOLS = ['internal', 'default'];
export const DEFAULT_MINIMUM_VERSION = 10;

export type ServerConfig = {
  /** Identifier as typed by the user: host, host\instance or host,port */
  server: string;
  host: string;
  instanceName?: string;
  port?: number;
  user: string;
  password: string;
  /** Set when the user is written DOMAIN\user; the session then uses NTLM. */
  domain?: string;
  /** Always master: the classifier function and catalog views are read there. */
  database: string;
  encrypt: boolean;
  trustServerCertificate: boolean;
};

export type ServerOverrides = {
  server?: string;
  user?: string;
  password?: string;
};

export type ServerIdentifier = {
  host: string;
  instanceName?: string;
  port?: number;
};

export function parseServerIdentifier(value: string): ServerIdentifier {
  const trimmed = value.trim();
  if (!trimmed) throw new ConfigurationError('server identifier is empty');

  const comma = trimmed.lastIndexOf(',');
  if (comma >= 0) {
    const host = trimmed.slice(0, comma).trim();
    const portText = trimmed.slice(comma + 1).trim();
    const port = Number(portText);
    if (!host || !/^\d+$/.test(portText) || port < 1 || port > 65535) {
      throw new ConfigurationError(`invalid server identifier "${value}"`);
    }
    // the port wins over an instance name
    const slash = host.indexOf('\\');
    if (slash === 0) throw new ConfigurationError(`invalid server identifier "${value}"`);
    return { host: slash > 0 ? host.slice(0, slash) : host, port };
  }

  const slash = trimmed.indexOf('\\');
  if (slash >= 0) {
    const host = trimmed.slice(0, slash);
    const instanceName = trimmed.slice(slash + 1);
    if (!host || !instanceName) throw new ConfigurationError(`invalid server identifier "${value}"`);
    return { host, instanceName };
  }

  return { host: trimmed };
}

function parseBoolean(name: string, value: string | undefined, fallback: boolean): boolean {
  if (value === undefined || value === '') return fallback;
  switch (value.trim().toLowerCase()) {
    case 'true':
    case '1':
    case 'yes':
      return true;
    case 'false':
    case '0':
    case 'no':
      return false;
    default:
      throw new ConfigurationError(`${name} must be true or false, got "${value}"`);
  }
}

export function parseList(value: string | string[] | undefined): string[] {
  if (value === undefined) return [];
  const parts = Array.isArray(value) ? value.flatMap(v => v.split(',')) : value.split(',');
  const out: string[] = [];
  for (const part of parts) {
    const s = part.trim();
    if (s) out.push(s);
  }
  return out;
}

export function fromEnv(prefix: string, overrides: ServerOverrides = {}, env: NodeJS.ProcessEnv = process.env): ServerConfig {
  const p = prefix.toUpperCase();
  const server = overrides.server || env[`${p}_SERVER`];
  const rawUser = overrides.user || env[`${p}_USER`];
  const password = overrides.password || env[`${p}_PASSWORD`];

  if (!server || !rawUser || !password) {
    const missing = [
      [`${p}_SERVER`, server],
      [`${p}_USER`, rawUser],
      [`${p}_PASSWORD`, password],
    ].filter(([, v]) => !v).map(([n]) => n).join(', ');
    throw new ConfigurationError(`missing settings for ${p}: ${missing}`);
  }

  const id = parseServerIdentifier(server);
  let user = rawUser;
  let domain: string | undefined;
  const slash = rawUser.indexOf('\\');
  if (slash > 0) {
    domain = rawUser.slice(0, slash);
    user = rawUser.slice(slash + 1);
  }

  return {
    server,
    host: id.host,
    instanceName: id.instanceName,
    port: id.port,
    user,
    password,
    domain,
    database: 'master',
    encrypt: parseBoolean(`${p}_ENCRYPT`, env[`${p}_ENCRYPT`], true),
    trustServerCertificate: parseBoolean(`${p}_TRUST_SERVER_CERTIFICATE`, env[`${p}_TRUST_SERVER_CERTIFICATE`], false),
  };
}

export type ProjectConfig = {
  source: ServerConfig;
  destination: ServerConfig;
  reservedPools: string[];
  minimumVersion: number;
};

export type ProjectOverrides = {
  source?: ServerOverrides;
  destination?: ServerOverrides;
  reservedPools?: string;
};

export function loadProjectConfig(overrides: ProjectOverrides = {}, env: NodeJS.ProcessEnv = process.env): ProjectConfig {
  const reserved = parseList(overrides.reservedPools ?? env.RG_RESERVED_POOLS);

  const minimumText = env.RG_MINIMUM_VERSION;
  let minimumVersion = DEFAULT_MINIMUM_VERSION;
  if (minimumText) {
    minimumVersion = Number(minimumText);
    if (!Number.isInteger(minimumVersion) || minimumVersion < 1) {
      throw new ConfigurationError(`RG_MINIMUM_VERSION must be a positive integer, got "${minimumText}"`);
    }
  }

  return {
    source: fromEnv('SOURCE', overrides.source, env),
    destination: fromEnv('DESTINATION', overrides.destination, env),
    reservedPools: reserved.length ? reserved : [...DEFAULT_RESERVED_POOLS],
    minimumVersion,
  };
}
