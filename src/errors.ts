/**
 * Error types raised while copying Resource Governor configuration.
 *
 * Only configuration, connection and version errors stop a run; everything
 * raised while scripting or executing DDL is caught by the migrator and
 * turned into a failed result.
 */

export enum MigrationErrorCode {
  ConfigurationError = 'CONFIGURATION_ERROR',
  ConnectionFailed = 'CONNECTION_FAILED',
  LoginFailed = 'LOGIN_FAILED',
  NetworkError = 'NETWORK_ERROR',
  UnsupportedVersion = 'UNSUPPORTED_VERSION',
  ExecutionError = 'EXECUTION_ERROR',
}

/**
 * SQL Server error numbers the tool reports specifically.
 */
export enum SqlServerErrorNumber {
  LoginFailed = 18456,
}

export class MigrationError extends Error {
  readonly code: MigrationErrorCode;
  /** SQL Server error number, when the server raised it */
  readonly errorNumber?: number;
  readonly details?: Record<string, unknown>;

  constructor(options: {
    code: MigrationErrorCode;
    message: string;
    errorNumber?: number;
    details?: Record<string, unknown>;
    cause?: unknown;
  }) {
    super(options.message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'MigrationError';
    this.code = options.code;
    this.errorNumber = options.errorNumber;
    this.details = options.details;
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      errorNumber: this.errorNumber,
      message: this.message,
      details: this.details,
    };
  }
}

export class ConfigurationError extends MigrationError {
  constructor(message: string) {
    super({ code: MigrationErrorCode.ConfigurationError, message: `Configuration error: ${message}` });
    this.name = 'ConfigurationError';
  }
}

export class ConnectionFailedError extends MigrationError {
  readonly server: string;

  constructor(server: string, message: string, options: { code?: MigrationErrorCode; errorNumber?: number; cause?: unknown } = {}) {
    super({
      code: options.code ?? MigrationErrorCode.ConnectionFailed,
      message: `Failed to connect to ${server}: ${message}`,
      errorNumber: options.errorNumber,
      details: { server },
      cause: options.cause,
    });
    this.name = 'ConnectionFailedError';
    this.server = server;
  }
}

export class UnsupportedVersionError extends MigrationError {
  readonly server: string;
  readonly majorVersion: number;
  readonly minimumVersion: number;

  constructor(server: string, majorVersion: number, minimumVersion: number) {
    super({
      code: MigrationErrorCode.UnsupportedVersion,
      message: `${server} reports major version ${majorVersion}; Resource Governor requires version ${minimumVersion} or later`,
      details: { server, majorVersion, minimumVersion },
    });
    this.name = 'UnsupportedVersionError';
    this.server = server;
    this.majorVersion = majorVersion;
    this.minimumVersion = minimumVersion;
  }
}

export class ExecutionError extends MigrationError {
  readonly lineNumber?: number;

  constructor(message: string, options: { errorNumber?: number; lineNumber?: number; serverName?: string; cause?: unknown } = {}) {
    super({
      code: MigrationErrorCode.ExecutionError,
      message,
      errorNumber: options.errorNumber,
      details: options.serverName ? { serverName: options.serverName } : undefined,
      cause: options.cause,
    });
    this.name = 'ExecutionError';
    this.lineNumber = options.lineNumber;
  }
}

/**
 * Shape of the fields mssql puts on a RequestError raised by the server.
 */
interface ServerErrorFields {
  message: string;
  number?: number;
  lineNumber?: number;
  serverName?: string;
}

function hasServerErrorFields(err: unknown): err is ServerErrorFields {
  return (
    typeof err === 'object' &&
    err !== null &&
    'number' in err &&
    typeof err.number === 'number' &&
    'message' in err &&
    typeof err.message === 'string'
  );
}

/**
 * Normalizes anything thrown by the driver into a MigrationError.
 */
export function toMigrationError(err: unknown): MigrationError {
  if (err instanceof MigrationError) return err;
  if (hasServerErrorFields(err)) {
    return new ExecutionError(err.message, {
      errorNumber: err.number,
      lineNumber: err.lineNumber,
      serverName: err.serverName,
      cause: err,
    });
  }
  if (err instanceof Error) return new ExecutionError(err.message, { cause: err });
  return new ExecutionError(String(err));
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
