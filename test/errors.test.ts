import {
  ConfigurationError,
  ExecutionError,
  MigrationError,
  MigrationErrorCode,
  UnsupportedVersionError,
  errorMessage,
  toMigrationError,
} from '../src/errors';

describe('toMigrationError', () => {
  it('returns migration errors unchanged', () => {
    const err = new ConfigurationError('missing server');
    expect(toMigrationError(err)).toBe(err);
  });

  it('keeps the server error number and line', () => {
    const driverError = Object.assign(new Error("Cannot drop the workload group 'default'."), {
      number: 10916,
      lineNumber: 2,
      serverName: 'SQL02',
    });
    const err = toMigrationError(driverError);
    expect(err).toBeInstanceOf(ExecutionError);
    expect(err.errorNumber).toBe(10916);
    expect(err.message).toBe("Cannot drop the workload group 'default'.");
    expect(err.toJSON()).toEqual({
      name: 'ExecutionError',
      code: MigrationErrorCode.ExecutionError,
      errorNumber: 10916,
      message: "Cannot drop the workload group 'default'.",
      details: { serverName: 'SQL02' },
    });
    expect(err instanceof ExecutionError && err.lineNumber).toBe(2);
    expect(err.cause).toBe(driverError);
  });

  it('wraps plain errors and other values', () => {
    expect(toMigrationError(new Error('socket hang up')).message).toBe('socket hang up');
    expect(toMigrationError('boom')).toBeInstanceOf(MigrationError);
    expect(toMigrationError('boom').message).toBe('boom');
  });
});

describe('UnsupportedVersionError', () => {
  it('carries the version details', () => {
    const err = new UnsupportedVersionError('SQL01', 9, 10);
    expect(err.code).toBe(MigrationErrorCode.UnsupportedVersion);
    expect(err.details).toEqual({ server: 'SQL01', majorVersion: 9, minimumVersion: 10 });
  });
});

describe('errorMessage', () => {
  it('reads messages from errors and stringifies the rest', () => {
    expect(errorMessage(new Error('x'))).toBe('x');
    expect(errorMessage(42)).toBe('42');
  });
});
