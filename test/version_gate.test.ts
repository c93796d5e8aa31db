import { UnsupportedVersionError } from '../src/errors';
import { assertSupportedVersion, checkCompatibility, editionSupport } from '../src/version_gate';
import { messages, silentLogger } from './support/logger';

const server = (name: string, major: number, edition = 'Enterprise Edition (64-bit)', engineEdition = 3) => ({
  name,
  version: { major },
  edition,
  engineEdition,
});

describe('editionSupport', () => {
  it.each([
    ['Enterprise Edition: Core-based Licensing (64-bit)', 3, 'full'],
    ['Developer Edition (64-bit)', 3, 'full'],
    ['Datacenter Edition (64-bit)', 3, 'full'],
    ['Standard Edition (64-bit)', 2, 'metadata'],
    ['Web Edition (64-bit)', 2, 'metadata'],
    ['Express Edition with Advanced Services (64-bit)', 4, 'none'],
    ['SQL Azure', 5, 'none'],
  ] as const)('classifies %s', (edition, engineEdition, expected) => {
    expect(editionSupport(edition, engineEdition)).toBe(expected);
  });
});

describe('assertSupportedVersion', () => {
  it('accepts the minimum version', () => {
    expect(() => assertSupportedVersion(server('sql01', 10), 10)).not.toThrow();
  });

  it('rejects older versions', () => {
    expect(() => assertSupportedVersion(server('sql01', 9), 10)).toThrow(UnsupportedVersionError);
  });
});

describe('checkCompatibility', () => {
  it('rejects an old source', () => {
    expect(() => checkCompatibility(server('old', 9), server('new', 15), silentLogger())).toThrow(
      'old reports major version 9; Resource Governor requires version 10 or later',
    );
  });

  it('rejects an old destination', () => {
    expect(() => checkCompatibility(server('new', 15), server('old', 9), silentLogger())).toThrow(UnsupportedVersionError);
  });

  it('warns when the destination cannot enforce the governor', () => {
    const logger = silentLogger();
    const warn = jest.spyOn(logger, 'warn');
    const support = checkCompatibility(server('src', 15), server('dst', 15, 'Standard Edition (64-bit)', 2), logger);
    expect(support).toEqual({ source: 'full', destination: 'metadata' });
    expect(messages(warn)).toHaveLength(1);
    expect(messages(warn)[0]).toMatch(/^Resource Governor is not fully supported by the Standard Edition \(64-bit\) edition on dst\./);
  });

  it('stays quiet for two full editions', () => {
    const logger = silentLogger();
    const warn = jest.spyOn(logger, 'warn');
    checkCompatibility(server('src', 13), server('dst', 16), logger);
    expect(warn).not.toHaveBeenCalled();
  });
});
