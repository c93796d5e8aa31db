import { DEFAULT_MINIMUM_VERSION } from './config';
import { UnsupportedVersionError } from './errors';
import { Logger } from './logger';

export type EditionSupport = 'full' | 'metadata' | 'none';

/** SERVERPROPERTY('EngineEdition') of Azure SQL Database */
const ENGINE_EDITION_AZURE_SQL_DATABASE = 5;

type GatedServer = {
  readonly name: string;
  readonly version: { major: number };
  readonly edition: string;
  readonly engineEdition: number;
};

export function editionSupport(edition: string, engineEdition: number): EditionSupport {
  if (engineEdition === ENGINE_EDITION_AZURE_SQL_DATABASE || /express/i.test(edition)) return 'none';
  if (/enterprise|datacenter|developer|evaluation/i.test(edition)) return 'full';
  return 'metadata';
}

export function assertSupportedVersion(server: GatedServer, minimum: number = DEFAULT_MINIMUM_VERSION): void {
  if (server.version.major < minimum) {
    throw new UnsupportedVersionError(server.name, server.version.major, minimum);
  }
}

/**
 * Fails on either side running a version without Resource Governor, then
 * warns when the destination edition will not enforce what gets copied.
 */
export function checkCompatibility(
  source: GatedServer,
  destination: GatedServer,
  logger: Logger,
  minimum: number = DEFAULT_MINIMUM_VERSION,
): { source: EditionSupport; destination: EditionSupport } {
  assertSupportedVersion(source, minimum);
  assertSupportedVersion(destination, minimum);

  const sourceSupport = editionSupport(source.edition, source.engineEdition);
  const destinationSupport = editionSupport(destination.edition, destination.engineEdition);
  if (destinationSupport !== 'full') {
    logger.warn(
      `Resource Governor is not fully supported by the ${destination.edition} edition on ${destination.name}. ` +
        'Metadata can be changed but the configuration will not be enforced. ' +
        'Only Enterprise, Datacenter and Developer editions enforce Resource Governor.',
    );
  }
  return { source: sourceSupport, destination: destinationSupport };
}
