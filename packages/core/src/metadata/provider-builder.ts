/*
 * PACKAGE.broker
 * Copyright (C) 2025 Łukasz Bajsarowicz
 * Licensed under AGPL-3.0
 */

import { COMPOSER_FIELDS, ZIP_TYPE, type RepositoryContext } from '@composer-index/shared';
import { ExtractionError, toError } from '../errors';
import { jsonMap, type JsonMap } from '../json/value';
import type { ManifestExtractor, ZipballPathBuilder } from '../ports';
import { getLogger, type Logger } from '../utils/logger';
import { buildPackageInfo } from './package-info';
import { buildZipballPath } from './paths';
import { formatComposerTime } from './time';

/**
 * A hosted component with its primary asset already loaded
 */
export interface HostedComponent {
  group: string;
  name: string;
  version: string;
  archive: Uint8Array;
  lastUpdated: Date;
  checksum: string | null;
}

export interface ProviderBuildOptions {
  extractor: ManifestExtractor;
  paths?: ZipballPathBuilder;
  logger?: Logger;
}

/**
 * Synthesize a provider document for hosted components.
 *
 * For hosted zips the checksum serves as both dist reference and shasum.
 * Versions of the same package are grouped in component order; a repeated
 * (name, version) overwrites the earlier one.
 *
 * A component whose manifest cannot be extracted aborts the whole build,
 * so no partial document is ever returned.
 */
export function buildProviderDocument(
  repository: RepositoryContext,
  components: Iterable<HostedComponent>,
  options: ProviderBuildOptions
): JsonMap {
  const logger = options.logger ?? getLogger();
  const packages = new Map<string, JsonMap>();

  for (const component of components) {
    const packageName = `${component.group}/${component.name}`;

    let manifest: JsonMap;
    try {
      manifest = options.extractor.extract(component.archive);
    } catch (error) {
      const cause = toError(error);
      logger.error(
        'Failed to extract composer.json from hosted component',
        { repository: repository.name, packageName, version: component.version },
        cause
      );
      throw new ExtractionError(
        `Unable to extract composer.json for ${packageName} version ${component.version}: ${cause.message}`,
        { cause }
      );
    }

    let versions = packages.get(packageName);
    if (!versions) {
      versions = new Map();
      packages.set(packageName, versions);
    }

    versions.set(
      component.version,
      buildPackageInfo(
        repository,
        {
          packageName,
          version: component.version,
          reference: component.checksum,
          shasum: component.checksum,
          type: ZIP_TYPE,
          time: formatComposerTime(component.lastUpdated),
          source: manifest,
        },
        options.paths ?? buildZipballPath
      )
    );
  }

  logger.debug('Built provider document', { repository: repository.name, packageCount: packages.size });
  return jsonMap([[COMPOSER_FIELDS.PACKAGES, packages]]);
}
