/*
 * PACKAGE.broker
 * Copyright (C) 2025 Łukasz Bajsarowicz
 * Licensed under AGPL-3.0
 */

import { COMPOSER_FIELDS, ZIP_TYPE, type RepositoryContext } from '@composer-index/shared';
import { expectMap, optionalMap, optionalString, type JsonMap } from '../json/value';
import type { ZipballPathBuilder } from '../ports';
import { buildDistInfo } from './dist';
import { buildZipballPath } from './paths';

/**
 * Rewrite an upstream provider document in place so that clients only ever
 * download through this repository.
 *
 * - `source` is dropped from every version (VCS checkouts are never offered)
 * - a `zip` dist is replaced by one pointing at the local zipball path,
 *   keeping the upstream reference and shasum
 * - any other dist type passes through untouched
 */
export function rewriteProviderDocument(
  repository: RepositoryContext,
  document: JsonMap,
  paths: ZipballPathBuilder = buildZipballPath
): JsonMap {
  const packages = optionalMap(document.get(COMPOSER_FIELDS.PACKAGES), COMPOSER_FIELDS.PACKAGES);
  if (!packages) {
    return document;
  }

  for (const [packageName, versionsValue] of packages) {
    const versions = optionalMap(versionsValue, `${COMPOSER_FIELDS.PACKAGES}.${packageName}`);
    if (!versions) {
      continue;
    }

    for (const [version, infoValue] of versions) {
      const path = `${COMPOSER_FIELDS.PACKAGES}.${packageName}.${version}`;
      const info = expectMap(infoValue, path);
      info.delete(COMPOSER_FIELDS.SOURCE);

      const dist = optionalMap(info.get(COMPOSER_FIELDS.DIST), `${path}.${COMPOSER_FIELDS.DIST}`);
      if (!dist || dist.get(COMPOSER_FIELDS.TYPE) !== ZIP_TYPE) {
        continue;
      }

      info.set(
        COMPOSER_FIELDS.DIST,
        buildDistInfo(
          repository,
          {
            packageName,
            version,
            reference: optionalString(dist.get(COMPOSER_FIELDS.REFERENCE), `${path}.dist.reference`),
            shasum: optionalString(dist.get(COMPOSER_FIELDS.SHASUM), `${path}.dist.shasum`),
            type: ZIP_TYPE,
          },
          paths
        )
      );
    }
  }

  return document;
}
