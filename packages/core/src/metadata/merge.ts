/*
 * PACKAGE.broker
 * Copyright (C) 2025 Łukasz Bajsarowicz
 * Licensed under AGPL-3.0
 */

// Group repository aggregation: member documents in priority order

import { COMPOSER_FIELDS, ZIP_TYPE, type RepositoryContext } from '@composer-index/shared';
import { expectMap, jsonMap, optionalMap, optionalString, type JsonMap } from '../json/value';
import type { ZipballPathBuilder } from '../ports';
import { buildPackageInfo } from './package-info';
import { buildPackagesDocument } from './packages-document';
import { buildZipballPath } from './paths';
import { formatComposerTime } from './time';

/**
 * Union of the provider names of every document. The providers-url is
 * always regenerated for `repository`, never copied from a member.
 */
export function mergePackagesDocuments(repository: RepositoryContext, documents: Iterable<JsonMap>): JsonMap {
  const names = new Set<string>();
  for (const document of documents) {
    const providers = optionalMap(document.get(COMPOSER_FIELDS.PROVIDERS), COMPOSER_FIELDS.PROVIDERS);
    if (!providers) {
      continue;
    }
    for (const name of providers.keys()) {
      names.add(name);
    }
  }
  return buildPackagesDocument(repository, names);
}

/**
 * Merge provider documents into one holding freshly built release records.
 *
 * Earlier documents win: once a (package, version) slot is filled, later
 * entries for it are discarded. Versions without a dist are skipped, so a
 * later member can still supply them. A version without its own `time`
 * gets `now`.
 */
export function mergeProviderDocuments(
  repository: RepositoryContext,
  documents: Iterable<JsonMap>,
  now: Date,
  paths: ZipballPathBuilder = buildZipballPath
): JsonMap {
  const currentTime = formatComposerTime(now);
  const packages = new Map<string, JsonMap>();

  for (const document of documents) {
    const packagesMap = optionalMap(document.get(COMPOSER_FIELDS.PACKAGES), COMPOSER_FIELDS.PACKAGES);
    if (!packagesMap) {
      continue;
    }

    for (const [packageName, versionsValue] of packagesMap) {
      const versions = optionalMap(versionsValue, `${COMPOSER_FIELDS.PACKAGES}.${packageName}`);
      if (!versions) {
        continue;
      }

      for (const [version, infoValue] of versions) {
        const path = `${COMPOSER_FIELDS.PACKAGES}.${packageName}.${version}`;
        const info = expectMap(infoValue, path);
        const dist = optionalMap(info.get(COMPOSER_FIELDS.DIST), `${path}.dist`);
        if (!dist) {
          continue;
        }

        let merged = packages.get(packageName);
        if (!merged) {
          merged = new Map();
          packages.set(packageName, merged);
        }
        if (merged.has(version)) {
          continue;
        }

        merged.set(
          version,
          buildPackageInfo(
            repository,
            {
              packageName,
              version,
              reference: optionalString(dist.get(COMPOSER_FIELDS.REFERENCE), `${path}.dist.reference`),
              shasum: optionalString(dist.get(COMPOSER_FIELDS.SHASUM), `${path}.dist.shasum`),
              type: optionalString(dist.get(COMPOSER_FIELDS.TYPE), `${path}.dist.type`) ?? ZIP_TYPE,
              time: optionalString(info.get(COMPOSER_FIELDS.TIME), `${path}.time`) ?? currentTime,
              source: info,
            },
            paths
          )
        );
      }
    }
  }

  return jsonMap([[COMPOSER_FIELDS.PACKAGES, packages]]);
}
