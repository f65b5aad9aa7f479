/*
 * PACKAGE.broker
 * Copyright (C) 2025 Łukasz Bajsarowicz
 * Licensed under AGPL-3.0
 */

import { COMPOSER_FIELDS, PACKAGE_JSON_PATH, type RepositoryContext } from '@composer-index/shared';
import { expectArray, expectString, jsonMap, type JsonMap } from '../json/value';

/**
 * Build packages.json: a providers-url template on the repository and a
 * `{ sha256: null }` placeholder per provider, so clients always re-fetch.
 * Names are deduplicated, first occurrence keeps its position.
 */
export function buildPackagesDocument(repository: RepositoryContext, names: Iterable<string>): JsonMap {
  const providers: JsonMap = new Map();
  for (const name of names) {
    if (!providers.has(name)) {
      providers.set(name, jsonMap([[COMPOSER_FIELDS.SHA256, null]]));
    }
  }

  return jsonMap([
    [COMPOSER_FIELDS.PROVIDERS_URL, repository.url + PACKAGE_JSON_PATH],
    [COMPOSER_FIELDS.PROVIDERS, providers],
  ]);
}

/**
 * Read the package names out of an upstream list.json
 */
export function packageNamesFromList(listDocument: JsonMap): string[] {
  const names = expectArray(listDocument.get(COMPOSER_FIELDS.PACKAGE_NAMES), COMPOSER_FIELDS.PACKAGE_NAMES);
  return names.map((name, index) => expectString(name, `${COMPOSER_FIELDS.PACKAGE_NAMES}.${index}`));
}

export function packageNamesFromComponents(components: Iterable<{ group: string; name: string }>): string[] {
  const names: string[] = [];
  for (const component of components) {
    names.push(`${component.group}/${component.name}`);
  }
  return names;
}
