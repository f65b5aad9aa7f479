/*
 * PACKAGE.broker
 * Copyright (C) 2025 Łukasz Bajsarowicz
 * Licensed under AGPL-3.0
 */

import { COMPOSER_FIELDS } from '@composer-index/shared';
import { NotFoundError } from '../errors';
import { optionalMap, optionalString, type JsonMap } from '../json/value';

/**
 * Look up `packages[vendor/project][version].dist.url`.
 *
 * A NotFoundError means the document does not carry that version; callers
 * completing a proxy fetch should answer 404 rather than retry.
 */
export function resolveDistUrl(document: JsonMap, vendor: string, project: string, version: string): string {
  const packageName = `${vendor}/${project}`;
  const path = `${COMPOSER_FIELDS.PACKAGES}.${packageName}.${version}`;

  const packages = optionalMap(document.get(COMPOSER_FIELDS.PACKAGES), COMPOSER_FIELDS.PACKAGES);
  const versions = optionalMap(packages?.get(packageName), `${COMPOSER_FIELDS.PACKAGES}.${packageName}`);
  const info = optionalMap(versions?.get(version), path);
  const dist = optionalMap(info?.get(COMPOSER_FIELDS.DIST), `${path}.dist`);
  const url = optionalString(dist?.get(COMPOSER_FIELDS.URL), `${path}.dist.url`);

  if (url === null) {
    throw new NotFoundError(`No dist URL for ${packageName} version ${version}`);
  }
  return url;
}
