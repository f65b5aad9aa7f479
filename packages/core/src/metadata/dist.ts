/*
 * PACKAGE.broker
 * Copyright (C) 2025 Łukasz Bajsarowicz
 * Licensed under AGPL-3.0
 */

import { COMPOSER_FIELDS, type RepositoryContext } from '@composer-index/shared';
import { MalformedNameError } from '../errors';
import type { JsonMap } from '../json/value';
import type { ZipballPathBuilder } from '../ports';
import { buildZipballPath } from './paths';

export interface PackageNameParts {
  vendor: string;
  project: string;
}

/**
 * Split `vendor/project`; anything other than two non-empty segments is rejected
 */
export function splitPackageName(packageName: string): PackageNameParts {
  const parts = packageName.split('/');
  if (parts.length !== 2 || parts[0] === '' || parts[1] === '') {
    throw new MalformedNameError(packageName);
  }
  const [vendor, project] = parts;
  return { vendor, project };
}

export interface DistInfoInput {
  packageName: string;
  version: string;
  reference: string | null;
  shasum: string | null;
  type: string;
}

/**
 * Build a dist descriptor served from the repository itself
 */
export function buildDistInfo(
  repository: RepositoryContext,
  input: DistInfoInput,
  paths: ZipballPathBuilder = buildZipballPath
): JsonMap {
  const { vendor, project } = splitPackageName(input.packageName);
  const dist: JsonMap = new Map();
  dist.set(COMPOSER_FIELDS.URL, `${repository.url}/${paths(vendor, project, input.version)}`);
  dist.set(COMPOSER_FIELDS.TYPE, input.type);
  dist.set(COMPOSER_FIELDS.REFERENCE, input.reference);
  dist.set(COMPOSER_FIELDS.SHASUM, input.shasum);
  return dist;
}
