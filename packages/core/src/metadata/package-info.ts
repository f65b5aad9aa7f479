/*
 * PACKAGE.broker
 * Copyright (C) 2025 Łukasz Bajsarowicz
 * Licensed under AGPL-3.0
 */

import { md5 } from '@noble/hashes/legacy';
import { utf8ToBytes } from '@noble/hashes/utils';
import { COMPOSER_FIELDS, PASS_THROUGH_FIELDS, type RepositoryContext } from '@composer-index/shared';
import type { JsonMap } from '../json/value';
import type { ZipballPathBuilder } from '../ports';
import { buildDistInfo } from './dist';
import { buildZipballPath } from './paths';

export interface PackageInfoInput {
  packageName: string;
  version: string;
  reference: string | null;
  shasum: string | null;
  type: string;
  /** Release time, already rendered */
  time: string;
  /** Record (upstream version entry or extracted manifest) to copy known fields from */
  source?: JsonMap;
}

/**
 * Deterministic release identifier: the first four bytes of
 * md5(name + version + time), read little-endian as an unsigned int.
 * Collisions are tolerated, nothing enforces uniqueness.
 */
export function computeUid(packageName: string, version: string, time: string): number {
  const digest = md5(utf8ToBytes(packageName + version + time));
  return new DataView(digest.buffer, digest.byteOffset, digest.byteLength).getUint32(0, true);
}

/**
 * Copy the allow-listed manifest fields present in `source`, in dictionary order
 */
export function pickPassThroughFields(source: JsonMap | undefined, target: JsonMap): JsonMap {
  if (!source) {
    return target;
  }
  for (const field of PASS_THROUGH_FIELDS) {
    const value = source.get(field);
    if (value !== undefined) {
      target.set(field, value);
    }
  }
  return target;
}

export function buildPackageInfo(
  repository: RepositoryContext,
  input: PackageInfoInput,
  paths: ZipballPathBuilder = buildZipballPath
): JsonMap {
  const info: JsonMap = new Map();
  info.set(COMPOSER_FIELDS.NAME, input.packageName);
  info.set(COMPOSER_FIELDS.VERSION, input.version);
  info.set(COMPOSER_FIELDS.DIST, buildDistInfo(repository, input, paths));
  info.set(COMPOSER_FIELDS.TIME, input.time);
  info.set(COMPOSER_FIELDS.UID, computeUid(input.packageName, input.version, input.time));
  return pickPassThroughFields(input.source, info);
}
