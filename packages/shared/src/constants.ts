/*
 * PACKAGE.broker
 * Copyright (C) 2025 Łukasz Bajsarowicz
 * Licensed under AGPL-3.0
 */

/**
 * JSON keys understood in Composer index documents.
 * Every component reads and writes field names through this map.
 */
export const COMPOSER_FIELDS = {
  AUTOLOAD: 'autoload',
  AUTHORS: 'authors',
  BIN: 'bin',
  CONFLICT: 'conflict',
  DESCRIPTION: 'description',
  DIST: 'dist',
  EXTRA: 'extra',
  KEYWORDS: 'keywords',
  LICENSE: 'license',
  NAME: 'name',
  PACKAGES: 'packages',
  PACKAGE_NAMES: 'packageNames',
  PROVIDE: 'provide',
  PROVIDERS: 'providers',
  PROVIDERS_URL: 'providers-url',
  REFERENCE: 'reference',
  REQUIRE: 'require',
  REQUIRE_DEV: 'require-dev',
  SHA256: 'sha256',
  SHASUM: 'shasum',
  SOURCE: 'source',
  SUGGEST: 'suggest',
  TARGET_DIR: 'target-dir',
  TIME: 'time',
  TYPE: 'type',
  UID: 'uid',
  URL: 'url',
  VERSION: 'version',
} as const;

export type ComposerField = (typeof COMPOSER_FIELDS)[keyof typeof COMPOSER_FIELDS];

/**
 * Manifest fields carried from a source record into a rebuilt release record.
 * name/version/dist/time/uid are owned by the builder and never copied.
 */
export const PASS_THROUGH_FIELDS: readonly ComposerField[] = [
  COMPOSER_FIELDS.AUTOLOAD,
  COMPOSER_FIELDS.AUTHORS,
  COMPOSER_FIELDS.BIN,
  COMPOSER_FIELDS.CONFLICT,
  COMPOSER_FIELDS.DESCRIPTION,
  COMPOSER_FIELDS.EXTRA,
  COMPOSER_FIELDS.KEYWORDS,
  COMPOSER_FIELDS.LICENSE,
  COMPOSER_FIELDS.PROVIDE,
  COMPOSER_FIELDS.REQUIRE,
  COMPOSER_FIELDS.REQUIRE_DEV,
  COMPOSER_FIELDS.SUGGEST,
  COMPOSER_FIELDS.TARGET_DIR,
  COMPOSER_FIELDS.TYPE,
];

export const ZIP_TYPE = 'zip';

export const APPLICATION_JSON = 'application/json';

/**
 * Providers URL template appended to the repository base URL in packages.json
 */
export const PACKAGE_JSON_PATH = '/p/%package%.json';
