/*
 * PACKAGE.broker
 * Copyright (C) 2025 Łukasz Bajsarowicz
 * Licensed under AGPL-3.0
 */

import type { ZipballPathBuilder } from '../ports';

/**
 * Default zipball layout: `{vendor}/{project}/{version}/{vendor}-{project}-{version}.zip`
 */
export const buildZipballPath: ZipballPathBuilder = (vendor, project, version) =>
  `${vendor}/${project}/${version}/${vendor}-${project}-${version}.zip`;
