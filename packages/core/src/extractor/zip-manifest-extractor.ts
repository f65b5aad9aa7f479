/*
 * PACKAGE.broker
 * Copyright (C) 2025 Łukasz Bajsarowicz
 * Licensed under AGPL-3.0
 */

import { unzipSync } from 'fflate';
import { ComposerIndexError, ExtractionError, toError } from '../errors';
import { parseDocument } from '../json/codec';
import type { JsonMap } from '../json/value';
import type { ManifestExtractor } from '../ports';

const MANIFEST_NAME = 'composer.json';

function manifestDepth(path: string): number {
  return path.split('/').length - 1;
}

/**
 * Accept composer.json at the archive root or one folder down
 * (GitHub/GitLab zipballs nest everything under `{repo}-{ref}/`)
 */
function isManifestEntry(path: string): boolean {
  const filename = path.split('/').pop() || '';
  return filename === MANIFEST_NAME && manifestDepth(path) <= 1;
}

/**
 * Extract composer.json from a zip artifact
 */
export class ZipManifestExtractor implements ManifestExtractor {
  extract(archive: Uint8Array): JsonMap {
    let files: Record<string, Uint8Array>;
    try {
      files = unzipSync(archive, { filter: (file) => isManifestEntry(file.name) });
    } catch (error) {
      throw new ExtractionError(`Unable to read zip archive: ${toError(error).message}`, { cause: error });
    }

    const candidates = Object.keys(files).sort((a, b) => manifestDepth(a) - manifestDepth(b));
    const manifestPath = candidates[0];
    if (manifestPath === undefined) {
      throw new ExtractionError(`No ${MANIFEST_NAME} found in archive`);
    }

    try {
      return parseDocument(files[manifestPath]);
    } catch (error) {
      if (error instanceof ComposerIndexError) {
        throw new ExtractionError(`Invalid ${manifestPath}: ${error.message}`, { cause: error });
      }
      throw error;
    }
  }
}
