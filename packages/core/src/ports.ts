/*
 * PACKAGE.broker
 * Copyright (C) 2025 Łukasz Bajsarowicz
 * Licensed under AGPL-3.0
 */

// Core ports (interfaces) for the collaborators around the index engine
// adhering to Hexagonal Architecture (Ports & Adapters)

import type { ComponentEntry } from '@composer-index/shared';
import type { JsonMap } from './json/value';

/**
 * Manifest Port
 * Reads the composer.json embedded in an artifact archive.
 * Implementations throw ExtractionError for corrupt archives or a missing manifest.
 */
export interface ManifestExtractor {
  extract(archive: Uint8Array): JsonMap;
}

export interface StoredBlob {
  bytes: Uint8Array;
  checksum: string;
}

/**
 * Blob Port
 * Resolves a component's storage reference to raw bytes and their checksum
 */
export interface BlobStore {
  fetch(ref: string): Promise<StoredBlob>;
}

/**
 * Catalog Port
 * Enumerates the components hosted by a repository
 */
export interface ComponentCatalog {
  list(): Promise<ComponentEntry[]>;
}

/**
 * Artifact Path Port
 * Relative path (below the repository URL) at which a zipball is served
 */
export type ZipballPathBuilder = (vendor: string, project: string, version: string) => string;
