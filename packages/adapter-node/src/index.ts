/*
 * PACKAGE.broker
 * Copyright (C) 2025 Łukasz Bajsarowicz
 * Licensed under AGPL-3.0
 */

import {
  ComposerIndexProcessor,
  getLogger,
  type ComponentCatalog,
  type Logger,
  type ManifestExtractor,
  type ZipballPathBuilder,
} from '@composer-index/core';
import type { ComposerIndexConfig, Payload, RepositoryContextInput } from '@composer-index/shared';
import { FileSystemBlobStore } from './drivers/fs-driver';
import { loadConfigFromEnvironment } from './config';

export { FileSystemBlobStore } from './drivers/fs-driver';
export { MemoryComponentCatalog } from './catalog/memory-catalog';
export { loadConfig, loadConfigFromEnvironment } from './config';

export interface NodeComposerIndexOptions {
  config?: ComposerIndexConfig;
  extractor?: ManifestExtractor;
  paths?: ZipballPathBuilder;
}

export interface NodeComposerIndex {
  config: ComposerIndexConfig;
  logger: Logger;
  processor: ComposerIndexProcessor;
  blobStore: FileSystemBlobStore;
  /** packages.json for a hosted repository backed by `catalog` */
  packagesJsonFromCatalog(repository: RepositoryContextInput, catalog: ComponentCatalog): Promise<Payload>;
  /** Provider JSON for every component in `catalog` */
  providerJsonFromCatalog(repository: RepositoryContextInput, catalog: ComponentCatalog): Promise<Payload>;
}

/**
 * Wire a processor to the local filesystem blob store.
 * Configuration comes from the environment unless passed in.
 */
export function createNodeComposerIndex(options: NodeComposerIndexOptions = {}): NodeComposerIndex {
  const config = options.config ?? loadConfigFromEnvironment();
  const logger = getLogger(config.logLevel);
  const blobStore = new FileSystemBlobStore(config.blobStoragePath);
  const processor = new ComposerIndexProcessor({
    extractor: options.extractor,
    paths: options.paths,
    logger,
  });

  logger.info('Composer index initialized', { blobStoragePath: config.blobStoragePath, logLevel: config.logLevel });

  return {
    config,
    logger,
    processor,
    blobStore,
    async packagesJsonFromCatalog(repository, catalog) {
      return processor.generatePackagesFromComponents(repository, await catalog.list());
    },
    async providerJsonFromCatalog(repository, catalog) {
      return processor.buildProviderJson(repository, await catalog.list(), blobStore);
    },
  };
}
