/*
 * PACKAGE.broker
 * Copyright (C) 2025 Łukasz Bajsarowicz
 * Licensed under AGPL-3.0
 */

// Payload-level entry points for hosted, proxy and group repositories

import {
  componentEntrySchema,
  repositoryContextSchema,
  type ComponentEntryInput,
  type Payload,
  type RepositoryContext,
  type RepositoryContextInput,
} from '@composer-index/shared';
import { ZipManifestExtractor } from './extractor/zip-manifest-extractor';
import { parseDocument, toPayload } from './json/codec';
import { resolveDistUrl } from './metadata/dist-url';
import { mergePackagesDocuments, mergeProviderDocuments } from './metadata/merge';
import {
  buildPackagesDocument,
  packageNamesFromComponents,
  packageNamesFromList,
} from './metadata/packages-document';
import { buildZipballPath } from './metadata/paths';
import { buildProviderDocument, type HostedComponent } from './metadata/provider-builder';
import { rewriteProviderDocument } from './metadata/provider-rewriter';
import type { BlobStore, ManifestExtractor, ZipballPathBuilder } from './ports';
import { getLogger, type Logger } from './utils/logger';

export interface ComposerIndexProcessorOptions {
  extractor?: ManifestExtractor;
  paths?: ZipballPathBuilder;
  logger?: Logger;
}

export class ComposerIndexProcessor {
  private readonly extractor: ManifestExtractor;
  private readonly paths: ZipballPathBuilder;
  private readonly logger: Logger;

  constructor(options: ComposerIndexProcessorOptions = {}) {
    this.extractor = options.extractor ?? new ZipManifestExtractor();
    this.paths = options.paths ?? buildZipballPath;
    this.logger = options.logger ?? getLogger();
  }

  /**
   * packages.json for a proxy, from the upstream list.json
   */
  generatePackagesFromList(repository: RepositoryContextInput, payload: Payload): Payload {
    const repo = this.resolveRepository(repository);
    const names = packageNamesFromList(parseDocument(payload));
    this.logger.debug('Generated packages.json from list', { repository: repo.name, packageCount: names.length });
    return toPayload(buildPackagesDocument(repo, names));
  }

  /**
   * packages.json for a hosted repository, from its component catalog
   */
  generatePackagesFromComponents(repository: RepositoryContextInput, entries: Iterable<ComponentEntryInput>): Payload {
    const repo = this.resolveRepository(repository);
    const components = Array.from(entries, (entry) => componentEntrySchema.parse(entry));
    return toPayload(buildPackagesDocument(repo, packageNamesFromComponents(components)));
  }

  /**
   * Upstream provider JSON with sources removed and zip dists pointed at this repository.
   * The response keeps the upstream content type.
   */
  rewriteProviderJson(repository: RepositoryContextInput, payload: Payload): Payload {
    const repo = this.resolveRepository(repository);
    const document = rewriteProviderDocument(repo, parseDocument(payload), this.paths);
    return toPayload(document, payload.contentType);
  }

  /**
   * Provider JSON for hosted components. Blobs are fetched up front; the
   * document itself is built synchronously once every archive is in memory.
   */
  async buildProviderJson(
    repository: RepositoryContextInput,
    entries: Iterable<ComponentEntryInput>,
    blobStore: BlobStore
  ): Promise<Payload> {
    const repo = this.resolveRepository(repository);
    const catalog = Array.from(entries, (entry) => componentEntrySchema.parse(entry));

    const components = await Promise.all(
      catalog.map(async (entry): Promise<HostedComponent> => {
        const blob = await blobStore.fetch(entry.assetRef);
        return {
          group: entry.group,
          name: entry.name,
          version: entry.version,
          archive: blob.bytes,
          lastUpdated: entry.lastUpdated,
          checksum: entry.checksum ?? blob.checksum,
        };
      })
    );

    const document = buildProviderDocument(repo, components, {
      extractor: this.extractor,
      paths: this.paths,
      logger: this.logger,
    });
    return toPayload(document);
  }

  /**
   * Group repository packages.json from member packages.json payloads
   */
  mergePackagesJson(repository: RepositoryContextInput, payloads: readonly Payload[]): Payload {
    const repo = this.resolveRepository(repository);
    const documents = payloads.map((payload) => parseDocument(payload));
    return toPayload(mergePackagesDocuments(repo, documents));
  }

  /**
   * Group repository provider JSON; members are given in priority order
   */
  mergeProviderJson(repository: RepositoryContextInput, payloads: readonly Payload[], now: Date = new Date()): Payload {
    const repo = this.resolveRepository(repository);
    const documents = payloads.map((payload) => parseDocument(payload));
    this.logger.debug('Merging provider documents', { repository: repo.name, memberCount: documents.length });
    return toPayload(mergeProviderDocuments(repo, documents, now, this.paths));
  }

  getDistUrl(vendor: string, project: string, version: string, payload: Payload): string {
    return resolveDistUrl(parseDocument(payload), vendor, project, version);
  }

  private resolveRepository(repository: RepositoryContextInput): RepositoryContext {
    return repositoryContextSchema.parse(repository);
  }
}
