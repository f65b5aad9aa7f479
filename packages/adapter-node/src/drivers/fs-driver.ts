/*
 * PACKAGE.broker
 * Copyright (C) 2025 Łukasz Bajsarowicz
 * Licensed under AGPL-3.0
 */

import fs from 'node:fs/promises';
import path from 'node:path';
import { sha1 } from '@noble/hashes/legacy';
import { bytesToHex } from '@noble/hashes/utils';
import { NotFoundError, type BlobStore, type StoredBlob } from '@composer-index/core';

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * Blob store over a local directory; checksums are SHA-1 hex
 */
export class FileSystemBlobStore implements BlobStore {
  private basePath: string;

  constructor(basePath: string) {
    this.basePath = basePath;
  }

  private getPath(ref: string): string {
    // Prevent directory traversal
    const safeRef = ref.replace(/\.\./g, '');
    return path.join(this.basePath, safeRef);
  }

  async fetch(ref: string): Promise<StoredBlob> {
    let data: Buffer;
    try {
      data = await fs.readFile(this.getPath(ref));
    } catch (e) {
      if (isMissingFile(e)) {
        throw new NotFoundError(`Blob not found: ${ref}`);
      }
      throw e;
    }

    const bytes = new Uint8Array(data.buffer, data.byteOffset, data.byteLength);
    return { bytes, checksum: bytesToHex(sha1(bytes)) };
  }

  /**
   * Store a blob and return its checksum
   */
  async put(ref: string, data: Uint8Array): Promise<string> {
    const filePath = this.getPath(ref);
    await fs.mkdir(path.dirname(filePath), { recursive: true });
    await fs.writeFile(filePath, data);
    return bytesToHex(sha1(data));
  }

  async delete(ref: string): Promise<void> {
    try {
      await fs.unlink(this.getPath(ref));
    } catch (e) {
      if (!isMissingFile(e)) throw e;
    }
  }
}
