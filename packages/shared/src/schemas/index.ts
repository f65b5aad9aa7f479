// Zod schemas for validation

import { z } from 'zod';

export const logLevelSchema = z.enum(['debug', 'info', 'warn', 'error']);

export const repositoryContextSchema = z.object({
  name: z.string().min(1, 'Repository name is required'),
  // Trailing slashes are dropped so generated URLs never contain "//"
  url: z
    .string()
    .url('Invalid repository URL')
    .transform((url) => url.replace(/\/+$/, '')),
});

export const componentEntrySchema = z.object({
  group: z.string().min(1, 'Component group (vendor) is required'),
  name: z.string().min(1, 'Component name (project) is required'),
  version: z.string().min(1, 'Component version is required'),
  assetRef: z.string().min(1, 'Primary asset reference is required'),
  lastUpdated: z.coerce.date(),
  checksum: z.string().min(1).nullable().default(null),
});

export const configSchema = z.object({
  logLevel: logLevelSchema.default('info'),
  blobStoragePath: z.string().min(1).default('./storage'),
});
