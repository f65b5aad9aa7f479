// Shared TypeScript types

import type { z } from 'zod';
import type { componentEntrySchema, configSchema, repositoryContextSchema } from '../schemas';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * Serving repository; all generated URLs hang off `url`
 */
export type RepositoryContext = z.infer<typeof repositoryContextSchema>;
export type RepositoryContextInput = z.input<typeof repositoryContextSchema>;

/**
 * One hosted component as enumerated by a component catalog
 */
export type ComponentEntry = z.infer<typeof componentEntrySchema>;
export type ComponentEntryInput = z.input<typeof componentEntrySchema>;

export type ComposerIndexConfig = z.infer<typeof configSchema>;

export interface Payload {
  body: string | Uint8Array;
  contentType: string;
}
