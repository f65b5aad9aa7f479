/*
 * PACKAGE.broker
 * Copyright (C) 2025 Łukasz Bajsarowicz
 * Licensed under AGPL-3.0
 */

import { config as loadDotenv } from 'dotenv';
import { configSchema, type ComposerIndexConfig } from '@composer-index/shared';

/**
 * Read configuration from environment variables:
 * - LOG_LEVEL: debug | info | warn | error (default info)
 * - BLOB_STORAGE_PATH: directory holding artifact blobs (default ./storage)
 */
export function loadConfig(env: NodeJS.ProcessEnv): ComposerIndexConfig {
  return configSchema.parse({
    logLevel: env.LOG_LEVEL || undefined,
    blobStoragePath: env.BLOB_STORAGE_PATH || undefined,
  });
}

/**
 * Load `.env` (if present) into process.env, then read the configuration
 */
export function loadConfigFromEnvironment(): ComposerIndexConfig {
  loadDotenv();
  return loadConfig(process.env);
}
