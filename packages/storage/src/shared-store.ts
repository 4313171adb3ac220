/**
 * Singleton artifact store for process-wide reuse.
 *
 * The HTTP handlers, the job manager and the lister must all see the same index;
 * this module hands out one FileArtifactStore per configuration.
 */

import { FileArtifactStore, type FileArtifactStoreConfig } from './index';

let cachedStore: FileArtifactStore | null = null;

/**
 * Configuration key of the cached store, for change detection
 */
let cachedConfig: string | null = null;

/**
 * Get or create the shared FileArtifactStore.
 *
 * - Returns the cached store if the directory and threshold are unchanged
 * - Creates (but does not open) a new store otherwise
 *
 * The logger is not part of the key: the cached store keeps logging through the logger
 * it was created with, and a `logger` passed on later calls is ignored.
 *
 * @example
 * ```typescript
 * const store = getSharedArtifactStore({ directory: './audio' });
 * await store.open();
 * ```
 */
export function getSharedArtifactStore(config: FileArtifactStoreConfig): FileArtifactStore {
  const configKey = JSON.stringify({ directory: config.directory, minAudioBytes: config.minAudioBytes });

  if (cachedStore && cachedConfig === configKey) {
    return cachedStore;
  }

  cachedStore = new FileArtifactStore(config);
  cachedConfig = configKey;
  return cachedStore;
}

/**
 * Manually clear the cached store. Primarily useful for testing.
 */
export function clearCachedStore(): void {
  cachedStore = null;
  cachedConfig = null;
}
