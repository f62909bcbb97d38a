/**
 * Cache store configuration
 */

export interface MemoryCacheStoreConfig {
  /** Maximum number of entries; least recently used unleased entries are evicted beyond it */
  capacity: number;
}

export const DEFAULT_MEMORY_CACHE_CONFIG: MemoryCacheStoreConfig = {
  capacity: 1000,
};
