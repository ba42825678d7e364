/**
 * MemoryConfigStore - In-memory implementation of ConfigStore
 *
 * Useful for testing and for embedding the engine where filesystem access is
 * not wanted.
 */

import type { ConfigStore } from '../config_store';
import type { ConfigDocument } from '../../documents';

/**
 * In-memory ConfigStore implementation for tests.
 *
 * Documents are deep-copied on the way in and out, so callers never share
 * objects with the store.
 *
 * @example
 * ```typescript
 * const store = new MemoryConfigStore();
 * store.setConfig({ cutOff: '04:00', selection: { mode: 'count', dailyTasks: 2 }, tasks: [] });
 * const runtime = await RuntimeState.load(store, new MemoryStateStore());
 * ```
 */
export class MemoryConfigStore implements ConfigStore {
  readonly location = 'memory:config';
  private config: ConfigDocument | null = null;

  async loadConfig(): Promise<ConfigDocument | null> {
    return this.config ? structuredClone(this.config) : null;
  }

  async saveConfig(config: ConfigDocument): Promise<void> {
    this.config = structuredClone(config);
  }

  // ==================== Test Helpers ====================

  /**
   * Set config directly (for test setup)
   */
  setConfig(config: ConfigDocument | null): void {
    this.config = config ? structuredClone(config) : null;
  }

  /**
   * Get current config (for test assertions)
   */
  getConfig(): ConfigDocument | null {
    return this.config;
  }

  /**
   * Clear all data (for test cleanup)
   */
  clear(): void {
    this.config = null;
  }
}
