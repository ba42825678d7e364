/**
 * ConfigStore Interface
 *
 * Abstraction for persistence of the config document (task catalog and
 * selection settings). Enables backend-agnostic access: filesystem for the
 * CLI, memory for tests and embedding.
 *
 * NOTE: Selection history lives in the state document, handled by
 * StateStore. The two documents are loaded and saved together by the
 * runtime state.
 */

import type { ConfigDocument } from '../documents';

/**
 * Interface for config document persistence.
 *
 * Implementations:
 * - FsConfigStore: YAML file on disk
 * - MemoryConfigStore: In-memory for tests
 *
 * @example
 * ```typescript
 * // Production with filesystem
 * const store = new FsConfigStore('/home/me/.config/dailydraw/config.yaml');
 * const config = await store.loadConfig();
 *
 * // Tests with memory
 * const store = new MemoryConfigStore();
 * store.setConfig(createDefaultConfigDocument());
 * ```
 */
export interface ConfigStore {
  /** Where the document lives, for messages */
  readonly location: string;

  /**
   * Load the config document
   *
   * @returns the document, or null when none has been saved yet
   * @throws DocumentIoError or SerializationError when it cannot be read
   */
  loadConfig(): Promise<ConfigDocument | null>;

  /**
   * Save the config document
   */
  saveConfig(config: ConfigDocument): Promise<void>;
}
